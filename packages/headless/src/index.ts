export * from './lib.js';
export * from './config.js';
export * from './event_log.js';
export * from './report.js';
export * from './timeline.js';
export * from './simulate.js';

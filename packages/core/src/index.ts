export * from './cpu/exceptions.js';
export * from './cpu/context.js';
export * from './devices/registry.js';
export * from './irq/interrupt.js';
export * from './irq/queue.js';
export * from './irq/scheduler.js';
export * from './system/random.js';
export * from './system/stats.js';
export * from './system/driver.js';

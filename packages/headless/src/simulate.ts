import { DeviceRegistry, SimulationDriver, type SimulationRun } from '@irqsim/core';
import { checkArrivals, type SimConfig } from './config.js';
import { EventLog } from './event_log.js';
import { logFingerprint } from './lib.js';
import { renderReport } from './report.js';

export type HeadlessRun = {
  run: SimulationRun;
  registry: DeviceRegistry;
  lines: readonly string[];
  report: string;
  fingerprint: string;
};

export type HeadlessOptions = {
  echo?: (line: string) => void;
  now?: Date;
};

export function runSimulation(cfg: SimConfig, opts: HeadlessOptions = {}): HeadlessRun {
  checkArrivals(cfg);
  const registry = new DeviceRegistry(cfg.devices);
  const log = new EventLog({ mainLogEvery: cfg.mainLogEvery, echo: opts.echo });
  const driver = new SimulationDriver({
    registry,
    ticks: cfg.ticks,
    arrivalProbability: cfg.probability,
    seed: cfg.seed,
    service: cfg.service,
    sink: log,
  });
  for (const a of cfg.arrivals) driver.scheduleArrival(a.tick, a.device);

  log.note(0, '[INIT] Simulation started.');
  const run = driver.run();
  log.note(cfg.ticks, '[END] Simulation finished.');
  for (const w of run.warnings) log.note(cfg.ticks, `[WARN] ${w}`);

  const report = renderReport({
    lines: log.lines,
    stats: run.stats,
    registry,
    ticks: cfg.ticks,
    probability: cfg.probability,
    seed: cfg.seed,
    generatedAt: opts.now ?? new Date(),
  });
  return { run, registry, lines: log.lines, report, fingerprint: logFingerprint(log.lines) };
}

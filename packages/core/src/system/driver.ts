import { CollaboratorError } from '../cpu/exceptions.js';
import { DeviceRegistry } from '../devices/registry.js';
import type { QueueEntry } from '../irq/interrupt.js';
import { InterruptScheduler, type ServiceBounds, type TickOutcome } from '../irq/scheduler.js';
import { SeededRandom, type RandomSource } from './random.js';
import { StatsAccumulator, type RunStatistics } from './stats.js';

export interface EventSink {
  record(outcome: TickOutcome): void;
}

export type SinkFailurePolicy = 'abort' | 'detach';

export type DriverOptions = {
  registry?: DeviceRegistry;
  ticks?: number;
  arrivalProbability?: number;
  service?: ServiceBounds;
  // Takes precedence over `seed`.
  random?: RandomSource;
  seed?: number;
  sink?: EventSink;
  sinkFailure?: SinkFailurePolicy;
  checkInvariants?: boolean;
};

export type SimulationRun = {
  outcomes: TickOutcome[];
  stats: RunStatistics;
  finalProgramCounter: number;
  finalQueue: readonly QueueEntry[];
  warnings: string[];
};

export const DEFAULT_TICKS = 50;
export const DEFAULT_PROBABILITY = 0.25;
export const DEFAULT_SEED = 1;

// Owns simulated time. Each driver has its own scheduler, queue, context store and random source.
export class SimulationDriver {
  readonly ticks: number;
  readonly scheduler: InterruptScheduler;
  private forced = new Map<number, string[]>();
  private sink: EventSink | undefined;
  private readonly sinkFailure: SinkFailurePolicy;
  private ran = false;

  constructor(opts: DriverOptions = {}) {
    const ticks = opts.ticks ?? DEFAULT_TICKS;
    if (!Number.isInteger(ticks) || ticks < 0) throw new RangeError(`ticks must be a non-negative integer, got ${ticks}`);
    this.ticks = ticks;
    this.scheduler = new InterruptScheduler({
      registry: opts.registry ?? new DeviceRegistry(),
      random: opts.random ?? new SeededRandom(opts.seed ?? DEFAULT_SEED),
      arrivalProbability: opts.arrivalProbability ?? DEFAULT_PROBABILITY,
      service: opts.service,
      checkInvariants: opts.checkInvariants,
    });
    this.sink = opts.sink;
    this.sinkFailure = opts.sinkFailure ?? 'abort';
  }

  // Forces `deviceName` to raise an interrupt at `tick`, after the random draws of that tick.
  scheduleArrival(tick: number, deviceName: string): void {
    if (!Number.isInteger(tick) || tick < 0) throw new RangeError(`tick must be a non-negative integer, got ${tick}`);
    if (tick >= this.ticks) throw new RangeError(`tick ${tick} is outside the run horizon of ${this.ticks} ticks`);
    this.scheduler.registry.get(deviceName);
    const arr = this.forced.get(tick) ?? [];
    arr.push(deviceName);
    this.forced.set(tick, arr);
  }

  run(): SimulationRun {
    if (this.ran) throw new Error('SimulationDriver.run() may only be called once');
    this.ran = true;
    const stats = new StatsAccumulator(this.scheduler.registry);
    const outcomes: TickOutcome[] = [];
    const warnings: string[] = [];
    for (let tick = 0; tick < this.ticks; tick++) {
      const outcome = this.scheduler.step(tick, this.forced.get(tick));
      outcomes.push(outcome);
      stats.record(outcome);
      this.deliver(outcome, warnings);
    }
    return {
      outcomes,
      stats: stats.finish(this.scheduler.pendingCount()),
      finalProgramCounter: this.scheduler.programCounter,
      finalQueue: this.scheduler.queueSnapshot(),
      warnings,
    };
  }

  private deliver(outcome: TickOutcome, warnings: string[]): void {
    if (!this.sink) return;
    try {
      this.sink.record(outcome);
    } catch (e) {
      const err = new CollaboratorError('SinkFailed', `event sink failed at tick ${outcome.tick}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
      if (this.sinkFailure === 'abort') throw err;
      warnings.push(`${err.message}; sink detached`);
      this.sink = undefined;
    }
  }
}

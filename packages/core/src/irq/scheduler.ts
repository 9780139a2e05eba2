import { ContextStore, type SavedContext } from '../cpu/context.js';
import { InvariantViolation } from '../cpu/exceptions.js';
import type { Device, DeviceRegistry, PriorityLabel } from '../devices/registry.js';
import type { RandomSource } from '../system/random.js';
import type { InterruptRecord, QueueEntry } from './interrupt.js';
import { InterruptQueue, assertTick } from './queue.js';

export type ServiceBounds = Readonly<{ min: number; max: number }>;

export const DEFAULT_SERVICE: ServiceBounds = { min: 2, max: 4 };

// `remaining` is always > 0 while servicing; it reaches 0 only on the completing tick.
export type RunState =
  | { readonly kind: 'idle' }
  | { readonly kind: 'servicing'; readonly record: InterruptRecord; readonly remaining: number };

export type ArrivalsEvent = Readonly<{
  kind: 'arrivals';
  tick: number;
  admitted: readonly string[];
  rejected: readonly string[];
  // more than one device admitted in the same tick
  simultaneous: boolean;
  // a single admission that now waits in the queue while nothing is in service
  queued: boolean;
}>;

export type ServiceContinueEvent = Readonly<{
  kind: 'service-continue';
  tick: number;
  device: string;
  remainingBefore: number;
  remaining: number;
}>;

export type ServiceCompleteEvent = Readonly<{
  kind: 'service-complete';
  tick: number;
  device: string;
  restored: SavedContext;
  resumeAt: number;
}>;

export type ServiceStartEvent = Readonly<{
  kind: 'service-start';
  tick: number;
  device: string;
  priority: PriorityLabel;
  arrivalTick: number;
  latency: number;
  duration: number;
  savedProgramCounter: number;
}>;

export type MainProcessEvent = Readonly<{
  kind: 'main-process';
  tick: number;
  programCounter: number;
}>;

export type TransitionEvent = ServiceContinueEvent | ServiceCompleteEvent | ServiceStartEvent | MainProcessEvent;

export type SchedulerEvent = ArrivalsEvent | TransitionEvent;

export type TickOutcome = Readonly<{
  tick: number;
  arrivals: ArrivalsEvent | null;
  transition: TransitionEvent;
}>;

export type SchedulerOptions = {
  registry: DeviceRegistry;
  random: RandomSource;
  arrivalProbability: number;
  service?: ServiceBounds;
  // Re-verify queue order and uniqueness after every arrival phase.
  checkInvariants?: boolean;
};

export class InterruptScheduler {
  readonly registry: DeviceRegistry;
  private readonly queue = new InterruptQueue();
  private readonly context = new ContextStore();
  private readonly random: RandomSource;
  private readonly probability: number;
  private readonly service: ServiceBounds;
  private readonly checkInvariants: boolean;

  private run: RunState = { kind: 'idle' };
  private pc = 0;
  private lastTick = -1;

  constructor(opts: SchedulerOptions) {
    const p = opts.arrivalProbability;
    if (!(p >= 0 && p <= 1)) throw new RangeError(`arrival probability must be within [0, 1], got ${p}`);
    const service = opts.service ?? DEFAULT_SERVICE;
    if (!Number.isInteger(service.min) || !Number.isInteger(service.max) || service.min < 1 || service.max < service.min) {
      throw new RangeError(`service duration bounds must satisfy 1 <= min <= max, got [${service.min}, ${service.max}]`);
    }
    this.registry = opts.registry;
    this.random = opts.random;
    this.probability = p;
    this.service = service;
    this.checkInvariants = opts.checkInvariants ?? true;
  }

  get programCounter(): number {
    return this.pc;
  }

  state(): RunState {
    return this.run;
  }

  isIdle(): boolean {
    return this.run.kind === 'idle';
  }

  queueSnapshot(): readonly QueueEntry[] {
    return this.queue.snapshot();
  }

  pendingCount(): number {
    return this.queue.size;
  }

  hasSavedContext(): boolean {
    return this.context.isOccupied();
  }

  // One tick: arrivals, then exactly one of continue/complete, start, or main-process.
  step(tick: number, forced: readonly string[] = []): TickOutcome {
    assertTick(tick);
    if (tick <= this.lastTick) throw new RangeError(`tick ${tick} is not after previous tick ${this.lastTick}`);
    const forcedDevices = forced.map(name => this.registry.get(name));

    // Every draw happens before any mutation; a failing source leaves the tick untaken.
    const raised = this.registry.list().filter(() => this.random.chance(this.probability));
    const offered = [...raised, ...forcedDevices];
    const willStart = this.run.kind === 'idle' && (offered.length > 0 || this.queue.hasPending());
    const duration = willStart ? this.random.intInclusive(this.service.min, this.service.max) : 0;

    this.lastTick = tick;
    const arrivals = this.admitArrivals(tick, offered);
    const transition = this.run.kind === 'servicing'
      ? this.continueService(tick, this.run.record, this.run.remaining)
      : this.startOrRun(tick, duration);
    return { tick, arrivals, transition };
  }

  private admitArrivals(tick: number, offered: readonly Device[]): ArrivalsEvent | null {
    const admitted: string[] = [];
    const rejected: string[] = [];
    for (const d of offered) {
      if (this.queue.admit(tick, d)) admitted.push(d.name);
      else rejected.push(d.name);
    }
    if (this.checkInvariants) this.queue.verify();

    if (admitted.length === 0 && rejected.length === 0) return null;
    return {
      kind: 'arrivals',
      tick,
      admitted,
      rejected,
      simultaneous: admitted.length > 1,
      queued: admitted.length === 1 && this.run.kind === 'idle' && this.queue.hasPending(),
    };
  }

  private continueService(tick: number, record: InterruptRecord, remainingBefore: number): TransitionEvent {
    const remaining = remainingBefore - 1;
    if (remaining === 0) {
      const restored = this.context.restore();
      this.run = { kind: 'idle' };
      return { kind: 'service-complete', tick, device: record.device.name, restored, resumeAt: restored.programCounter + 1 };
    }
    this.run = { kind: 'servicing', record, remaining };
    return { kind: 'service-continue', tick, device: record.device.name, remainingBefore, remaining };
  }

  private startOrRun(tick: number, duration: number): TransitionEvent {
    if (!this.queue.hasPending()) {
      const programCounter = this.pc;
      this.pc++;
      return { kind: 'main-process', tick, programCounter };
    }
    const next = this.queue.popHighest();
    if (!next) throw new InvariantViolation('InvalidState', 'queue reported pending work but had nothing to pop');
    this.context.save(tick, this.pc);
    this.run = { kind: 'servicing', record: next, remaining: duration };
    return {
      kind: 'service-start',
      tick,
      device: next.device.name,
      priority: next.device.priority.label,
      arrivalTick: next.arrivalTick,
      latency: tick - next.arrivalTick,
      duration,
      savedProgramCounter: this.pc,
    };
  }
}

import type { Device } from '../devices/registry.js';
import { InvariantViolation } from '../cpu/exceptions.js';
import { compareInterrupts, makeInterrupt, toQueueEntry, type InterruptRecord, type QueueEntry } from './interrupt.js';

export function assertTick(tick: number): void {
  if (!Number.isInteger(tick) || tick < 0) throw new RangeError(`tick must be a non-negative integer, got ${tick}`);
}

export class InterruptQueue {
  private pending: InterruptRecord[] = [];

  get size(): number {
    return this.pending.length;
  }

  // Rejects a second record for the same device at the same tick.
  admit(tick: number, device: Device): boolean {
    assertTick(tick);
    const exists = this.pending.some(r => r.device.name === device.name && r.arrivalTick === tick);
    if (exists) return false;
    this.pending.push(makeInterrupt(device, tick));
    // Array.prototype.sort is stable, so equal (rank, tick) keep admission order
    this.pending.sort(compareInterrupts);
    return true;
  }

  popHighest(): InterruptRecord | undefined {
    return this.pending.shift();
  }

  hasPending(): boolean {
    return this.pending.length > 0;
  }

  snapshot(): readonly QueueEntry[] {
    return this.pending.map(toQueueEntry);
  }

  // Full scan of the ordering and uniqueness invariants. Throws on the first breach.
  verify(): void {
    const seen = new Set<string>();
    let prev: InterruptRecord | undefined;
    for (const r of this.pending) {
      const key = `${r.device.name}@${r.arrivalTick}`;
      if (seen.has(key)) throw new InvariantViolation('DuplicateAdmission', `${key} is pending twice`);
      seen.add(key);
      if (prev && compareInterrupts(prev, r) > 0) {
        throw new InvariantViolation('QueueOrder', `${prev.device.name}@${prev.arrivalTick} is ahead of ${key}`);
      }
      prev = r;
    }
  }
}

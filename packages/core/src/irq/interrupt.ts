import type { Device, PriorityRank } from '../devices/registry.js';

// One pending interrupt occurrence. arrivalTick is fixed at admission.
export type InterruptRecord = Readonly<{
  device: Device;
  rank: PriorityRank;
  arrivalTick: number;
}>;

export type QueueEntry = Readonly<{
  device: string;
  rank: PriorityRank;
  arrivalTick: number;
}>;

export function makeInterrupt(device: Device, arrivalTick: number): InterruptRecord {
  return Object.freeze({ device, rank: device.priority.rank, arrivalTick });
}

// Priority rank first (smaller wins), then FIFO on arrival tick.
export function compareInterrupts(a: InterruptRecord, b: InterruptRecord): number {
  if (a.rank !== b.rank) return a.rank - b.rank;
  return a.arrivalTick - b.arrivalTick;
}

export function toQueueEntry(r: InterruptRecord): QueueEntry {
  return { device: r.device.name, rank: r.rank, arrivalTick: r.arrivalTick };
}

import { ConfigError } from '../cpu/exceptions.js';

export type PriorityRank = 1 | 2 | 3;
export type PriorityLabel = 'High' | 'Medium' | 'Low';

export type Priority = Readonly<{ rank: PriorityRank; label: PriorityLabel }>;

// Rank and label live together so they cannot drift apart.
export const Priority = {
  High: { rank: 1, label: 'High' },
  Medium: { rank: 2, label: 'Medium' },
  Low: { rank: 3, label: 'Low' },
} as const satisfies Record<PriorityLabel, Priority>;

const BY_RANK: Record<PriorityRank, Priority> = {
  1: Priority.High,
  2: Priority.Medium,
  3: Priority.Low,
};

export function priorityFromRank(rank: number): Priority {
  if (rank === 1 || rank === 2 || rank === 3) return BY_RANK[rank];
  throw new ConfigError(`unknown priority rank ${rank}`);
}

// Accepts 'high' | 'medium' | 'low' in any case, or a rank 1..3.
export function parsePriority(text: string): Priority {
  const s = text.trim().toLowerCase();
  switch (s) {
    case 'high': return Priority.High;
    case 'medium': return Priority.Medium;
    case 'low': return Priority.Low;
    default: {
      const n = Number(s);
      if (s !== '' && Number.isInteger(n)) return priorityFromRank(n);
      throw new ConfigError(`unknown priority '${text}'`);
    }
  }
}

export type Device = Readonly<{ name: string; priority: Priority }>;

export function device(name: string, priority: Priority): Device {
  return Object.freeze({ name, priority });
}

export const DEFAULT_DEVICES: readonly Device[] = Object.freeze([
  device('Teclado', Priority.High),
  device('Impressora', Priority.Medium),
  device('Disco', Priority.Low),
]);

export class DeviceRegistry {
  private readonly devices: readonly Device[];
  private readonly byName = new Map<string, Device>();

  constructor(devices: readonly Device[] = DEFAULT_DEVICES) {
    for (const d of devices) {
      if (d.name.trim() === '') throw new ConfigError('device name must not be empty');
      if (this.byName.has(d.name)) throw new ConfigError(`duplicate device name '${d.name}'`);
      this.byName.set(d.name, d);
    }
    this.devices = Object.freeze([...devices]);
  }

  get size(): number {
    return this.devices.length;
  }

  list(): readonly Device[] {
    return this.devices;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): Device {
    const d = this.byName.get(name);
    if (!d) throw new ConfigError(`unknown device '${name}'`);
    return d;
  }
}

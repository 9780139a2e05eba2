import { ConfigError, DEFAULT_DEVICES, DEFAULT_PROBABILITY, DEFAULT_SEED, DEFAULT_SERVICE, DEFAULT_TICKS, device, parsePriority, priorityFromRank, type Device } from '@irqsim/core';
import { parseFlags, parseFraction, parseNum } from './lib.js';

export type ForcedArrival = { tick: number; device: string };

export type SimConfig = {
  ticks: number;
  probability: number;
  seed: number;
  service: { min: number; max: number };
  devices: readonly Device[];
  arrivals: readonly ForcedArrival[];
  report: string;
  timeline: string | null;
  mainLogEvery: number;
  quiet: boolean;
};

export const DEFAULT_REPORT = 'log_simulacao.txt';

export function defaultConfig(): SimConfig {
  return {
    ticks: DEFAULT_TICKS,
    probability: DEFAULT_PROBABILITY,
    seed: DEFAULT_SEED,
    service: { ...DEFAULT_SERVICE },
    devices: DEFAULT_DEVICES,
    arrivals: [],
    report: DEFAULT_REPORT,
    timeline: null,
    mainLogEvery: 5,
    quiet: false,
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function int(v: unknown, what: string): number {
  if (typeof v === 'number' && Number.isInteger(v) && v >= 0) return v;
  throw new ConfigError(`${what} must be a non-negative integer`);
}

function str(v: unknown, what: string): string {
  if (typeof v === 'string' && v !== '') return v;
  throw new ConfigError(`${what} must be a non-empty string`);
}

function parseDevice(v: unknown, i: number): Device {
  if (!isRecord(v)) throw new ConfigError(`devices[${i}] must be an object`);
  const name = str(v.name, `devices[${i}].name`);
  const p = v.priority;
  if (typeof p === 'string') return device(name, parsePriority(p));
  if (typeof p === 'number') return device(name, priorityFromRank(p));
  throw new ConfigError(`devices[${i}].priority must be a label or rank`);
}

function parseArrival(v: unknown, i: number): ForcedArrival {
  if (!isRecord(v)) throw new ConfigError(`arrivals[${i}] must be an object`);
  return { tick: int(v.tick, `arrivals[${i}].tick`), device: str(v.device, `arrivals[${i}].device`) };
}

const KNOWN_KEYS = new Set(['ticks', 'probability', 'seed', 'service', 'devices', 'arrivals', 'report', 'timeline', 'mainLogEvery']);

// Applies a parsed JSON config object on top of `base`.
export function applyConfigObject(base: SimConfig, raw: unknown): SimConfig {
  if (!isRecord(raw)) throw new ConfigError('config must be a JSON object');
  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) throw new ConfigError(`unknown config key '${key}'`);
  }
  const cfg: SimConfig = { ...base };
  if (raw.ticks !== undefined) cfg.ticks = int(raw.ticks, 'ticks');
  if (raw.probability !== undefined) {
    const p = raw.probability;
    if (typeof p !== 'number' || !(p >= 0 && p <= 1)) throw new ConfigError('probability must be a number within [0, 1]');
    cfg.probability = p;
  }
  if (raw.seed !== undefined) cfg.seed = int(raw.seed, 'seed');
  if (raw.service !== undefined) {
    if (!isRecord(raw.service)) throw new ConfigError('service must be an object');
    cfg.service = {
      min: raw.service.min === undefined ? cfg.service.min : int(raw.service.min, 'service.min'),
      max: raw.service.max === undefined ? cfg.service.max : int(raw.service.max, 'service.max'),
    };
  }
  if (raw.devices !== undefined) {
    if (!Array.isArray(raw.devices)) throw new ConfigError('devices must be an array');
    cfg.devices = raw.devices.map(parseDevice);
  }
  if (raw.arrivals !== undefined) {
    if (!Array.isArray(raw.arrivals)) throw new ConfigError('arrivals must be an array');
    cfg.arrivals = raw.arrivals.map(parseArrival);
  }
  if (raw.report !== undefined) cfg.report = str(raw.report, 'report');
  if (raw.timeline !== undefined) cfg.timeline = raw.timeline === null ? null : str(raw.timeline, 'timeline');
  if (raw.mainLogEvery !== undefined) cfg.mainLogEvery = int(raw.mainLogEvery, 'mainLogEvery');
  return cfg;
}

export function parseConfigText(base: SimConfig, text: string): SimConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`config is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return applyConfigObject(base, raw);
}

export async function loadConfigFile(base: SimConfig, file: string): Promise<SimConfig> {
  const fs = await import('node:fs');
  let text: string;
  try {
    text = await fs.promises.readFile(file, 'utf8');
  } catch (e) {
    throw new ConfigError(`cannot read config ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseConfigText(base, text);
}

// A flag that is present must parse; only an absent flag falls back.
function flagInt(opts: Record<string, string>, key: string, def: number): number {
  const raw = opts[key];
  if (raw === undefined) return def;
  const n = parseNum(raw, Number.NaN);
  if (Number.isNaN(n)) throw new ConfigError(`--${key} must be a non-negative integer, got '${raw}'`);
  return n;
}

function flagFraction(opts: Record<string, string>, key: string, def: number): number {
  const raw = opts[key];
  if (raw === undefined) return def;
  const n = parseFraction(raw, Number.NaN);
  if (!(n >= 0 && n <= 1)) throw new ConfigError(`--${key} must be a number within [0, 1], got '${raw}'`);
  return n;
}

// Forced arrivals must fall inside the run horizon.
export function checkArrivals(cfg: SimConfig): void {
  cfg.arrivals.forEach((a, i) => {
    if (a.tick >= cfg.ticks) {
      throw new ConfigError(`arrivals[${i}].tick ${a.tick} is outside the run horizon of ${cfg.ticks} ticks`);
    }
  });
}

// Flags override values from --config, which override defaults.
export async function resolveConfig(args: string[]): Promise<SimConfig> {
  const { opts } = parseFlags(args);
  let cfg = defaultConfig();
  const file = opts['config'];
  if (file !== undefined) cfg = await loadConfigFile(cfg, file);
  const resolved: SimConfig = {
    ...cfg,
    ticks: flagInt(opts, 'ticks', cfg.ticks),
    probability: flagFraction(opts, 'probability', cfg.probability),
    seed: flagInt(opts, 'seed', cfg.seed),
    service: {
      min: flagInt(opts, 'min-service', cfg.service.min),
      max: flagInt(opts, 'max-service', cfg.service.max),
    },
    report: opts['report'] ?? cfg.report,
    timeline: opts['timeline'] ?? cfg.timeline,
    mainLogEvery: flagInt(opts, 'main-log-every', cfg.mainLogEvery),
    quiet: opts['quiet'] !== undefined,
  };
  checkArrivals(resolved);
  return resolved;
}

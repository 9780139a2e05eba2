import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, Priority } from '@irqsim/core';
import { DEFAULT_REPORT, applyConfigObject, checkArrivals, defaultConfig, loadConfigFile, parseConfigText, resolveConfig } from '../src/config.js';

describe('config', () => {
  it('has the documented defaults', () => {
    const cfg = defaultConfig();
    expect(cfg.ticks).toBe(50);
    expect(cfg.probability).toBe(0.25);
    expect(cfg.seed).toBe(1);
    expect(cfg.service).toEqual({ min: 2, max: 4 });
    expect(cfg.devices.map(d => d.name)).toEqual(['Teclado', 'Impressora', 'Disco']);
    expect(cfg.report).toBe(DEFAULT_REPORT);
    expect(cfg.timeline).toBeNull();
  });

  it('applies every supported key', () => {
    const cfg = applyConfigObject(defaultConfig(), {
      ticks: 20,
      probability: 0.5,
      seed: 8,
      service: { max: 6 },
      devices: [{ name: 'Rede', priority: 'high' }, { name: 'Mouse', priority: 3 }],
      arrivals: [{ tick: 4, device: 'Rede' }],
      report: 'out/r.txt',
      timeline: 'out/t.png',
      mainLogEvery: 2,
    });
    expect(cfg.ticks).toBe(20);
    expect(cfg.probability).toBe(0.5);
    expect(cfg.seed).toBe(8);
    expect(cfg.service).toEqual({ min: 2, max: 6 });
    expect(cfg.devices).toEqual([{ name: 'Rede', priority: Priority.High }, { name: 'Mouse', priority: Priority.Low }]);
    expect(cfg.arrivals).toEqual([{ tick: 4, device: 'Rede' }]);
    expect(cfg.report).toBe('out/r.txt');
    expect(cfg.timeline).toBe('out/t.png');
    expect(cfg.mainLogEvery).toBe(2);
  });

  it('rejects unknown keys and ill-typed values', () => {
    expect(() => applyConfigObject(defaultConfig(), { tick: 3 })).toThrow(/unknown config key 'tick'/);
    expect(() => applyConfigObject(defaultConfig(), { probability: 2 })).toThrow(ConfigError);
    expect(() => applyConfigObject(defaultConfig(), { ticks: -1 })).toThrow(ConfigError);
    expect(() => applyConfigObject(defaultConfig(), { devices: [{ name: 'X' }] })).toThrow(ConfigError);
    expect(() => applyConfigObject(defaultConfig(), [])).toThrow(ConfigError);
    expect(() => parseConfigText(defaultConfig(), '{ nope')).toThrow(/not valid JSON/);
  });

  it('loads a file and lets flags override it', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'irqsim-config-'));
    const file = join(dir, 'sim.json');
    writeFileSync(file, JSON.stringify({ ticks: 30, seed: 4, arrivals: [{ tick: 2, device: 'Disco' }] }));
    expect((await loadConfigFile(defaultConfig(), file)).ticks).toBe(30);
    const cfg = await resolveConfig(['--config', file, '--seed', '0x10', '--probability', '0.3', '--quiet']);
    expect(cfg.ticks).toBe(30);
    expect(cfg.seed).toBe(16);
    expect(cfg.probability).toBe(0.3);
    expect(cfg.quiet).toBe(true);
    expect(cfg.arrivals).toEqual([{ tick: 2, device: 'Disco' }]);
  });

  it('rejects flag values that do not parse', async () => {
    await expect(resolveConfig(['--ticks', 'abc'])).rejects.toThrow("--ticks must be a non-negative integer, got 'abc'");
    await expect(resolveConfig(['--seed', '-3'])).rejects.toBeInstanceOf(ConfigError);
    await expect(resolveConfig(['--probability', 'x'])).rejects.toBeInstanceOf(ConfigError);
    await expect(resolveConfig(['--probability', '1.5'])).rejects.toBeInstanceOf(ConfigError);
    await expect(resolveConfig(['--min-service', '2.5'])).rejects.toBeInstanceOf(ConfigError);
    expect((await resolveConfig(['--ticks', '12'])).ticks).toBe(12);
  });

  it('rejects arrivals outside the run horizon', async () => {
    expect(() => checkArrivals({ ...defaultConfig(), ticks: 5, arrivals: [{ tick: 9, device: 'Disco' }] }))
      .toThrow('arrivals[0].tick 9 is outside the run horizon of 5 ticks');
    const dir = mkdtempSync(join(tmpdir(), 'irqsim-config-'));
    const file = join(dir, 'late.json');
    writeFileSync(file, JSON.stringify({ ticks: 30, arrivals: [{ tick: 20, device: 'Disco' }] }));
    await expect(resolveConfig(['--config', file, '--ticks', '10'])).rejects.toBeInstanceOf(ConfigError);
    expect((await resolveConfig(['--config', file])).arrivals).toEqual([{ tick: 20, device: 'Disco' }]);
  });

  it('reports a missing config file', async () => {
    const err = await loadConfigFile(defaultConfig(), join(tmpdir(), 'irqsim-does-not-exist.json')).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConfigError);
  });
});

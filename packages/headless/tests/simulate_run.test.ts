import { describe, it, expect } from 'vitest';
import { ConfigError } from '@irqsim/core';
import { defaultConfig, type SimConfig } from '../src/config.js';
import { logFingerprint } from '../src/lib.js';
import { runSimulation } from '../src/simulate.js';

const fixedDate = new Date(2024, 5, 1, 12, 0, 0);

describe('runSimulation', () => {
  it('brackets the log with start and end lines', () => {
    const cfg: SimConfig = { ...defaultConfig(), ticks: 10, probability: 0 };
    const result = runSimulation(cfg, { now: fixedDate });
    expect(result.lines[0]).toBe('[Tick 00] - [INIT] Simulation started.');
    expect(result.lines[1]).toBe('[Tick 00] - [ ] Main process executing (PC=0)');
    expect(result.lines[2]).toBe('[Tick 05] - [ ] Main process executing (PC=5)');
    expect(result.lines[3]).toBe('[Tick 10] - [END] Simulation finished.');
    expect(result.lines).toHaveLength(4);
    expect(result.run.finalProgramCounter).toBe(10);
    expect(result.fingerprint).toBe(logFingerprint(result.lines));
    expect(result.report).toContain('Date/Time: 01/06/2024 12:00:00');
  });

  it('applies scheduled arrivals from the config', () => {
    const cfg: SimConfig = { ...defaultConfig(), ticks: 6, probability: 0, arrivals: [{ tick: 2, device: 'Teclado' }] };
    const result = runSimulation(cfg, { now: fixedDate });
    expect(result.run.stats.perDevice).toEqual({ Teclado: 1, Impressora: 0, Disco: 0 });
    expect(result.lines).toContain('[Tick 02] - [+] Interrupt from Teclado added to the queue.');
  });

  it('refuses a config arrival past the horizon before running', () => {
    const cfg: SimConfig = { ...defaultConfig(), ticks: 5, probability: 0, arrivals: [{ tick: 9, device: 'Disco' }] };
    expect(() => runSimulation(cfg, { now: fixedDate })).toThrow(ConfigError);
  });

  it('gives the same fingerprint for the same seed', () => {
    const cfg: SimConfig = { ...defaultConfig(), ticks: 60, seed: 11 };
    const a = runSimulation(cfg, { now: fixedDate });
    const b = runSimulation(cfg, { now: fixedDate });
    expect(a.fingerprint).toBe(b.fingerprint);
    expect(a.report).toBe(b.report);
  });

  it('echoes lines as the run proceeds', () => {
    const echoed: string[] = [];
    const cfg: SimConfig = { ...defaultConfig(), ticks: 3, probability: 0 };
    const result = runSimulation(cfg, { now: fixedDate, echo: line => echoed.push(line) });
    expect(echoed).toEqual(result.lines);
  });
});

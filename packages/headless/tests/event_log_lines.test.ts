import { describe, it, expect } from 'vitest';
import { ScriptedRandom, SimulationDriver } from '@irqsim/core';
import { EventLog, tickPrefix } from '../src/event_log.js';

function forcedRun(log: EventLog) {
  const driver = new SimulationDriver({ ticks: 10, arrivalProbability: 0, random: new ScriptedRandom({ ints: [2, 2] }), sink: log });
  driver.scheduleArrival(1, 'Disco');
  driver.scheduleArrival(1, 'Teclado');
  driver.scheduleArrival(1, 'Teclado');
  return driver.run();
}

describe('EventLog', () => {
  it('pads the tick to two digits', () => {
    expect(tickPrefix(5)).toBe('[Tick 05] - ');
    expect(tickPrefix(123)).toBe('[Tick 123] - ');
  });

  it('renders a simultaneous arrival scenario line by line', () => {
    const log = new EventLog();
    forcedRun(log);
    expect(log.lines).toEqual([
      '[Tick 00] - [ ] Main process executing (PC=0)',
      '[Tick 01] - [!] MULTIPLE INTERRUPTS simultaneous: Disco, Teclado (priority test)',
      '[Tick 01] - [x] Duplicate interrupt from Teclado rejected.',
      '[Tick 01] - [*] Interrupt: Teclado (Priority: High) - Latency: 0u',
      "[Tick 01] -     -> Saving context: PC=1, Status='saved'",
      '[Tick 01] -     -> Service started (2 ticks estimated)',
      '[Tick 02] - [>] Continuing service of Teclado (2 ticks remaining)',
      '[Tick 03] - [>] Continuing service of Teclado (1 ticks remaining)',
      '[Tick 03] - [OK] Interrupt handled. Restoring context (PC=1).',
      '[Tick 03] - [<] Main process resumed (next instruction: 2)',
      '[Tick 04] - [*] Interrupt: Disco (Priority: Low) - Latency: 3u',
      "[Tick 04] -     -> Saving context: PC=1, Status='saved'",
      '[Tick 04] -     -> Service started (2 ticks estimated)',
      '[Tick 05] - [>] Continuing service of Disco (2 ticks remaining)',
      '[Tick 06] - [>] Continuing service of Disco (1 ticks remaining)',
      '[Tick 06] - [OK] Interrupt handled. Restoring context (PC=1).',
      '[Tick 06] - [<] Main process resumed (next instruction: 2)',
    ]);
  });

  it('logs every main-process tick when asked to', () => {
    const log = new EventLog({ mainLogEvery: 1 });
    forcedRun(log);
    expect(log.lines.filter(l => l.includes('[ ]'))).toEqual([
      '[Tick 00] - [ ] Main process executing (PC=0)',
      '[Tick 07] - [ ] Main process executing (PC=1)',
      '[Tick 08] - [ ] Main process executing (PC=2)',
      '[Tick 09] - [ ] Main process executing (PC=3)',
    ]);
  });

  it('notes a single arrival that waits in the queue', () => {
    const log = new EventLog();
    const driver = new SimulationDriver({ ticks: 1, arrivalProbability: 0, random: new ScriptedRandom({ ints: [2] }), sink: log });
    driver.scheduleArrival(0, 'Impressora');
    driver.run();
    expect(log.lines[0]).toBe('[Tick 00] - [+] Interrupt from Impressora added to the queue.');
  });

  it('echoes each line as it is recorded', () => {
    const echoed: string[] = [];
    const log = new EventLog({ echo: line => echoed.push(line) });
    log.note(3, '[INIT] Simulation started.');
    expect(echoed).toEqual(['[Tick 03] - [INIT] Simulation started.']);
    expect(log.lines).toEqual(echoed);
  });

  it('rejects a non-positive main log interval', () => {
    expect(() => new EventLog({ mainLogEvery: 0 })).toThrow(RangeError);
  });
});

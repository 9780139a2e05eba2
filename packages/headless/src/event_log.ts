import type { EventSink, TickOutcome, TransitionEvent, ArrivalsEvent } from '@irqsim/core';

export const LEGEND: readonly (readonly [string, string])[] = [
  ['[!]', 'Multiple simultaneous interrupts (priority test)'],
  ['[+]', 'Interrupt added to the waiting queue'],
  ['[x]', 'Duplicate interrupt rejected'],
  ['[*]', 'Interrupt being serviced'],
  ['[>]', 'Service continuing'],
  ['[OK]', 'Interrupt finished'],
  ['[<]', 'Main process resumed'],
  ['[ ]', 'Normal execution (main process)'],
];

export function tickPrefix(tick: number): string {
  return `[Tick ${String(tick).padStart(2, '0')}] - `;
}

export type EventLogOptions = {
  // Log a main-process line on the 1st, (n+1)th, (2n+1)th ... main-process tick.
  mainLogEvery?: number;
  echo?: (line: string) => void;
};

// Renders tick outcomes to log lines. Used as the driver's event sink.
export class EventLog implements EventSink {
  readonly lines: string[] = [];
  private readonly mainLogEvery: number;
  private readonly echo: ((line: string) => void) | undefined;
  private mainTicks = 0;

  constructor(opts: EventLogOptions = {}) {
    const every = opts.mainLogEvery ?? 5;
    if (!Number.isInteger(every) || every < 1) throw new RangeError(`mainLogEvery must be a positive integer, got ${every}`);
    this.mainLogEvery = every;
    this.echo = opts.echo;
  }

  note(tick: number, text: string): void {
    const line = tickPrefix(tick) + text;
    this.lines.push(line);
    if (this.echo) this.echo(line);
  }

  record(outcome: TickOutcome): void {
    if (outcome.arrivals) this.arrivals(outcome.arrivals);
    this.transition(outcome.transition);
  }

  private arrivals(a: ArrivalsEvent): void {
    if (a.simultaneous) {
      this.note(a.tick, `[!] MULTIPLE INTERRUPTS simultaneous: ${a.admitted.join(', ')} (priority test)`);
    } else if (a.queued) {
      this.note(a.tick, `[+] Interrupt from ${a.admitted.join('')} added to the queue.`);
    }
    for (const name of a.rejected) {
      this.note(a.tick, `[x] Duplicate interrupt from ${name} rejected.`);
    }
  }

  private transition(t: TransitionEvent): void {
    switch (t.kind) {
      case 'service-continue':
        this.note(t.tick, `[>] Continuing service of ${t.device} (${t.remainingBefore} ticks remaining)`);
        return;
      case 'service-complete':
        this.note(t.tick, `[>] Continuing service of ${t.device} (1 ticks remaining)`);
        this.note(t.tick, `[OK] Interrupt handled. Restoring context (PC=${t.restored.programCounter}).`);
        this.note(t.tick, `[<] Main process resumed (next instruction: ${t.resumeAt})`);
        return;
      case 'service-start':
        this.note(t.tick, `[*] Interrupt: ${t.device} (Priority: ${t.priority}) - Latency: ${t.latency}u`);
        this.note(t.tick, `    -> Saving context: PC=${t.savedProgramCounter}, Status='saved'`);
        this.note(t.tick, `    -> Service started (${t.duration} ticks estimated)`);
        return;
      case 'main-process':
        if (this.mainTicks % this.mainLogEvery === 0) {
          this.note(t.tick, `[ ] Main process executing (PC=${t.programCounter})`);
        }
        this.mainTicks++;
        return;
    }
  }
}

import type { DeviceRegistry } from '../devices/registry.js';
import type { TickOutcome } from '../irq/scheduler.js';

export type RunStatistics = {
  totalServiced: number;
  perDevice: Record<string, number>;
  serviceTicksTotal: number;
  mainProcessTicks: number;
  simultaneousArrivals: number;
  rejectedAdmissions: number;
  totalLatency: number;
  maxLatency: number;
  pendingAtEnd: number;
};

export function averageLatency(stats: RunStatistics): number {
  return stats.totalServiced === 0 ? 0 : stats.totalLatency / stats.totalServiced;
}

export class StatsAccumulator {
  private readonly stats: RunStatistics;

  constructor(registry: DeviceRegistry) {
    const perDevice: Record<string, number> = {};
    for (const d of registry.list()) perDevice[d.name] = 0;
    this.stats = {
      totalServiced: 0,
      perDevice,
      serviceTicksTotal: 0,
      mainProcessTicks: 0,
      simultaneousArrivals: 0,
      rejectedAdmissions: 0,
      totalLatency: 0,
      maxLatency: 0,
      pendingAtEnd: 0,
    };
  }

  record(outcome: TickOutcome): void {
    const s = this.stats;
    const a = outcome.arrivals;
    if (a) {
      if (a.simultaneous) s.simultaneousArrivals++;
      s.rejectedAdmissions += a.rejected.length;
    }
    const t = outcome.transition;
    switch (t.kind) {
      case 'service-start':
        s.totalServiced++;
        s.perDevice[t.device] = (s.perDevice[t.device] ?? 0) + 1;
        s.serviceTicksTotal += t.duration;
        s.totalLatency += t.latency;
        if (t.latency > s.maxLatency) s.maxLatency = t.latency;
        break;
      case 'main-process':
        s.mainProcessTicks++;
        break;
      case 'service-continue':
      case 'service-complete':
        break;
    }
  }

  finish(pendingAtEnd: number): RunStatistics {
    return { ...this.stats, perDevice: { ...this.stats.perDevice }, pendingAtEnd };
  }
}

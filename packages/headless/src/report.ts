import { CollaboratorError, averageLatency, type DeviceRegistry, type RunStatistics } from '@irqsim/core';
import { LEGEND } from './event_log.js';

export type ReportInput = {
  lines: readonly string[];
  stats: RunStatistics;
  registry: DeviceRegistry;
  ticks: number;
  probability: number;
  seed: number;
  generatedAt: Date;
};

const RULE = '='.repeat(80);
const THIN = '-'.repeat(80);

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

// dd/mm/yyyy HH:MM:SS in local time
export function formatTimestamp(d: Date): string {
  return `${pad2(d.getDate())}/${pad2(d.getMonth() + 1)}/${d.getFullYear()} ${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

export function renderReport(input: ReportInput): string {
  const { stats, registry } = input;
  const out: string[] = [];
  out.push(RULE);
  out.push('INTERRUPT-DRIVEN I/O MANAGEMENT SIMULATION');
  out.push(RULE);
  out.push(`Date/Time: ${formatTimestamp(input.generatedAt)}`);
  out.push(`Simulation length: ${input.ticks} time units`);
  out.push(`Interrupt probability: ${Math.round(input.probability * 100)}%`);
  out.push(`Seed: ${input.seed}`);
  out.push(RULE);
  out.push('');
  out.push('LEGEND:');
  for (const [marker, text] of LEGEND) out.push(`  ${marker} = ${text}`);
  out.push(RULE);
  out.push('');
  out.push('EVENT LOG:');
  out.push(THIN);
  out.push(...input.lines);
  out.push('');
  out.push(RULE);
  out.push('STATISTICS:');
  out.push(THIN);
  out.push(`Total interrupts: ${stats.totalServiced}`);
  const labels = registry.list().map(d => `${d.name} (${d.priority.label} priority):`);
  const width = Math.max(0, ...labels.map(l => l.length));
  registry.list().forEach((d, i) => {
    const label = labels[i] ?? d.name;
    out.push(`  - ${label.padEnd(width)} ${String(stats.perDevice[d.name] ?? 0).padStart(3)}`);
  });
  out.push('');
  out.push(`Total service time: ${stats.serviceTicksTotal} units`);
  out.push(`Main process ticks: ${stats.mainProcessTicks}`);
  out.push(`Simultaneous interrupt cases: ${stats.simultaneousArrivals}`);
  out.push(`Rejected duplicate admissions: ${stats.rejectedAdmissions}`);
  out.push(`Average latency: ${averageLatency(stats).toFixed(2)} units (max ${stats.maxLatency})`);
  out.push(`Pending at end: ${stats.pendingAtEnd}`);
  out.push(RULE);
  return out.join('\n') + '\n';
}

export async function writeReport(filePath: string, text: string): Promise<void> {
  const [fs, pathMod] = await Promise.all([import('node:fs'), import('node:path')]);
  try {
    await fs.promises.mkdir(pathMod.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, text, 'utf8');
  } catch (e) {
    throw new CollaboratorError('ReportWriteFailed', `could not write ${filePath}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

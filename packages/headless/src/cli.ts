#!/usr/bin/env tsx
import { resolveConfig } from './config.js';
import { writeReport } from './report.js';
import { runSimulation } from './simulate.js';
import { renderTimeline, writeTimeline } from './timeline.js';

function printUsage() {
  console.log(`Usage:
  irqsim run [--ticks N] [--probability P] [--seed S] [--min-service N] [--max-service N]
             [--report path.txt] [--timeline path.png] [--config file.json] [--main-log-every N] [--quiet]
  irqsim help

Examples:
  irqsim run
  irqsim run --ticks 60 --probability 0.3 --seed 7 --timeline tmp/timeline.png
  irqsim run --config scenarios/simultaneous.json --report tmp/report.txt
`);
}

async function runRun(args: string[]) {
  const cfg = await resolveConfig(args);
  const result = runSimulation(cfg, {
    echo: cfg.quiet ? undefined : (line) => console.log(line),
  });

  await writeReport(cfg.report, result.report);
  // eslint-disable-next-line no-console
  console.log(`[report] wrote ${cfg.report}`);
  if (cfg.timeline) {
    await writeTimeline(cfg.timeline, renderTimeline(result.run.outcomes, result.registry));
    // eslint-disable-next-line no-console
    console.log(`[timeline] wrote ${cfg.timeline}`);
  }

  const { stats } = result.run;
  console.log(JSON.stringify({
    command: 'run',
    cfg: { ticks: cfg.ticks, probability: cfg.probability, seed: cfg.seed, service: cfg.service, devices: result.registry.list().map(d => ({ name: d.name, priority: d.priority.label })) },
    stats,
    finalProgramCounter: result.run.finalProgramCounter,
    finalQueue: result.run.finalQueue.length ? result.run.finalQueue : undefined,
    warnings: result.run.warnings.length ? result.run.warnings : undefined,
    crc32: result.fingerprint,
    report: cfg.report,
    timeline: cfg.timeline,
  }, null, 2));
}

async function main() {
  const argv = process.argv.slice(2);
  const cmd = argv[0];
  if (!cmd || cmd === 'help' || cmd === '-h' || cmd === '--help') {
    printUsage();
    return;
  }
  if (cmd === 'run') {
    await runRun(argv.slice(1));
    return;
  }
  printUsage();
  process.exitCode = 1;
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

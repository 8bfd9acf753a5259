/**
 * `stepwise run <plan>`: run a plan to completion and print the schedule.
 */

import { Command } from 'commander';
import { runScheduler } from '../../scheduler/driver.js';
import { formatReport, formatStep } from '../format.js';
import {
  createEngine,
  parseNonNegativeInt,
  parsePositiveInt,
  parseValueFunction,
  type EngineCliOptions,
} from '../setup.js';

interface RunOptions extends EngineCliOptions {
  json?: boolean;
  quiet?: boolean;
}

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run a task plan until every task completes or no task can start')
    .argument('<plan>', 'Plan file (YAML or JSON)')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-c, --capacity <workers>', 'Total worker capacity', parseNonNegativeInt)
    .option('--value <function>', 'Packing value: priority | rate', parseValueFunction)
    .option('--max-steps <n>', 'Stop after this many steps', parsePositiveInt)
    .option('-q, --quiet', 'Only print the final report')
    .option('--json', 'Output the final report as JSON')
    .option('-v, --verbose', 'Log to the terminal')
    .action(async (plan: string, options: RunOptions) => {
      await executeRun(plan, options);
    });

  return cmd;
}

async function executeRun(planPath: string, options: RunOptions): Promise<void> {
  const { engine, config } = createEngine(planPath, options);
  const printSteps = !options.json && !options.quiet;

  const summary = await runScheduler(engine, {
    maxSteps: config.scheduler.maxSteps,
    stopWhenStalled: config.scheduler.stopWhenStalled,
    onStep: (result, eng) => {
      if (printSteps) {
        console.log(formatStep(result, eng.inProgressEntries()));
        console.log();
      }
    },
  });

  if (options.json) {
    console.log(JSON.stringify({ reason: summary.reason, steps: summary.steps, ...summary.report }, null, 2));
    return;
  }

  console.log(formatReport(summary.report));
  if (summary.reason !== 'terminal') {
    console.log(`\nStopped: ${summary.reason}`);
    process.exitCode = 2;
  }
}

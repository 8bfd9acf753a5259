/**
 * `stepwise interactive <plan>`: step through a plan and edit the task set
 * between steps.
 */

import { Command } from 'commander';
import { createInterface } from 'readline/promises';
import { runScheduler } from '../../scheduler/driver.js';
import { OPERATOR_HELP } from '../command-parser.js';
import { formatReport, formatStep } from '../format.js';
import { OperatorCommandSource } from '../operator-source.js';
import { createEngine, parseNonNegativeInt, parseValueFunction, type EngineCliOptions } from '../setup.js';

export function createInteractiveCommand(): Command {
  const cmd = new Command('interactive');

  cmd
    .alias('i')
    .description('Step through a plan, adding, modifying or removing tasks between steps')
    .argument('<plan>', 'Plan file (YAML or JSON)')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-c, --capacity <workers>', 'Total worker capacity', parseNonNegativeInt)
    .option('--value <function>', 'Packing value: priority | rate', parseValueFunction)
    .option('-v, --verbose', 'Log to the terminal')
    .action(async (plan: string, options: EngineCliOptions) => {
      await startInteractive(plan, options);
    });

  return cmd;
}

async function startInteractive(planPath: string, options: EngineCliOptions): Promise<void> {
  if (!process.stdin.isTTY) {
    console.error('Error: stepwise interactive requires an interactive terminal (TTY)');
    process.exit(1);
  }

  const { engine, config } = createEngine(planPath, options);
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  console.log(`Capacity ${engine.getTotalCapacity()} | value ${engine.getValueFunction()} | ${engine.listTasks().length} tasks`);
  console.log(OPERATOR_HELP);
  console.log();

  try {
    const summary = await runScheduler(engine, {
      source: new OperatorCommandSource({
        ask: (prompt) => rl.question(prompt),
        print: (line) => console.log(line),
      }),
      maxSteps: config.scheduler.maxSteps,
      // the operator decides when a stalled run is over
      stopWhenStalled: false,
      onStep: (result, eng) => {
        console.log(formatStep(result, eng.inProgressEntries()));
        if (result.status === 'stalled') {
          console.log('  No task can start; add or change tasks, or exit.');
        }
      },
      onMutation: (outcome) => {
        console.log(outcome.ok ? `✓ ${describe(outcome.command.type)}` : `✗ ${outcome.error.message}`);
      },
    });

    console.log();
    console.log(formatReport(summary.report));
  } finally {
    rl.close();
  }
}

function describe(type: 'add' | 'modify' | 'remove'): string {
  return { add: 'Task added', modify: 'Task updated', remove: 'Task removed' }[type];
}

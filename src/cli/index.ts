/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createRunCommand } from './commands/run.js';
import { createInteractiveCommand } from './commands/interactive.js';
import { createCheckCommand } from './commands/check.js';
import { createInitCommand } from './commands/init.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('stepwise: incremental, capacity-bounded task scheduler');

  program.addCommand(createRunCommand());
  program.addCommand(createInteractiveCommand());
  program.addCommand(createCheckCommand());
  program.addCommand(createInitCommand());

  return program;
}

export async function main(): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}

/**
 * CommandSource that asks an operator for add / mod / del commands
 * between steps. Input and output are injected so the loop can run on a
 * terminal or from a script.
 */

import type { CommandSource } from '../scheduler/driver.js';
import type { SchedulerCommand } from '../scheduler/types.js';
import { OPERATOR_HELP, parseOperatorInput } from './command-parser.js';

export interface OperatorIO {
  ask(prompt: string): Promise<string>;
  print(line: string): void;
}

export class OperatorCommandSource implements CommandSource {
  constructor(private readonly io: OperatorIO) {}

  async next(): Promise<SchedulerCommand[] | null> {
    const commands: SchedulerCommand[] = [];

    for (;;) {
      const input = parseOperatorInput(await this.io.ask('> '));

      switch (input.kind) {
        case 'continue':
          return commands;
        case 'exit':
          return null;
        case 'help':
          this.io.print(OPERATOR_HELP);
          break;
        case 'error':
          this.io.print(`✗ ${input.message}`);
          break;
        case 'command':
          commands.push(input.command);
          break;
      }
    }
  }
}

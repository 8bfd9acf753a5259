/**
 * `stepwise init`: write a default .stepwise.yaml into the project.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';

export function createInitCommand(): Command {
  const cmd = new Command('init');

  cmd
    .description('Create a default .stepwise.yaml in the project directory')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((options: { dir: string }) => {
      const path = new ConfigManager(resolve(options.dir)).createDefaultConfig();
      console.log(`Config: ${path}`);
    });

  return cmd;
}

/**
 * `stepwise check <plan>`: report tasks that can never start.
 */

import { Command } from 'commander';
import { formatDiagnostics, hasDiagnostics } from '../format.js';
import { createEngine, parseNonNegativeInt, type EngineCliOptions } from '../setup.js';

interface CheckOptions extends EngineCliOptions {
  json?: boolean;
}

export function createCheckCommand(): Command {
  const cmd = new Command('check');

  cmd
    .description('Check a plan for capacity violations, missing dependencies and cycles')
    .argument('<plan>', 'Plan file (YAML or JSON)')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-c, --capacity <workers>', 'Total worker capacity', parseNonNegativeInt)
    .option('--json', 'Output diagnostics as JSON')
    .action((plan: string, options: CheckOptions) => {
      const { engine } = createEngine(plan, options);
      const diagnostics = engine.diagnose();

      if (options.json) {
        console.log(JSON.stringify(diagnostics, null, 2));
      } else if (hasDiagnostics(diagnostics)) {
        console.log(formatDiagnostics(diagnostics).join('\n'));
      } else {
        console.log(`✓ ${engine.listTasks().length} tasks, capacity ${engine.getTotalCapacity()}: no problems found`);
      }

      if (hasDiagnostics(diagnostics)) {
        process.exitCode = 1;
      }
    });

  return cmd;
}

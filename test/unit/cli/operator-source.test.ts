import { describe, it, expect } from 'vitest';
import { OperatorCommandSource } from '../../../src/cli/operator-source.js';
import { OPERATOR_HELP } from '../../../src/cli/command-parser.js';
import { SchedulerEngine } from '../../../src/scheduler/engine.js';
import { runScheduler } from '../../../src/scheduler/driver.js';

function scriptedIO(lines: string[]) {
  const printed: string[] = [];
  const io = {
    ask: async (): Promise<string> => lines.shift() ?? 'exit',
    print: (line: string): void => {
      printed.push(line);
    },
  };
  return { io, printed };
}

describe('OperatorCommandSource', () => {
  it('collects commands until continue', async () => {
    const { io, printed } = scriptedIO(['add G duration=1 workers=1', 'bogus', 'help', 'del A', '']);
    const source = new OperatorCommandSource(io);
    const commands = await source.next();

    expect(commands).toEqual([
      { type: 'add', task: { id: 'G', duration: 1, workersRequired: 1 } },
      { type: 'remove', id: 'A' },
    ]);
    expect(printed).toEqual(['✗ Unknown command "bogus". Type help for available commands.', OPERATOR_HELP]);
  });

  it('returns null on exit', async () => {
    const { io } = scriptedIO(['exit']);
    expect(await new OperatorCommandSource(io).next()).toBeNull();
  });

  it('drives a run with operator edits', async () => {
    const engine = new SchedulerEngine({
      totalCapacity: 2,
      tasks: { A: { duration: 1, workersRequired: 1 } },
    });
    const { io } = scriptedIO(['add B duration=2 workers=2 deps=A', 'continue', '', '']);

    const summary = await runScheduler(engine, { source: new OperatorCommandSource(io) });

    expect(summary.reason).toBe('terminal');
    expect(summary.report.completionTimes).toEqual({ A: 1, B: 3 });
  });
});

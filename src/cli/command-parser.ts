/**
 * Parses operator lines typed between steps:
 *
 *   add <id> duration=<n> workers=<n> [priority=<n>] [deadline=<n>] [deps=a,b]
 *   mod <id> key=value ...
 *   del <id>
 *   continue | exit | help
 */

import type { SchedulerCommand, TaskInput, TaskPatch } from '../scheduler/types.js';

export type OperatorInput =
  | { kind: 'continue' }
  | { kind: 'exit' }
  | { kind: 'help' }
  | { kind: 'command'; command: SchedulerCommand }
  | { kind: 'error'; message: string };

export const OPERATOR_HELP = [
  'Commands:',
  '  <enter> | continue                 run the next step',
  '  add <id> duration=N workers=N [priority=N] [deadline=N] [deps=a,b]',
  '  mod <id> [duration=N] [workers=N] [priority=N] [deadline=N] [deps=a,b]',
  '  del <id>                           remove a task that is not running',
  '  exit                               stop the run',
].join('\n');

const KEY_ALIASES: Record<string, keyof TaskPatch> = {
  duration: 'duration',
  workers: 'workersRequired',
  workersrequired: 'workersRequired',
  priority: 'priority',
  deadline: 'deadline',
  deps: 'dependencies',
  dependencies: 'dependencies',
};

export function parseOperatorInput(line: string): OperatorInput {
  const [verb = '', ...args] = line.trim().split(/\s+/).filter(Boolean);

  switch (verb.toLowerCase()) {
    case '':
    case 'c':
    case 'continue':
      return { kind: 'continue' };
    case 'exit':
    case 'quit':
    case 'q':
      return { kind: 'exit' };
    case 'help':
    case '?':
      return { kind: 'help' };
    case 'add':
      return parseAdd(args);
    case 'mod':
    case 'modify':
      return parseModify(args);
    case 'del':
    case 'rm':
    case 'remove':
      return args.length === 1
        ? { kind: 'command', command: { type: 'remove', id: args[0] } }
        : { kind: 'error', message: 'Usage: del <id>' };
    default:
      return { kind: 'error', message: `Unknown command "${verb}". Type help for available commands.` };
  }
}

function parseAdd(args: string[]): OperatorInput {
  const [id, ...pairs] = args;
  if (!id || id.includes('=')) return { kind: 'error', message: 'Usage: add <id> duration=N workers=N ...' };

  const parsed = parseAttributes(pairs);
  if (typeof parsed === 'string') return { kind: 'error', message: parsed };

  const { duration, workersRequired, ...rest } = parsed;
  if (duration === undefined || workersRequired === undefined) {
    return { kind: 'error', message: 'add requires duration=N and workers=N' };
  }

  const task: TaskInput = { id, duration, workersRequired, ...rest };
  return { kind: 'command', command: { type: 'add', task } };
}

function parseModify(args: string[]): OperatorInput {
  const [id, ...pairs] = args;
  if (!id || id.includes('=')) return { kind: 'error', message: 'Usage: mod <id> key=value ...' };
  if (pairs.length === 0) return { kind: 'error', message: 'mod needs at least one key=value change' };

  const parsed = parseAttributes(pairs);
  if (typeof parsed === 'string') return { kind: 'error', message: parsed };
  return { kind: 'command', command: { type: 'modify', id, changes: parsed } };
}

/** Returns the attributes, or an error message */
function parseAttributes(pairs: string[]): TaskPatch | string {
  const patch: TaskPatch = {};

  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) return `Expected key=value, got "${pair}"`;

    const rawKey = pair.slice(0, eq).toLowerCase();
    const value = pair.slice(eq + 1);
    const key = KEY_ALIASES[rawKey];
    if (!key) return `Unknown attribute "${rawKey}"`;

    if (key === 'dependencies') {
      patch.dependencies = value.split(',').map((d) => d.trim()).filter(Boolean);
      continue;
    }

    const num = Number(value);
    if (value === '' || !Number.isFinite(num)) return `${rawKey} must be a number, got "${value}"`;
    patch[key] = num;
  }

  return patch;
}

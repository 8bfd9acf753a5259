import { describe, it, expect } from 'vitest';
import { parseOperatorInput } from '../../../src/cli/command-parser.js';

describe('parseOperatorInput', () => {
  it('treats an empty line as continue', () => {
    expect(parseOperatorInput('')).toEqual({ kind: 'continue' });
    expect(parseOperatorInput('   ')).toEqual({ kind: 'continue' });
    expect(parseOperatorInput('continue')).toEqual({ kind: 'continue' });
  });

  it('recognises exit and help', () => {
    expect(parseOperatorInput('EXIT')).toEqual({ kind: 'exit' });
    expect(parseOperatorInput('q')).toEqual({ kind: 'exit' });
    expect(parseOperatorInput('help')).toEqual({ kind: 'help' });
  });

  it('parses add with all attributes', () => {
    expect(parseOperatorInput('add G duration=3 workers=2 priority=5 deadline=14 deps=D,E')).toEqual({
      kind: 'command',
      command: {
        type: 'add',
        task: { id: 'G', duration: 3, workersRequired: 2, priority: 5, deadline: 14, dependencies: ['D', 'E'] },
      },
    });
  });

  it('requires duration and workers on add', () => {
    expect(parseOperatorInput('add G duration=3')).toEqual({
      kind: 'error',
      message: 'add requires duration=N and workers=N',
    });
  });

  it('parses mod with only the given attributes', () => {
    expect(parseOperatorInput('mod B workers=1 deps=')).toEqual({
      kind: 'command',
      command: { type: 'modify', id: 'B', changes: { workersRequired: 1, dependencies: [] } },
    });
  });

  it('requires at least one change on mod', () => {
    expect(parseOperatorInput('mod B').kind).toBe('error');
  });

  it('parses del', () => {
    expect(parseOperatorInput('del C')).toEqual({ kind: 'command', command: { type: 'remove', id: 'C' } });
    expect(parseOperatorInput('del')).toEqual({ kind: 'error', message: 'Usage: del <id>' });
  });

  it('reports bad numbers and unknown attributes', () => {
    expect(parseOperatorInput('mod B duration=soon')).toEqual({
      kind: 'error',
      message: 'duration must be a number, got "soon"',
    });
    expect(parseOperatorInput('mod B colour=red')).toEqual({ kind: 'error', message: 'Unknown attribute "colour"' });
    expect(parseOperatorInput('mod B duration')).toEqual({ kind: 'error', message: 'Expected key=value, got "duration"' });
  });

  it('reports unknown commands', () => {
    expect(parseOperatorInput('launch')).toEqual({
      kind: 'error',
      message: 'Unknown command "launch". Type help for available commands.',
    });
  });
});

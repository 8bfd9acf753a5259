import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseNonNegativeInt, parsePositiveInt, parseValueFunction } from '../../../src/cli/setup.js';
import { createRunCommand } from '../../../src/cli/commands/run.js';

describe('option parsers', () => {
  it('accepts zero as a non-negative integer', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(() => parseNonNegativeInt('-1')).toThrow(InvalidArgumentError);
  });

  it('rejects zero and fractions as a positive integer', () => {
    expect(parsePositiveInt('3')).toBe(3);
    expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer.');
    expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
  });

  it('accepts only known value functions', () => {
    expect(parseValueFunction('rate')).toBe('rate');
    expect(() => parseValueFunction('speed')).toThrow(InvalidArgumentError);
  });
});

describe('run command', () => {
  it('rejects --max-steps 0 while parsing options', () => {
    const cmd = createRunCommand()
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });

    expect(() => cmd.parse(['plan.yaml', '--max-steps', '0'], { from: 'user' })).toThrow(
      "error: option '--max-steps <n>' argument '0' is invalid. Expected a positive integer.",
    );
  });
});

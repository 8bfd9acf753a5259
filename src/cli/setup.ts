/**
 * Shared CLI plumbing: option parsers and engine construction from a plan
 * file plus the merged configuration.
 */

import { InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { StepwiseConfig } from '../core/types.js';
import { SchedulerEngine } from '../scheduler/engine.js';
import { loadPlan } from '../scheduler/plan-loader.js';
import type { ValueFunctionName } from '../scheduler/types.js';

export interface EngineCliOptions {
  dir: string;
  capacity?: number;
  value?: ValueFunctionName;
  maxSteps?: number;
  verbose?: boolean;
}

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parseValueFunction(value: string): ValueFunctionName {
  if (value === 'priority' || value === 'rate') return value;
  throw new InvalidArgumentError('Expected "priority" or "rate".');
}

export function createEngine(
  planPath: string,
  options: EngineCliOptions,
): { engine: SchedulerEngine; config: StepwiseConfig } {
  const configManager = new ConfigManager(resolve(options.dir));
  const config = configManager.load({
    scheduler: {
      valueFunction: options.value,
      maxSteps: options.maxSteps,
    },
    logging: { verbose: options.verbose },
  });

  setLogger(createLogger('stepwise', config.logging.verbose, config.logging.level));

  const plan = loadPlan(resolve(options.dir, planPath));
  const engine = new SchedulerEngine({
    totalCapacity: options.capacity ?? plan.totalCapacity ?? config.scheduler.totalCapacity,
    valueFunction: config.scheduler.valueFunction,
    tasks: plan.tasks,
  });

  return { engine, config };
}

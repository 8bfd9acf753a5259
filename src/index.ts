/**
 * stepwise: incremental, capacity-bounded task scheduler
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, SchedulerEngine, loadPlan, runScheduler } from 'stepwise-scheduler';
 *
 * const config = new ConfigManager(process.cwd()).load();
 * const plan = loadPlan('plan.yaml');
 * const engine = new SchedulerEngine({
 *   totalCapacity: plan.totalCapacity ?? config.scheduler.totalCapacity,
 *   valueFunction: config.scheduler.valueFunction,
 *   tasks: plan.tasks,
 * });
 * const { report } = await runScheduler(engine);
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, PROJECT_CONFIG_FILE } from './core/config.js';
export { createLogger, getLogger, setLogger, type LogLevel } from './core/logger.js';
export {
  StepwiseError,
  ConfigError,
  PlanLoadError,
  InvalidMutationError,
  type MutationRejectionReason,
} from './core/errors.js';
export {
  StepwiseConfigSchema,
  type StepwiseConfig,
  type StepwiseConfigInput,
  type SchedulerEvents,
} from './core/types.js';

// Scheduler
export * from './scheduler/index.js';

export { VERSION, NAME } from './version.js';

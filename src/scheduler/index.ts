/**
 * Scheduler Module: incremental, capacity-bounded task scheduling
 *
 * @example
 * ```typescript
 * import { SchedulerEngine } from 'stepwise-scheduler';
 *
 * const engine = new SchedulerEngine({
 *   totalCapacity: 3,
 *   tasks: {
 *     A: { duration: 2, workersRequired: 1 },
 *     B: { duration: 3, workersRequired: 2, dependencies: ['A'] },
 *   },
 * });
 *
 * let result = engine.step();
 * while (!result.isTerminal) result = engine.step();
 * ```
 */

export { SchedulerEngine, type SchedulerEngineOptions } from './engine.js';
export { TaskRegistry, TaskInputSchema, TaskPatchSchema, toTaskInputs } from './task-registry.js';
export { resolveReadyTasks } from './readiness.js';
export { packTasks, VALUE_FUNCTIONS } from './capacity-packer.js';
export { EventTimeline, type TimelineEvent } from './event-timeline.js';
export { checkDeadlines, classifyDeadline, evaluateDeadlines, finishTimesFromLog } from './deadline-tracker.js';
export {
  diagnose,
  findBlockedTasks,
  findCapacityViolations,
  findDependencyCycles,
  type DiagnosticsInput,
} from './diagnostics.js';
export {
  runScheduler,
  QueueCommandSource,
  type CommandSource,
  type CommandContext,
  type DriverOptions,
  type RunSummary,
  type StopReason,
} from './driver.js';
export { loadPlan, parsePlan, PlanSchema, type Plan } from './plan-loader.js';
export type {
  Task,
  TaskInput,
  TaskAttributes,
  TaskPatch,
  TaskState,
  InProgressEntry,
  ValueFunction,
  ValueFunctionName,
  SchedulerCommand,
  MutationResult,
  RunStatus,
  ScheduleRecord,
  DeadlineStatus,
  DeadlineCheck,
  StepResult,
  MissingDependency,
  CapacityViolation,
  SchedulerDiagnostics,
  ScheduleReport,
} from './types.js';

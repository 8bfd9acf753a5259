/**
 * Scheduler types: task definitions, mutation commands, step results,
 * schedule log records and deadline statuses.
 */

import type { InvalidMutationError } from '../core/errors.js';

// ===== Tasks =====

export interface Task {
  id: string;
  /** Time units needed once started */
  duration: number;
  /** Ids that must be completed before this task may start */
  dependencies: string[];
  /** Capacity held while the task is in progress */
  workersRequired: number;
  /** Relative value used by the packer */
  priority: number;
  /** Observational only; never alters scheduling decisions */
  deadline?: number;
}

/** Task attributes as accepted on load or through AddTask (defaults applied later) */
export interface TaskInput {
  id: string;
  duration: number;
  workersRequired: number;
  dependencies?: string[];
  priority?: number;
  deadline?: number;
}

/** Initial-load form: id -> attributes */
export type TaskAttributes = Omit<TaskInput, 'id'>;

export type TaskPatch = Partial<Omit<Task, 'id'>>;

export type TaskState = 'not-started' | 'in-progress' | 'completed';

/** Committed reservation; decoupled from later registry edits */
export interface InProgressEntry {
  taskId: string;
  startTime: number;
  finishTime: number;
  workersRequired: number;
}

// ===== Packing =====

export type ValueFunctionName = 'priority' | 'rate';

export type ValueFunction = (task: Task) => number;

// ===== Mutations =====

export type SchedulerCommand =
  | { type: 'add'; task: TaskInput }
  | { type: 'modify'; id: string; changes: TaskPatch }
  | { type: 'remove'; id: string };

export type MutationResult =
  | { ok: true; command: SchedulerCommand }
  | { ok: false; command: SchedulerCommand; error: InvalidMutationError };

// ===== Steps & log =====

export type RunStatus = 'running' | 'stalled' | 'terminal';

export interface ScheduleRecord {
  time: number;
  started: string[];
  completed: string[];
}

export type DeadlineStatus = 'met' | 'missed' | 'pending' | 'not-applicable';

export interface DeadlineCheck {
  taskId: string;
  status: DeadlineStatus;
  deadline?: number;
  finishTime?: number;
}

export interface StepResult {
  time: number;
  started: string[];
  completed: string[];
  status: RunStatus;
  isTerminal: boolean;
  usedCapacity: number;
  /** Deadline verdicts for deadline-bearing tasks completed in this step */
  deadlineChecks: DeadlineCheck[];
}

// ===== Diagnostics & report =====

export interface MissingDependency {
  taskId: string;
  missing: string[];
}

export interface CapacityViolation {
  taskId: string;
  workersRequired: number;
  totalCapacity: number;
}

export interface SchedulerDiagnostics {
  capacityViolations: CapacityViolation[];
  missingDependencies: MissingDependency[];
  /** Tasks that can never become ready, directly or through a blocked dependency */
  blocked: string[];
  cycles: string[][];
}

export interface ScheduleReport {
  runId: string;
  time: number;
  status: RunStatus;
  totalCapacity: number;
  valueFunction: ValueFunctionName;
  log: ScheduleRecord[];
  completionTimes: Record<string, number>;
  deadlines: Record<string, DeadlineCheck>;
  diagnostics: SchedulerDiagnostics;
}

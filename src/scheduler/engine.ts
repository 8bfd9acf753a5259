/**
 * SchedulerEngine: discrete-time, capacity-bounded task scheduler.
 *
 * Each step() drains completions due at the current time, packs the ready
 * set into the free worker capacity (0/1 knapsack), commits the selected
 * tasks, appends a log record and advances the clock by exactly one unit.
 *
 * The task set may be mutated between steps through addTask / modifyTask /
 * removeTask (or apply()). A committed task keeps its finish time and its
 * reserved workers even if its definition changes afterwards.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { ConfigError, InvalidMutationError } from '../core/errors.js';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { VALUE_FUNCTIONS, packTasks } from './capacity-packer.js';
import { checkDeadlines, classifyDeadline } from './deadline-tracker.js';
import { diagnose } from './diagnostics.js';
import { EventTimeline } from './event-timeline.js';
import { resolveReadyTasks } from './readiness.js';
import { TaskRegistry, toTaskInputs } from './task-registry.js';
import type {
  DeadlineCheck,
  InProgressEntry,
  MutationResult,
  RunStatus,
  ScheduleRecord,
  ScheduleReport,
  SchedulerCommand,
  SchedulerDiagnostics,
  StepResult,
  Task,
  TaskAttributes,
  TaskInput,
  TaskPatch,
  TaskState,
  ValueFunction,
  ValueFunctionName,
} from './types.js';

export interface SchedulerEngineOptions {
  totalCapacity: number;
  tasks?: TaskInput[] | Record<string, TaskAttributes>;
  /** Fixed for the engine's lifetime */
  valueFunction?: ValueFunctionName;
  events?: EventBus;
  logger?: Logger;
}

export class SchedulerEngine {
  readonly runId: string;

  private readonly registry: TaskRegistry;
  private readonly totalCapacity: number;
  private readonly valueFunctionName: ValueFunctionName;
  private readonly value: ValueFunction;
  private readonly events: EventBus;
  private readonly logger: Logger;

  private time = 0;
  private completed: Set<string> = new Set();
  private inProgress: Map<string, InProgressEntry> = new Map();
  private timeline = new EventTimeline();
  private log: ScheduleRecord[] = [];
  private finishTimes: Map<string, number> = new Map();
  /** Completed tasks whose definitions were removed, kept for deadline reporting */
  private retired: Map<string, Task> = new Map();
  private stepping = false;
  private stalledReported = false;

  constructor(options: SchedulerEngineOptions) {
    if (!Number.isInteger(options.totalCapacity) || options.totalCapacity < 0) {
      throw new ConfigError(`totalCapacity must be a non-negative integer, got ${options.totalCapacity}`);
    }

    this.runId = `run-${nanoid(10)}`;
    this.totalCapacity = options.totalCapacity;
    this.valueFunctionName = options.valueFunction ?? 'priority';
    this.value = VALUE_FUNCTIONS[this.valueFunctionName];
    this.events = options.events ?? new EventBus();
    this.logger = options.logger ?? getLogger().child({ component: 'scheduler', runId: this.runId });
    this.registry = new TaskRegistry(toTaskInputs(options.tasks ?? []));

    for (const task of this.registry.list()) {
      this.warnIfOverCapacity(task);
    }
  }

  // ─────────────────────────────────────────────────────────
  // STEPPING
  // ─────────────────────────────────────────────────────────

  /**
   * Advance the schedule by one time unit. After the run is terminal this
   * is a no-op that reports terminal again.
   */
  step(): StepResult {
    if (this.isTerminal()) {
      return {
        time: this.time,
        started: [],
        completed: [],
        status: 'terminal',
        isTerminal: true,
        usedCapacity: this.usedCapacity(),
        deadlineChecks: [],
      };
    }

    this.stepping = true;
    try {
      return this.runStep();
    } finally {
      this.stepping = false;
    }
  }

  private runStep(): StepResult {
    const now = this.time;
    const justCompleted: string[] = [];
    const deadlineChecks: DeadlineCheck[] = [];

    for (const event of this.timeline.popDue(now)) {
      this.inProgress.delete(event.taskId);
      this.completed.add(event.taskId);
      this.finishTimes.set(event.taskId, event.finishTime);
      justCompleted.push(event.taskId);
      this.events.emit('task:completed', { taskId: event.taskId, time: event.finishTime });

      const deadline = this.registry.get(event.taskId)?.deadline;
      if (deadline !== undefined) {
        deadlineChecks.push({
          taskId: event.taskId,
          status: classifyDeadline(deadline, event.finishTime),
          deadline,
          finishTime: event.finishTime,
        });
      }
    }

    const freeCapacity = this.totalCapacity - this.usedCapacity();
    const selected = packTasks(this.readyTasks(), freeCapacity, this.value);

    const justStarted: string[] = [];
    for (const task of selected) {
      const entry: InProgressEntry = {
        taskId: task.id,
        startTime: now,
        finishTime: now + task.duration,
        workersRequired: task.workersRequired,
      };
      this.inProgress.set(task.id, entry);
      this.timeline.push(entry.finishTime, task.id);
      justStarted.push(task.id);
      this.events.emit('task:started', {
        taskId: task.id,
        time: now,
        finishTime: entry.finishTime,
        workersRequired: entry.workersRequired,
      });
    }

    this.log.push({ time: now, started: justStarted, completed: justCompleted });
    this.time = now + 1;

    const status = this.getStatus();
    const result: StepResult = {
      time: now,
      started: justStarted,
      completed: justCompleted,
      status,
      isTerminal: status === 'terminal',
      usedCapacity: this.usedCapacity(),
      deadlineChecks,
    };

    this.logger.debug(
      { time: now, started: justStarted, completed: justCompleted, usedCapacity: result.usedCapacity },
      'Scheduler step',
    );
    this.events.emit('step:complete', result);
    this.reportStatusChange(status, now);

    return result;
  }

  private reportStatusChange(status: RunStatus, time: number): void {
    if (status === 'terminal') {
      this.logger.info({ time, steps: this.log.length }, 'All tasks completed');
      this.events.emit('run:terminal', { time });
      return;
    }

    if (status === 'stalled') {
      if (this.stalledReported) return;
      this.stalledReported = true;
      const { blocked } = this.diagnose();
      this.logger.info({ time, blocked }, 'No task can make progress');
      this.events.emit('run:stalled', { time, blocked });
      return;
    }

    this.stalledReported = false;
  }

  // ─────────────────────────────────────────────────────────
  // MUTATIONS
  // ─────────────────────────────────────────────────────────

  apply(command: SchedulerCommand): MutationResult {
    switch (command.type) {
      case 'add':
        return this.addTask(command.task);
      case 'modify':
        return this.modifyTask(command.id, command.changes);
      case 'remove':
        return this.removeTask(command.id);
    }
  }

  /**
   * Insert a task, overwriting any definition with the same id. Overwriting
   * a completed task that is still registered keeps it completed; it does
   * not run again. An id that completed and was then removed is admitted
   * again as a fresh task and runs a second time.
   */
  addTask(input: TaskInput): MutationResult {
    return this.mutate({ type: 'add', task: input }, () => {
      const readmitted = !this.registry.has(input.id) && this.completed.has(input.id);
      const task = this.registry.insert(input);
      if (readmitted) {
        this.completed.delete(task.id);
        this.finishTimes.delete(task.id);
        this.retired.delete(task.id);
      }
      this.warnIfOverCapacity(task);
    });
  }

  /**
   * Change only the given attributes. An in-progress task keeps its
   * committed finish time and workers; the change applies to the registry.
   */
  modifyTask(id: string, changes: TaskPatch): MutationResult {
    return this.mutate({ type: 'modify', id, changes }, () => {
      const task = this.registry.update(id, changes);
      this.warnIfOverCapacity(task);
    });
  }

  /**
   * Remove a task that is not running. Running tasks cannot be removed;
   * a completed task's completion and deadline verdict stay in the
   * history.
   */
  removeTask(id: string): MutationResult {
    return this.mutate({ type: 'remove', id }, () => {
      if (this.inProgress.has(id)) {
        throw new InvalidMutationError(`Task "${id}" is in progress and cannot be removed`, 'task-in-progress', id);
      }
      const removed = this.registry.remove(id);
      if (this.completed.has(id)) {
        this.retired.set(id, removed);
      }
    });
  }

  private mutate(command: SchedulerCommand, change: () => void): MutationResult {
    try {
      if (this.stepping) {
        throw new InvalidMutationError(
          'Tasks cannot be changed while a step is running',
          'step-in-progress',
          command.type === 'add' ? command.task.id : command.id,
        );
      }
      change();
    } catch (err) {
      if (!(err instanceof InvalidMutationError)) throw err;
      const rejected: MutationResult = { ok: false, command, error: err };
      this.logger.warn({ command: command.type, taskId: err.taskId, reason: err.reason }, err.message);
      this.events.emit('mutation:rejected', rejected);
      return rejected;
    }

    const applied: MutationResult = { ok: true, command };
    this.logger.debug({ command }, 'Mutation applied');
    this.events.emit('mutation:applied', applied);
    return applied;
  }

  private warnIfOverCapacity(task: Task): void {
    if (task.workersRequired <= this.totalCapacity || this.completed.has(task.id)) return;
    const violation = {
      taskId: task.id,
      workersRequired: task.workersRequired,
      totalCapacity: this.totalCapacity,
    };
    this.logger.warn(violation, `Task "${task.id}" needs more workers than the total capacity and will never start`);
    this.events.emit('capacity:violation', violation);
  }

  // ─────────────────────────────────────────────────────────
  // QUERIES
  // ─────────────────────────────────────────────────────────

  /** Next time unit to be processed */
  getTime(): number {
    return this.time;
  }

  getTotalCapacity(): number {
    return this.totalCapacity;
  }

  getValueFunction(): ValueFunctionName {
    return this.valueFunctionName;
  }

  getEventBus(): EventBus {
    return this.events;
  }

  getTask(id: string): Task | undefined {
    return this.registry.get(id);
  }

  listTasks(): Task[] {
    return this.registry.list();
  }

  taskState(id: string): TaskState | undefined {
    if (this.inProgress.has(id)) return 'in-progress';
    if (this.completed.has(id)) return 'completed';
    return this.registry.has(id) ? 'not-started' : undefined;
  }

  usedCapacity(): number {
    let used = 0;
    for (const entry of this.inProgress.values()) {
      used += entry.workersRequired;
    }
    return used;
  }

  freeCapacity(): number {
    return this.totalCapacity - this.usedCapacity();
  }

  readyTasks(): Task[] {
    return resolveReadyTasks(this.registry.list(), this.completed, new Set(this.inProgress.keys()));
  }

  inProgressEntries(): InProgressEntry[] {
    return [...this.inProgress.values()].map((entry) => ({ ...entry }));
  }

  completedIds(): string[] {
    return [...this.completed];
  }

  getLog(): ScheduleRecord[] {
    return this.log.map((record) => ({
      time: record.time,
      started: [...record.started],
      completed: [...record.completed],
    }));
  }

  completionTimes(): Record<string, number> {
    return Object.fromEntries(this.finishTimes);
  }

  isTerminal(): boolean {
    return this.registry.ids().every((id) => this.completed.has(id));
  }

  getStatus(): RunStatus {
    if (this.isTerminal()) return 'terminal';
    if (this.inProgress.size > 0) return 'running';
    return packTasks(this.readyTasks(), this.freeCapacity(), this.value).length > 0 ? 'running' : 'stalled';
  }

  diagnose(): SchedulerDiagnostics {
    return diagnose({
      tasks: this.registry.list(),
      completed: this.completed,
      inProgress: new Set(this.inProgress.keys()),
      totalCapacity: this.totalCapacity,
    });
  }

  deadlineStatuses(): Record<string, DeadlineCheck> {
    return checkDeadlines(this.finishTimes, [...this.registry.list(), ...this.retired.values()], this.time);
  }

  report(): ScheduleReport {
    return {
      runId: this.runId,
      time: this.time,
      status: this.getStatus(),
      totalCapacity: this.totalCapacity,
      valueFunction: this.valueFunctionName,
      log: this.getLog(),
      completionTimes: this.completionTimes(),
      deadlines: this.deadlineStatuses(),
      diagnostics: this.diagnose(),
    };
  }
}

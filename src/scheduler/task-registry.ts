/**
 * TaskRegistry: single-owner map of task id to definition.
 *
 * Insert overwrites an existing id in place (keeping its iteration
 * position); update merges only the provided attributes. All input is
 * validated with zod before it touches the map.
 */

import { z } from 'zod';
import { InvalidMutationError } from '../core/errors.js';
import type { Task, TaskAttributes, TaskInput, TaskPatch } from './types.js';

const positiveInt = z.number().int().positive();

export const TaskInputSchema = z.object({
  id: z.string().min(1),
  duration: positiveInt,
  workersRequired: positiveInt,
  dependencies: z.array(z.string().min(1)).default([]),
  priority: z.number().positive().default(1),
  deadline: z.number().int().optional(),
});

export const TaskPatchSchema = z
  .object({
    duration: positiveInt,
    workersRequired: positiveInt,
    dependencies: z.array(z.string().min(1)),
    priority: z.number().positive(),
    deadline: z.number().int(),
  })
  .partial()
  .strict();

/**
 * Accept either a list of task inputs or a mapping of id to attributes.
 */
export function toTaskInputs(tasks: TaskInput[] | Record<string, TaskAttributes>): TaskInput[] {
  if (Array.isArray(tasks)) return [...tasks];
  return Object.entries(tasks).map(([id, attributes]) => ({ ...attributes, id }));
}

export class TaskRegistry {
  private tasks: Map<string, Task> = new Map();

  constructor(initial: Iterable<TaskInput> = []) {
    for (const input of initial) {
      this.insert(input);
    }
  }

  /**
   * Validate and insert a task. Re-inserting an existing id overwrites it.
   */
  insert(input: TaskInput): Task {
    const parsed = TaskInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidMutationError(
        `Invalid task definition${describeId(input)}: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`,
        'invalid-definition',
        typeof input.id === 'string' ? input.id : undefined,
      );
    }

    const { deadline, ...rest } = parsed.data;
    const task: Task = { ...rest, dependencies: [...new Set(rest.dependencies)] };
    if (deadline !== undefined) task.deadline = deadline;

    this.tasks.set(task.id, task);
    return { ...task, dependencies: [...task.dependencies] };
  }

  /**
   * Apply only the provided attributes to an existing task.
   */
  update(id: string, changes: TaskPatch): Task {
    const current = this.tasks.get(id);
    if (!current) {
      throw new InvalidMutationError(`Task "${id}" not found`, 'unknown-task', id);
    }

    const parsed = TaskPatchSchema.safeParse(changes);
    if (!parsed.success) {
      throw new InvalidMutationError(
        `Invalid changes for task "${id}": ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`,
        'invalid-definition',
        id,
      );
    }

    const patch = parsed.data;
    const next: Task = { ...current };
    if (patch.duration !== undefined) next.duration = patch.duration;
    if (patch.workersRequired !== undefined) next.workersRequired = patch.workersRequired;
    if (patch.priority !== undefined) next.priority = patch.priority;
    if (patch.deadline !== undefined) next.deadline = patch.deadline;
    if (patch.dependencies !== undefined) next.dependencies = [...new Set(patch.dependencies)];

    this.tasks.set(id, next);
    return { ...next, dependencies: [...next.dependencies] };
  }

  remove(id: string): Task {
    const current = this.tasks.get(id);
    if (!current) {
      throw new InvalidMutationError(`Task "${id}" not found`, 'unknown-task', id);
    }
    this.tasks.delete(id);
    return current;
  }

  get(id: string): Task | undefined {
    const task = this.tasks.get(id);
    return task ? { ...task, dependencies: [...task.dependencies] } : undefined;
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  ids(): string[] {
    return [...this.tasks.keys()];
  }

  /** Snapshot of all tasks in insertion order */
  list(): Task[] {
    return [...this.tasks.values()].map((t) => ({ ...t, dependencies: [...t.dependencies] }));
  }

  get size(): number {
    return this.tasks.size;
  }
}

function describeId(input: TaskInput): string {
  return typeof input.id === 'string' && input.id.length > 0 ? ` for "${input.id}"` : '';
}

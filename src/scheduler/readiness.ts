import type { Task } from './types.js';

/**
 * Tasks eligible to start now: not completed, not in progress, and every
 * dependency completed. Order follows the input order.
 */
export function resolveReadyTasks(
  tasks: readonly Task[],
  completed: ReadonlySet<string>,
  inProgress: ReadonlySet<string>,
): Task[] {
  return tasks.filter(
    (task) =>
      !completed.has(task.id) &&
      !inProgress.has(task.id) &&
      task.dependencies.every((dep) => completed.has(dep)),
  );
}

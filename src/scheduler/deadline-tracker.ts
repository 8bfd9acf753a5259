/**
 * DeadlineTracker: classifies deadline-bearing tasks from the schedule log.
 *
 * Pure and after-the-fact: the scheduler never consults deadlines.
 */

import type { DeadlineCheck, DeadlineStatus, ScheduleRecord, Task } from './types.js';

export function classifyDeadline(deadline: number | undefined, finishTime: number): DeadlineStatus {
  if (deadline === undefined) return 'not-applicable';
  return finishTime <= deadline ? 'met' : 'missed';
}

/**
 * Latest finish time per task id as recorded in the log. A task started
 * again after a recorded completion (re-added) counts as unfinished.
 */
export function finishTimesFromLog(log: readonly ScheduleRecord[]): Map<string, number> {
  const finished = new Map<string, number>();
  for (const record of log) {
    for (const id of record.completed) finished.set(id, record.time);
    for (const id of record.started) finished.delete(id);
  }
  return finished;
}

/**
 * Deadline status for every task. `now` is the next time the scheduler
 * will process; an unfinished task whose deadline lies before it can no
 * longer meet it.
 */
export function evaluateDeadlines(
  log: readonly ScheduleRecord[],
  tasks: Iterable<Task>,
  now?: number,
): Record<string, DeadlineCheck> {
  return checkDeadlines(finishTimesFromLog(log), tasks, now);
}

/** Same as evaluateDeadlines, from finish times already keyed by task id */
export function checkDeadlines(
  finished: ReadonlyMap<string, number>,
  tasks: Iterable<Task>,
  now?: number,
): Record<string, DeadlineCheck> {
  const result: Record<string, DeadlineCheck> = {};

  for (const task of tasks) {
    const finishTime = finished.get(task.id);

    if (task.deadline === undefined) {
      result[task.id] = { taskId: task.id, status: 'not-applicable', finishTime };
      continue;
    }

    if (finishTime !== undefined) {
      result[task.id] = {
        taskId: task.id,
        status: classifyDeadline(task.deadline, finishTime),
        deadline: task.deadline,
        finishTime,
      };
      continue;
    }

    const overdue = now !== undefined && task.deadline < now;
    result[task.id] = { taskId: task.id, status: overdue ? 'missed' : 'pending', deadline: task.deadline };
  }

  return result;
}

/**
 * Diagnostics for tasks that can never start: capacity violations,
 * dependencies on ids that do not exist, and dependency cycles.
 *
 * Nothing here changes scheduling; a blocked task simply stays non-ready.
 */

import type {
  CapacityViolation,
  MissingDependency,
  SchedulerDiagnostics,
  Task,
} from './types.js';

export interface DiagnosticsInput {
  tasks: readonly Task[];
  completed: ReadonlySet<string>;
  inProgress: ReadonlySet<string>;
  totalCapacity: number;
}

export function findCapacityViolations(tasks: readonly Task[], totalCapacity: number): CapacityViolation[] {
  return tasks
    .filter((task) => task.workersRequired > totalCapacity)
    .map((task) => ({ taskId: task.id, workersRequired: task.workersRequired, totalCapacity }));
}

export function diagnose(input: DiagnosticsInput): SchedulerDiagnostics {
  const { completed, inProgress, totalCapacity } = input;
  const pending = input.tasks.filter((t) => !completed.has(t.id) && !inProgress.has(t.id));
  const known = new Set(input.tasks.map((t) => t.id));

  const missingDependencies: MissingDependency[] = [];
  for (const task of pending) {
    const missing = task.dependencies.filter((dep) => !known.has(dep) && !completed.has(dep));
    if (missing.length > 0) {
      missingDependencies.push({ taskId: task.id, missing });
    }
  }

  return {
    capacityViolations: findCapacityViolations(pending, totalCapacity),
    missingDependencies,
    blocked: findBlockedTasks(pending, completed, inProgress, totalCapacity),
    cycles: findDependencyCycles(pending),
  };
}

/**
 * Pending tasks that cannot reach the ready state under the current
 * registry: a fixed point over "every dependency is completed, running,
 * or itself startable".
 */
export function findBlockedTasks(
  pending: readonly Task[],
  completed: ReadonlySet<string>,
  inProgress: ReadonlySet<string>,
  totalCapacity: number,
): string[] {
  const viable = new Set<string>([...completed, ...inProgress]);
  let changed = true;

  while (changed) {
    changed = false;
    for (const task of pending) {
      if (viable.has(task.id) || task.workersRequired > totalCapacity) continue;
      if (task.dependencies.every((dep) => viable.has(dep))) {
        viable.add(task.id);
        changed = true;
      }
    }
  }

  return pending.filter((t) => !viable.has(t.id)).map((t) => t.id);
}

/**
 * Strongly connected components of the pending dependency graph that form
 * a cycle (more than one member, or a task depending on itself).
 */
export function findDependencyCycles(pending: readonly Task[]): string[][] {
  const byId = new Map(pending.map((t) => [t.id, t]));
  const order = new Map(pending.map((t, i) => [t.id, i]));
  const index = new Map<string, number>();
  const lowlink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const cycles: string[][] = [];
  let counter = 0;

  const visit = (id: string): void => {
    index.set(id, counter);
    lowlink.set(id, counter);
    counter++;
    stack.push(id);
    onStack.add(id);

    for (const dep of byId.get(id)?.dependencies ?? []) {
      if (!byId.has(dep)) continue;
      if (!index.has(dep)) {
        visit(dep);
        lowlink.set(id, Math.min(lowlink.get(id) ?? 0, lowlink.get(dep) ?? 0));
      } else if (onStack.has(dep)) {
        lowlink.set(id, Math.min(lowlink.get(id) ?? 0, index.get(dep) ?? 0));
      }
    }

    if (lowlink.get(id) !== index.get(id)) return;

    const component: string[] = [];
    let member: string | undefined;
    do {
      member = stack.pop();
      if (member === undefined) break;
      onStack.delete(member);
      component.push(member);
    } while (member !== id);

    const selfLoop = component.length === 1 && (byId.get(id)?.dependencies.includes(id) ?? false);
    if (component.length > 1 || selfLoop) {
      component.sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0));
      cycles.push(component);
    }
  };

  for (const task of pending) {
    if (!index.has(task.id)) visit(task.id);
  }

  cycles.sort((a, b) => (order.get(a[0]) ?? 0) - (order.get(b[0]) ?? 0));
  return cycles;
}

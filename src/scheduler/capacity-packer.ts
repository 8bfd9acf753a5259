/**
 * CapacityPacker: 0/1 knapsack over integer worker capacity.
 *
 * Selects the subset of ready tasks whose summed workersRequired fits the
 * free capacity and whose summed value is maximal. The choice is optimal
 * for the current step only; there is no lookahead across steps.
 */

import type { Task, ValueFunction, ValueFunctionName } from './types.js';

export const VALUE_FUNCTIONS: Record<ValueFunctionName, ValueFunction> = {
  priority: (task) => task.priority,
  rate: (task) => task.priority / task.duration,
};

export function packTasks(
  candidates: readonly Task[],
  capacity: number,
  value: ValueFunction = VALUE_FUNCTIONS.priority,
): Task[] {
  const budget = Math.max(0, Math.floor(capacity));
  if (budget === 0 || candidates.length === 0) return [];

  // best[w]: max value using at most w workers; chosen[w]: candidate indexes achieving it
  const best: number[] = new Array<number>(budget + 1).fill(0);
  const chosen: number[][] = Array.from({ length: budget + 1 }, () => []);

  candidates.forEach((task, index) => {
    const weight = task.workersRequired;
    if (weight > budget) return;
    const taskValue = value(task);

    for (let w = budget; w >= weight; w--) {
      const candidate = best[w - weight] + taskValue;
      if (candidate > best[w]) {
        best[w] = candidate;
        chosen[w] = [...chosen[w - weight], index];
      }
    }
  });

  // best is non-decreasing in w, but an explicit argmax keeps ties on the smallest w
  let bestW = 0;
  for (let w = 1; w <= budget; w++) {
    if (best[w] > best[bestW]) bestW = w;
  }

  return chosen[bestW].map((index) => candidates[index]);
}

/**
 * Plan files: the initial task set (and optionally the capacity) as YAML
 * or JSON. Tasks may be given as a list or as a mapping of id to attributes.
 *
 * ```yaml
 * totalCapacity: 4
 * tasks:
 *   A: { duration: 2, workersRequired: 1 }
 *   B: { duration: 3, workersRequired: 2, dependencies: [A], deadline: 8 }
 * ```
 */

import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { PlanLoadError } from '../core/errors.js';
import { TaskInputSchema, toTaskInputs } from './task-registry.js';
import type { TaskInput } from './types.js';

const TaskAttributesSchema = TaskInputSchema.omit({ id: true });

export const PlanSchema = z.object({
  totalCapacity: z.number().int().min(0).optional(),
  tasks: z.union([z.array(TaskInputSchema), z.record(TaskAttributesSchema)]),
});

export interface Plan {
  totalCapacity?: number;
  tasks: TaskInput[];
}

export function parsePlan(content: string, source: string = '<inline>'): Plan {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new PlanLoadError(`Failed to parse plan ${source}`, source, err instanceof Error ? err : undefined);
  }

  const result = PlanSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new PlanLoadError(`Invalid plan ${source}: ${details}`, source, result.error);
  }

  const tasks = toTaskInputs(result.data.tasks);
  const seen = new Set<string>();
  for (const task of tasks) {
    if (seen.has(task.id)) {
      throw new PlanLoadError(`Invalid plan ${source}: duplicate task id "${task.id}"`, source);
    }
    seen.add(task.id);
  }

  return { totalCapacity: result.data.totalCapacity, tasks };
}

export function loadPlan(path: string): Plan {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new PlanLoadError(`Cannot read plan file ${path}`, path, err instanceof Error ? err : undefined);
  }
  return parsePlan(content, path);
}

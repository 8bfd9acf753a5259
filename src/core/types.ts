import { z } from 'zod';
import type {
  CapacityViolation,
  MutationResult,
  StepResult,
} from '../scheduler/types.js';

// ===== Configuration =====

export const StepwiseConfigSchema = z.object({
  scheduler: z.object({
    totalCapacity: z.number().int().min(0).default(4),
    valueFunction: z.enum(['priority', 'rate']).default('priority'),
    maxSteps: z.number().int().min(1).default(10000),
    stopWhenStalled: z.boolean().default(true),
  }).default({}),
  logging: z.object({
    verbose: z.boolean().default(false),
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  }).default({}),
});

export type StepwiseConfig = z.infer<typeof StepwiseConfigSchema>;

export type StepwiseConfigInput = z.input<typeof StepwiseConfigSchema>;

// ===== Events =====

export interface SchedulerEvents {
  'step:complete': StepResult;
  'task:started': { taskId: string; time: number; finishTime: number; workersRequired: number };
  'task:completed': { taskId: string; time: number };
  'mutation:applied': MutationResult;
  'mutation:rejected': MutationResult;
  'capacity:violation': CapacityViolation;
  'run:terminal': { time: number };
  'run:stalled': { time: number; blocked: string[] };
}

/**
 * Driver loop: calls step() until the run is terminal, stalled, aborted or
 * out of steps, consuming mutation commands from an injected source
 * between steps. The engine itself never waits on anything.
 */

import type { SchedulerEngine } from './engine.js';
import type { MutationResult, ScheduleReport, SchedulerCommand, StepResult } from './types.js';

export interface CommandContext {
  engine: SchedulerEngine;
  lastStep: StepResult;
}

/**
 * Supplies commands to apply before the next step. Returning null stops
 * the run.
 */
export interface CommandSource {
  next(context: CommandContext): SchedulerCommand[] | null | Promise<SchedulerCommand[] | null>;
  /** True while commands are held for a later step; a stall does not stop the run then */
  hasPending?(): boolean;
}

export type StopReason = 'terminal' | 'stalled' | 'aborted' | 'max-steps';

export interface DriverOptions {
  source?: CommandSource;
  maxSteps?: number;
  stopWhenStalled?: boolean;
  onStep?: (result: StepResult, engine: SchedulerEngine) => void;
  onMutation?: (result: MutationResult) => void;
}

export interface RunSummary {
  reason: StopReason;
  steps: number;
  mutations: MutationResult[];
  report: ScheduleReport;
}

export async function runScheduler(engine: SchedulerEngine, options: DriverOptions = {}): Promise<RunSummary> {
  const maxSteps = options.maxSteps ?? 10000;
  const stopWhenStalled = options.stopWhenStalled ?? true;
  const mutations: MutationResult[] = [];
  let steps = 0;
  let reason: StopReason = 'max-steps';

  while (steps < maxSteps) {
    const result = engine.step();
    steps++;
    options.onStep?.(result, engine);

    if (result.isTerminal) {
      reason = 'terminal';
      break;
    }

    if (options.source) {
      const commands = await options.source.next({ engine, lastStep: result });
      if (commands === null) {
        reason = 'aborted';
        break;
      }
      for (const command of commands) {
        const outcome = engine.apply(command);
        mutations.push(outcome);
        options.onMutation?.(outcome);
      }
    }

    // Mutations may have unblocked (or finished) the run
    const status = engine.getStatus();
    if (status === 'terminal') {
      reason = 'terminal';
      break;
    }
    if (status === 'stalled' && stopWhenStalled && !options.source?.hasPending?.()) {
      reason = 'stalled';
      break;
    }
  }

  return { reason, steps, mutations, report: engine.report() };
}

/**
 * Command source backed by a queue of commands keyed by the time of the
 * step after which they are applied.
 */
export class QueueCommandSource implements CommandSource {
  private pending: Array<{ afterTime: number; command: SchedulerCommand }> = [];
  private aborted = false;

  enqueue(afterTime: number, ...commands: SchedulerCommand[]): this {
    for (const command of commands) {
      this.pending.push({ afterTime, command });
    }
    return this;
  }

  abort(): void {
    this.aborted = true;
  }

  get size(): number {
    return this.pending.length;
  }

  hasPending(): boolean {
    return this.pending.length > 0;
  }

  next({ lastStep }: CommandContext): SchedulerCommand[] | null {
    if (this.aborted) return null;
    const due = this.pending.filter((entry) => entry.afterTime <= lastStep.time);
    this.pending = this.pending.filter((entry) => entry.afterTime > lastStep.time);
    return due.map((entry) => entry.command);
  }
}

/**
 * Text rendering of step results, diagnostics and the final report.
 */

import type {
  InProgressEntry,
  ScheduleReport,
  SchedulerDiagnostics,
  StepResult,
} from '../scheduler/types.js';

function list(ids: string[]): string {
  return ids.length > 0 ? ids.join(', ') : '-';
}

export function formatStep(result: StepResult, inProgress: InProgressEntry[]): string {
  const lines = [
    `Time: ${result.time}`,
    `  Completed: ${list(result.completed)}`,
    `  Started:   ${list(result.started)}`,
  ];

  if (inProgress.length > 0) {
    lines.push('  In progress:');
    for (const entry of inProgress) {
      lines.push(`    - ${entry.taskId} (ends at ${entry.finishTime})`);
    }
  }

  for (const check of result.deadlineChecks) {
    lines.push(`  Deadline ${check.taskId}: ${check.status} (deadline ${check.deadline}, finished ${check.finishTime})`);
  }

  return lines.join('\n');
}

export function formatDiagnostics(diagnostics: SchedulerDiagnostics): string[] {
  const lines: string[] = [];

  for (const v of diagnostics.capacityViolations) {
    lines.push(`⚠ ${v.taskId} needs ${v.workersRequired} workers but capacity is ${v.totalCapacity}`);
  }
  for (const m of diagnostics.missingDependencies) {
    lines.push(`⚠ ${m.taskId} depends on unknown task(s): ${m.missing.join(', ')}`);
  }
  for (const cycle of diagnostics.cycles) {
    lines.push(`⚠ dependency cycle: ${[...cycle, cycle[0]].join(' -> ')}`);
  }
  if (diagnostics.blocked.length > 0) {
    lines.push(`⚠ blocked forever: ${diagnostics.blocked.join(', ')}`);
  }

  return lines;
}

export function hasDiagnostics(diagnostics: SchedulerDiagnostics): boolean {
  return (
    diagnostics.capacityViolations.length > 0 ||
    diagnostics.missingDependencies.length > 0 ||
    diagnostics.cycles.length > 0 ||
    diagnostics.blocked.length > 0
  );
}

export function formatReport(report: ScheduleReport): string {
  const lines = ['Final task completion times:'];

  const completions = Object.entries(report.completionTimes).sort((a, b) => a[1] - b[1]);
  if (completions.length === 0) {
    lines.push('  (none)');
  }
  for (const [taskId, finishTime] of completions) {
    const check = report.deadlines[taskId];
    const deadline =
      check && check.deadline !== undefined ? ` | deadline ${check.deadline} (${check.status})` : '';
    lines.push(`  - ${taskId}: completed at ${finishTime}${deadline}`);
  }

  const unfinished = Object.values(report.deadlines).filter(
    (check) => check.status === 'pending' || (check.status === 'missed' && check.finishTime === undefined),
  );
  for (const check of unfinished) {
    lines.push(`  - ${check.taskId}: not completed | deadline ${check.deadline} (${check.status})`);
  }

  lines.push(`Status: ${report.status} at time ${report.time} (${report.log.length} steps)`);
  lines.push(...formatDiagnostics(report.diagnostics));

  return lines.join('\n');
}

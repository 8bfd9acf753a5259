import { describe, it, expect } from 'vitest';
import {
  checkDeadlines,
  classifyDeadline,
  evaluateDeadlines,
  finishTimesFromLog,
} from '../../../src/scheduler/deadline-tracker.js';
import type { ScheduleRecord, Task } from '../../../src/scheduler/types.js';

function task(id: string, duration: number, deadline?: number): Task {
  const t: Task = { id, duration, workersRequired: 1, priority: 1, dependencies: [] };
  if (deadline !== undefined) t.deadline = deadline;
  return t;
}

// T (duration 3) starts at time 2 and finishes at time 5
const LOG: ScheduleRecord[] = [
  { time: 0, started: ['P'], completed: [] },
  { time: 1, started: [], completed: [] },
  { time: 2, started: ['T'], completed: ['P'] },
  { time: 3, started: [], completed: [] },
  { time: 4, started: [], completed: [] },
  { time: 5, started: [], completed: ['T'] },
];

describe('classifyDeadline', () => {
  it('is met on or before the deadline', () => {
    expect(classifyDeadline(5, 5)).toBe('met');
    expect(classifyDeadline(9, 5)).toBe('met');
  });

  it('is missed after the deadline', () => {
    expect(classifyDeadline(4, 5)).toBe('missed');
  });

  it('does not apply without a deadline', () => {
    expect(classifyDeadline(undefined, 5)).toBe('not-applicable');
  });
});

describe('finishTimesFromLog', () => {
  it('takes the time of the record that completed each task', () => {
    expect(Object.fromEntries(finishTimesFromLog(LOG))).toEqual({ P: 2, T: 5 });
  });

  it('forgets a completion when the task starts again', () => {
    const log: ScheduleRecord[] = [
      { time: 0, started: ['A'], completed: [] },
      { time: 1, started: [], completed: ['A'] },
      { time: 2, started: ['A'], completed: [] },
    ];
    expect(finishTimesFromLog(log).has('A')).toBe(false);
  });
});

describe('evaluateDeadlines', () => {
  it('classifies a task finishing at 5 against deadlines 4 and 5', () => {
    expect(evaluateDeadlines(LOG, [task('T', 3, 4)]).T).toEqual({
      taskId: 'T',
      status: 'missed',
      deadline: 4,
      finishTime: 5,
    });
    expect(evaluateDeadlines(LOG, [task('T', 3, 5)]).T.status).toBe('met');
  });

  it('reports not-applicable with the finish time when no deadline is set', () => {
    expect(evaluateDeadlines(LOG, [task('P', 2)]).P).toEqual({
      taskId: 'P',
      status: 'not-applicable',
      finishTime: 2,
    });
  });

  it('keeps unfinished tasks pending until their deadline has passed', () => {
    const unfinished = [task('U', 4, 10)];
    expect(evaluateDeadlines(LOG, unfinished, 6).U.status).toBe('pending');
    expect(evaluateDeadlines(LOG, unfinished, 10).U.status).toBe('pending');
    expect(evaluateDeadlines(LOG, unfinished, 11).U.status).toBe('missed');
    expect(evaluateDeadlines(LOG, unfinished).U.status).toBe('pending');
  });

  it('covers every task passed in', () => {
    const result = evaluateDeadlines(LOG, [task('P', 2), task('T', 3, 5), task('U', 1, 3)], 6);
    expect(Object.keys(result)).toEqual(['P', 'T', 'U']);
    expect(result.U).toEqual({ taskId: 'U', status: 'missed', deadline: 3 });
  });
});

describe('checkDeadlines', () => {
  it('classifies from a finish-time map without a log', () => {
    const finished = new Map([['R', 1]]);
    expect(checkDeadlines(finished, [task('R', 1, 0), task('S', 2, 4)], 2)).toEqual({
      R: { taskId: 'R', status: 'missed', deadline: 0, finishTime: 1 },
      S: { taskId: 'S', status: 'pending', deadline: 4 },
    });
  });
});

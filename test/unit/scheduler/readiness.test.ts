import { describe, it, expect } from 'vitest';
import { resolveReadyTasks } from '../../../src/scheduler/readiness.js';
import type { Task } from '../../../src/scheduler/types.js';

function task(id: string, dependencies: string[] = []): Task {
  return { id, duration: 1, workersRequired: 1, priority: 1, dependencies };
}

describe('resolveReadyTasks', () => {
  const tasks = [task('A'), task('B', ['A']), task('C', ['A', 'B'])];

  it('returns only tasks without unmet dependencies', () => {
    const ready = resolveReadyTasks(tasks, new Set(), new Set());
    expect(ready.map((t) => t.id)).toEqual(['A']);
  });

  it('requires every dependency to be completed', () => {
    const ready = resolveReadyTasks(tasks, new Set(['A']), new Set());
    expect(ready.map((t) => t.id)).toEqual(['B']);
  });

  it('excludes in-progress and completed tasks', () => {
    expect(resolveReadyTasks(tasks, new Set(), new Set(['A']))).toEqual([]);
    expect(resolveReadyTasks(tasks, new Set(['A', 'B', 'C']), new Set())).toEqual([]);
  });

  it('never readies a task whose dependency does not exist', () => {
    const ready = resolveReadyTasks([task('X', ['ghost'])], new Set(['A']), new Set());
    expect(ready).toEqual([]);
  });

  it('treats a completed id as satisfied even if it is no longer listed', () => {
    const ready = resolveReadyTasks([task('D', ['removed'])], new Set(['removed']), new Set());
    expect(ready.map((t) => t.id)).toEqual(['D']);
  });

  it('preserves input order', () => {
    const ready = resolveReadyTasks([task('Z'), task('M'), task('A')], new Set(), new Set());
    expect(ready.map((t) => t.id)).toEqual(['Z', 'M', 'A']);
  });
});

import { describe, it, expect } from 'vitest';
import {
  diagnose,
  findBlockedTasks,
  findCapacityViolations,
  findDependencyCycles,
} from '../../../src/scheduler/diagnostics.js';
import type { Task } from '../../../src/scheduler/types.js';

function task(id: string, dependencies: string[] = [], workersRequired = 1): Task {
  return { id, duration: 1, workersRequired, priority: 1, dependencies };
}

describe('findDependencyCycles', () => {
  it('finds mutual and self dependencies', () => {
    const tasks = [task('X', ['Y']), task('Y', ['X']), task('Z', ['Z']), task('W', ['X'])];
    expect(findDependencyCycles(tasks)).toEqual([['X', 'Y'], ['Z']]);
  });

  it('returns nothing for an acyclic graph', () => {
    expect(findDependencyCycles([task('A'), task('B', ['A']), task('C', ['A', 'B'])])).toEqual([]);
  });

  it('finds longer cycles in registry order', () => {
    const tasks = [task('a', ['c']), task('b', ['a']), task('c', ['b'])];
    expect(findDependencyCycles(tasks)).toEqual([['a', 'b', 'c']]);
  });
});

describe('findBlockedTasks', () => {
  it('propagates blocking through dependents', () => {
    const pending = [task('big', [], 9), task('child', ['big']), task('free')];
    expect(findBlockedTasks(pending, new Set(), new Set(), 4)).toEqual(['big', 'child']);
  });

  it('treats running and completed dependencies as satisfiable', () => {
    const pending = [task('B', ['A']), task('C', ['done'])];
    expect(findBlockedTasks(pending, new Set(['done']), new Set(['A']), 2)).toEqual([]);
  });

  it('blocks cycle members and tasks depending on missing ids', () => {
    const pending = [task('X', ['Y']), task('Y', ['X']), task('M', ['ghost'])];
    expect(findBlockedTasks(pending, new Set(), new Set(), 2)).toEqual(['X', 'Y', 'M']);
  });
});

describe('findCapacityViolations', () => {
  it('lists tasks wider than the capacity', () => {
    expect(findCapacityViolations([task('a', [], 3), task('b', [], 5)], 4)).toEqual([
      { taskId: 'b', workersRequired: 5, totalCapacity: 4 },
    ]);
  });
});

describe('diagnose', () => {
  it('reports missing dependencies but not removed completed ones', () => {
    const result = diagnose({
      tasks: [task('M', ['ghost', 'done']), task('N', ['M'])],
      completed: new Set(['done']),
      inProgress: new Set(),
      totalCapacity: 2,
    });

    expect(result.missingDependencies).toEqual([{ taskId: 'M', missing: ['ghost'] }]);
    expect(result.blocked).toEqual(['M', 'N']);
    expect(result.cycles).toEqual([]);
    expect(result.capacityViolations).toEqual([]);
  });

  it('ignores completed and running tasks', () => {
    const result = diagnose({
      tasks: [task('A', [], 9), task('B', ['ghost'])],
      completed: new Set(['A']),
      inProgress: new Set(['B']),
      totalCapacity: 2,
    });

    expect(result).toEqual({ capacityViolations: [], missingDependencies: [], blocked: [], cycles: [] });
  });
});

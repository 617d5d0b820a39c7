import { describe, it, expect } from 'vitest';
import { displayValue, matchesFilter, sortTasks, selectTasks } from '../../src/queries/task-helpers.js';
import { toEpochSeconds } from '../../src/parsers/date-parser.js';
import type { Task } from '../../src/types/task.js';

const CTIME = toEpochSeconds(new Date(2025, 9, 9, 13, 37, 31));

function task(id: number, overrides: Partial<Task> = {}): Task {
  return {
    id,
    name: `Task ${id}`,
    type: null,
    desc: '',
    due: null,
    rep: 'NONE',
    prio: 'MEDIUM',
    done: false,
    ctime: CTIME + id,
    ...overrides,
  };
}

const names = (tasks: Task[]) => tasks.map(t => t.name);

describe('displayValue', () => {
  it('prints every property', () => {
    const t = task(3, { name: 'A', type: 'School', due: '2025-10-31', rep: 'DAILY', prio: 'HIGH', done: true });
    expect(displayValue(t, 'name')).toBe('A');
    expect(displayValue(t, 'type')).toBe('School');
    expect(displayValue(t, 'due')).toBe('31-10-2025');
    expect(displayValue(t, 'rep')).toBe('DAILY');
    expect(displayValue(t, 'prio')).toBe('HIGH');
    expect(displayValue(t, 'done')).toBe('True');
    expect(displayValue(t, 'ctime')).toBe('09-10-2025 13:37:34');
    expect(displayValue(t, 'id')).toBe('3');
  });

  it('prints NONE for a missing type and date', () => {
    expect(displayValue(task(0), 'type')).toBe('NONE');
    expect(displayValue(task(0), 'due')).toBe('NONE');
    expect(displayValue(task(0), 'done')).toBe('False');
  });
});

describe('matchesFilter', () => {
  it('compares text without regard to case', () => {
    const t = task(0, { type: 'School' });
    expect(matchesFilter(t, { property: 'type', value: { tag: 'string', value: 'school' } })).toBe(true);
    expect(matchesFilter(t, { property: 'type', value: { tag: 'string', value: 'work' } })).toBe(false);
  });

  it('matches a missing type by NONE', () => {
    expect(matchesFilter(task(0), { property: 'type', value: { tag: 'string', value: 'none' } })).toBe(true);
  });

  it('matches tasks without a date by a null date', () => {
    expect(matchesFilter(task(0), { property: 'due', value: { tag: 'date', value: null } })).toBe(true);
    expect(matchesFilter(task(1, { due: '2025-01-01' }), { property: 'due', value: { tag: 'date', value: null } }))
      .toBe(false);
  });

  it('compares enums, booleans and ids exactly', () => {
    const t = task(4, { prio: 'LOW', rep: 'MONTHLY', done: true });
    expect(matchesFilter(t, { property: 'prio', value: { tag: 'priority', value: 'LOW' } })).toBe(true);
    expect(matchesFilter(t, { property: 'rep', value: { tag: 'repeat', value: 'DAILY' } })).toBe(false);
    expect(matchesFilter(t, { property: 'done', value: { tag: 'boolean', value: true } })).toBe(true);
    expect(matchesFilter(t, { property: 'id', value: { tag: 'integer', value: 4 } })).toBe(true);
  });
});

describe('sortTasks', () => {
  it('sorts names without regard to case', () => {
    const tasks = [task(0, { name: 'banana' }), task(1, { name: 'Apple' }), task(2, { name: 'cherry' })];
    expect(names(sortTasks(tasks, { key: 'name', direction: 'asc' }))).toEqual(['Apple', 'banana', 'cherry']);
    expect(names(sortTasks(tasks, { key: 'name', direction: 'desc' }))).toEqual(['cherry', 'banana', 'Apple']);
  });

  it('orders priorities by rank and keeps ties in incoming order', () => {
    const tasks = [
      task(0, { name: 'm1', prio: 'MEDIUM' }),
      task(1, { name: 'h1', prio: 'HIGH' }),
      task(2, { name: 'l1', prio: 'LOW' }),
      task(3, { name: 'h2', prio: 'HIGH' }),
    ];
    expect(names(sortTasks(tasks, { key: 'prio', direction: 'asc' }))).toEqual(['l1', 'm1', 'h1', 'h2']);
    expect(names(sortTasks(tasks, { key: 'prio', direction: 'desc' }))).toEqual(['h1', 'h2', 'm1', 'l1']);
  });

  it('puts undated tasks after dated ones', () => {
    const tasks = [
      task(0, { name: 'none' }),
      task(1, { name: 'late', due: '2026-01-02' }),
      task(2, { name: 'early', due: '2025-12-31' }),
    ];
    expect(names(sortTasks(tasks, { key: 'due', direction: 'asc' }))).toEqual(['early', 'late', 'none']);
  });

  it('orders repeats NONE < DAILY < WEEKLY < MONTHLY', () => {
    const tasks = [
      task(0, { name: 'm', rep: 'MONTHLY' }),
      task(1, { name: 'n', rep: 'NONE' }),
      task(2, { name: 'w', rep: 'WEEKLY' }),
      task(3, { name: 'd', rep: 'DAILY' }),
    ];
    expect(names(sortTasks(tasks, { key: 'rep', direction: 'asc' }))).toEqual(['n', 'd', 'w', 'm']);
  });

  it('sorts by id and ctime numerically', () => {
    const tasks = [task(10), task(2), task(1)];
    expect(sortTasks(tasks, { key: 'id', direction: 'asc' }).map(t => t.id)).toEqual([1, 2, 10]);
    expect(sortTasks(tasks, { key: 'ctime', direction: 'desc' }).map(t => t.id)).toEqual([10, 2, 1]);
  });

  it('does not reorder its input', () => {
    const tasks = [task(1), task(0)];
    sortTasks(tasks, { key: 'id', direction: 'asc' });
    expect(tasks.map(t => t.id)).toEqual([1, 0]);
  });
});

describe('selectTasks', () => {
  it('sorts everything when no filter is given', () => {
    const tasks = [task(0, { name: 'b' }), task(1, { name: 'a' })];
    expect(names(selectTasks(tasks, null, { key: 'name', direction: 'asc' }))).toEqual(['a', 'b']);
  });

  it('keeps only matching tasks', () => {
    const tasks = [task(0, { name: 'b', done: true }), task(1, { name: 'a' }), task(2, { name: 'c', done: true })];
    const done = selectTasks(
      tasks,
      { property: 'done', value: { tag: 'boolean', value: true } },
      { key: 'name', direction: 'asc' },
    );
    expect(names(done)).toEqual(['b', 'c']);
  });
});

/**
 * Filter and sort engine behind `list` and `print`.
 */

import type { Task, TaskProperty } from '../types/task.js';
import { PriorityRank } from '../types/priority.js';
import { RepeatRank } from '../types/repeat.js';
import { formatDueDate, formatTimestamp } from '../parsers/date-parser.js';
import type { SortSpec, TaskFilter } from '../commands/types.js';

type Comparator = (a: Task, b: Task) => number;

/** Shown for a task without a type */
export const NO_TYPE = 'NONE';

/** A property as it is printed, and as string filters see it */
export function displayValue(task: Task, property: TaskProperty): string {
  switch (property) {
    case 'name': return task.name;
    case 'type': return task.type ?? NO_TYPE;
    case 'desc': return task.desc;
    case 'due': return formatDueDate(task.due);
    case 'rep': return task.rep;
    case 'prio': return task.prio;
    case 'done': return task.done ? 'True' : 'False';
    case 'ctime': return formatTimestamp(task.ctime);
    case 'id': return String(task.id);
  }
}

export function matchesFilter(task: Task, filter: TaskFilter): boolean {
  const { property, value } = filter;
  switch (value.tag) {
    case 'string':
      return displayValue(task, property).toLowerCase() === value.value.toLowerCase();
    case 'date': return task.due === value.value;
    case 'priority': return task.prio === value.value;
    case 'repeat': return task.rep === value.value;
    case 'boolean': return task.done === value.value;
    case 'integer': return task.id === value.value;
  }
}

function byText(pick: (t: Task) => string): Comparator {
  return (a, b) => {
    const x = pick(a).toLowerCase();
    const y = pick(b).toLowerCase();
    return x < y ? -1 : x > y ? 1 : 0;
  };
}

function byNumber(pick: (t: Task) => number): Comparator {
  return (a, b) => pick(a) - pick(b);
}

/** Dated tasks first, chronologically; undated tasks last */
function byDue(a: Task, b: Task): number {
  if (a.due === b.due) return 0;
  if (a.due == null) return 1;
  if (b.due == null) return -1;
  return a.due < b.due ? -1 : 1;
}

const COMPARATORS: Record<TaskProperty, Comparator> = {
  name: byText(t => t.name),
  type: byText(t => t.type ?? NO_TYPE),
  desc: byText(t => t.desc),
  due: byDue,
  rep: byNumber(t => RepeatRank[t.rep]),
  prio: byNumber(t => PriorityRank[t.prio]),
  done: byNumber(t => (t.done ? 1 : 0)),
  ctime: byNumber(t => t.ctime),
  id: byNumber(t => t.id),
};

/** Stable sort; ties keep their incoming order in both directions */
export function sortTasks(tasks: readonly Task[], sort: SortSpec): Task[] {
  const compare = COMPARATORS[sort.key];
  const sign = sort.direction === 'desc' ? -1 : 1;
  return [...tasks].sort((a, b) => sign * compare(a, b));
}

export function selectTasks(
  tasks: readonly Task[],
  filter: TaskFilter | null,
  sort: SortSpec,
): Task[] {
  const selected = filter ? tasks.filter(t => matchesFilter(t, filter)) : tasks;
  return sortTasks(selected, sort);
}

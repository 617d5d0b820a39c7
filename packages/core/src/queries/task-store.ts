/**
 * Sole owner of the task collection and the id counter. Every mutation runs
 * after validation and touches the database in a single statement, so a
 * rejected command leaves the store as it was.
 */

import type { TaskmgrDb } from '../db.js';
import { createDb } from '../db.js';
import type { NewTaskFields, Task, TaskId } from '../types/task.js';
import { PROTECTED_PROPERTIES } from '../types/task.js';
import type { DataResult, TaskResult } from '../types/results.js';
import { DEFAULT_PRIORITY } from '../types/priority.js';
import { DEFAULT_REPEAT } from '../types/repeat.js';
import { toEpochSeconds } from '../parsers/date-parser.js';
import type { FieldChange, SortSpec, TaskFilter } from '../commands/types.js';
import {
  getTaskById, getAllTasks, countTasks, insertTask, updateTask,
  deleteTaskById, deleteTasksByIds,
} from './task-queries.js';
import { matchesFilter, selectTasks } from './task-helpers.js';

export interface TaskStoreOptions {
  db?: TaskmgrDb;
  /** Clock used for ctime */
  now?: () => Date;
}

export class TaskStore {
  private db: TaskmgrDb;
  private now: () => Date;
  private nextId: TaskId = 0;

  constructor(options: TaskStoreOptions = {}) {
    this.db = options.db ?? createDb();
    this.now = options.now ?? (() => new Date());
  }

  get size(): number { return countTasks(this.db); }

  get(taskId: TaskId): Task | null {
    return getTaskById(this.db, taskId);
  }

  /** Tasks in creation order */
  all(): Task[] {
    return getAllTasks(this.db);
  }

  select(filter: TaskFilter | null, sort: SortSpec): Task[] {
    return selectTasks(this.all(), filter, sort);
  }

  /** Create a task. Inputs are already validated, so this cannot fail. */
  add(fields: NewTaskFields): Task {
    const task: Task = {
      id: this.nextId,
      name: fields.name,
      type: fields.type ?? null,
      desc: fields.desc ?? '',
      due: fields.due ?? null,
      rep: fields.rep ?? DEFAULT_REPEAT,
      prio: fields.prio ?? DEFAULT_PRIORITY,
      done: false,
      ctime: toEpochSeconds(this.now()),
    };
    insertTask(this.db, task);
    this.nextId += 1;
    return task;
  }

  /** Overwrite one field. id, ctime and done are refused. */
  modify(taskId: TaskId, change: FieldChange): TaskResult {
    const task = getTaskById(this.db, taskId);
    if (!task) return { type: 'not-found', taskId };
    if (PROTECTED_PROPERTIES.has(change.property)) {
      return { type: 'error', message: `Property '${change.property}' of task ${taskId} cannot be modified` };
    }

    updateTask(this.db, applyChange(task, change));
    return { type: 'success', message: `Set ${change.property} of task ${taskId}` };
  }

  /** Mark a task done. Completing a done task again is a no-change. */
  complete(taskId: TaskId): TaskResult {
    const task = getTaskById(this.db, taskId);
    if (!task) return { type: 'not-found', taskId };
    if (task.done) return { type: 'no-change', message: `Task ${taskId} is already done` };

    updateTask(this.db, { ...task, done: true });
    return { type: 'success', message: `Task ${taskId} done` };
  }

  delete(taskId: TaskId): TaskResult {
    const task = getTaskById(this.db, taskId);
    if (!task) return { type: 'not-found', taskId };

    deleteTaskById(this.db, taskId);
    return { type: 'success', message: `Deleted task ${taskId}` };
  }

  /** Delete every task matching the filter. Matching nothing is not-found. */
  deleteWhere(filter: TaskFilter): DataResult<TaskId[]> {
    const ids = this.all().filter(t => matchesFilter(t, filter)).map(t => t.id);
    if (ids.length === 0) return { type: 'not-found', taskId: null };

    deleteTasksByIds(this.db, ids);
    return { type: 'success', data: ids, message: `Deleted ${ids.length} task(s)` };
  }
}

function applyChange(task: Task, change: FieldChange): Task {
  switch (change.property) {
    case 'name': return { ...task, name: change.value };
    case 'type': return { ...task, type: change.value };
    case 'desc': return { ...task, desc: change.value };
    case 'due': return { ...task, due: change.value };
    case 'rep': return { ...task, rep: change.value };
    case 'prio': return { ...task, prio: change.value };
    // Protected; refused before reaching here
    case 'done':
    case 'id':
    case 'ctime':
      return task;
  }
}

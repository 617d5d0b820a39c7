/**
 * Row-level task operations using Drizzle ORM. Identity and validation live
 * in TaskStore; these functions only move rows.
 */

import { asc, count, eq, inArray } from 'drizzle-orm';
import type { TaskmgrDb } from '../db.js';
import type { Task, TaskId } from '../types/task.js';
import { tasks } from '../schema/tasks.js';

/** Map a Drizzle row to a Task */
function toTask(row: typeof tasks.$inferSelect): Task {
  return {
    id: row.id,
    name: row.name,
    type: row.type,
    desc: row.desc,
    due: row.due,
    rep: row.rep,
    prio: row.prio,
    done: row.done,
    ctime: row.ctime,
  };
}

export function getTaskById(db: TaskmgrDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/** All tasks in creation order */
export function getAllTasks(db: TaskmgrDb): Task[] {
  return db.select().from(tasks).orderBy(asc(tasks.id)).all().map(toTask);
}

export function countTasks(db: TaskmgrDb): number {
  const row = db.select({ n: count() }).from(tasks).get();
  return row?.n ?? 0;
}

export function insertTask(db: TaskmgrDb, task: Task): void {
  db.insert(tasks).values({
    id: task.id,
    name: task.name,
    type: task.type,
    desc: task.desc,
    due: task.due,
    rep: task.rep,
    prio: task.prio,
    done: task.done,
    ctime: task.ctime,
  }).run();
}

/** Write back every mutable field. id and ctime are never part of the update. */
export function updateTask(db: TaskmgrDb, task: Task): void {
  db.update(tasks).set({
    name: task.name,
    type: task.type,
    desc: task.desc,
    due: task.due,
    rep: task.rep,
    prio: task.prio,
    done: task.done,
  }).where(eq(tasks.id, task.id)).run();
}

export function deleteTaskById(db: TaskmgrDb, taskId: TaskId): void {
  db.delete(tasks).where(eq(tasks.id, taskId)).run();
}

/** Delete several tasks in one statement */
export function deleteTasksByIds(db: TaskmgrDb, taskIds: readonly TaskId[]): void {
  if (taskIds.length === 0) return;
  db.delete(tasks).where(inArray(tasks.id, [...taskIds])).run();
}

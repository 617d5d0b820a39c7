import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import type { Priority } from '../types/priority.js';
import type { Repeat } from '../types/repeat.js';

export const tasks = sqliteTable('tasks', {
  /** Assigned by the store, never by SQLite */
  id: integer('id').primaryKey(),
  name: text('name').notNull(),
  type: text('type'),
  desc: text('description').notNull().default(''),
  /** yyyy-MM-dd */
  due: text('due'),
  rep: text('rep').$type<Repeat>().notNull(),
  prio: text('prio').$type<Priority>().notNull(),
  done: integer('done', { mode: 'boolean' }).notNull().default(false),
  /** Epoch seconds, frozen at creation */
  ctime: integer('ctime').notNull(),
});

import type { Priority } from './priority.js';
import type { Repeat } from './repeat.js';

export type TaskId = number;

/** Calendar date in yyyy-MM-dd form; compares chronologically as a string */
export type CanonicalDate = string;

export interface Task {
  readonly id: TaskId;
  readonly name: string;
  readonly type: string | null;
  readonly desc: string;
  readonly due: CanonicalDate | null;
  readonly rep: Repeat;
  readonly prio: Priority;
  readonly done: boolean;
  readonly ctime: number; // epoch seconds
}

/** Fields supplied by `add`; the store fills in id, done and ctime */
export interface NewTaskFields {
  readonly name: string;
  readonly type?: string | null;
  readonly desc?: string;
  readonly due?: CanonicalDate | null;
  readonly rep?: Repeat;
  readonly prio?: Priority;
}

export const TASK_PROPERTIES = [
  'name', 'type', 'desc', 'due', 'rep', 'prio', 'done', 'ctime', 'id',
] as const;

export type TaskProperty = (typeof TASK_PROPERTIES)[number];

/** Properties that `mod` may never change */
export const PROTECTED_PROPERTIES: ReadonlySet<TaskProperty> = new Set(['id', 'ctime', 'done']);

export function isTaskProperty(value: string): value is TaskProperty {
  return TASK_PROPERTIES.some(property => property === value);
}

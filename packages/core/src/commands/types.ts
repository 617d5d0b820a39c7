import type { CanonicalDate, NewTaskFields, TaskId, TaskProperty } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import type { Repeat } from '../types/repeat.js';

/** A validated argument value; the tag says which rules it passed */
export type TypedValue =
  | { readonly tag: 'string'; readonly value: string }
  | { readonly tag: 'integer'; readonly value: number }
  | { readonly tag: 'date'; readonly value: CanonicalDate | null }
  | { readonly tag: 'boolean'; readonly value: boolean }
  | { readonly tag: 'priority'; readonly value: Priority }
  | { readonly tag: 'repeat'; readonly value: Repeat };

export type SortDirection = 'asc' | 'desc';

export interface SortSpec {
  readonly key: TaskProperty;
  readonly direction: SortDirection;
}

export const DEFAULT_SORT: SortSpec = { key: 'name', direction: 'asc' };

export interface TaskFilter {
  readonly property: TaskProperty;
  readonly value: TypedValue;
}

/** One field overwrite requested by `mod` */
export type FieldChange =
  | { readonly property: 'name'; readonly value: string }
  | { readonly property: 'type'; readonly value: string }
  | { readonly property: 'desc'; readonly value: string }
  | { readonly property: 'due'; readonly value: CanonicalDate | null }
  | { readonly property: 'rep'; readonly value: Repeat }
  | { readonly property: 'prio'; readonly value: Priority }
  | { readonly property: 'done'; readonly value: boolean }
  | { readonly property: 'id' | 'ctime'; readonly value: string };

export type DeleteTarget =
  | { readonly by: 'id'; readonly id: TaskId }
  | { readonly by: 'filter'; readonly filter: TaskFilter };

/** A fully validated command, ready to run against the store */
export type Command =
  | { readonly kind: 'help' }
  | { readonly kind: 'print'; readonly sort: SortSpec }
  | { readonly kind: 'add'; readonly fields: NewTaskFields }
  | { readonly kind: 'list'; readonly filter: TaskFilter; readonly sort: SortSpec }
  | { readonly kind: 'mod'; readonly id: TaskId; readonly change: FieldChange }
  | { readonly kind: 'done'; readonly id: TaskId }
  | { readonly kind: 'delete'; readonly target: DeleteTarget };

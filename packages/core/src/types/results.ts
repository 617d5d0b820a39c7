import type { TaskId } from './task.js';
import type { ErrorKind } from './errors.js';

/** Outcome of a single store mutation */
export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: TaskId | null }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: TaskId | null }
  | { readonly type: 'error'; readonly message: string };

/** What the interpreter produced for one command line */
export type CommandOutcome =
  | { readonly type: 'success'; readonly line: string; readonly body: readonly string[] }
  | { readonly type: 'error'; readonly kind: ErrorKind; readonly line: string; readonly detail: string };

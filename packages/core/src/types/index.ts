export { Priority, PriorityRank, DEFAULT_PRIORITY, isPriority } from './priority.js';
export { Repeat, RepeatRank, DEFAULT_REPEAT, isRepeat } from './repeat.js';
export { TASK_PROPERTIES, PROTECTED_PROPERTIES, isTaskProperty } from './task.js';
export type { TaskId, CanonicalDate, Task, NewTaskFields, TaskProperty } from './task.js';
export { ErrorKind, CommandError, isCommandError } from './errors.js';
export type { TaskResult, DataResult, CommandOutcome } from './results.js';

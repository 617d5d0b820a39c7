// Types
export {
  Priority, PriorityRank, DEFAULT_PRIORITY, isPriority,
  Repeat, RepeatRank, DEFAULT_REPEAT, isRepeat,
  TASK_PROPERTIES, PROTECTED_PROPERTIES, isTaskProperty,
  ErrorKind, CommandError, isCommandError,
} from './types/index.js';
export type {
  TaskId, CanonicalDate, Task, NewTaskFields, TaskProperty,
  TaskResult, DataResult, CommandOutcome,
} from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb } from './db.js';
export type { TaskmgrDb } from './db.js';

// Parsers
export * from './parsers/index.js';

// Commands
export { COMMAND_NAMES, COMMAND_SCHEMAS, isCommandName } from './commands/schema.js';
export type { CommandName, CommandSchema, ValueShape } from './commands/schema.js';
export { parseCommand } from './commands/parser.js';
export type { ParsedCommand, ShapedValue } from './commands/parser.js';
export { validateCommand } from './commands/validator.js';
export { DEFAULT_SORT } from './commands/types.js';
export type {
  Command, TypedValue, SortSpec, SortDirection, TaskFilter, FieldChange, DeleteTarget,
} from './commands/types.js';

// Queries
export { TaskStore } from './queries/task-store.js';
export type { TaskStoreOptions } from './queries/task-store.js';
export { displayValue, matchesFilter, sortTasks, selectTasks } from './queries/task-helpers.js';

// Interpreter
export { Interpreter, isCommandLine } from './interpreter/interpreter.js';
export {
  TABLE_HEADER, successLine, errorLine, formatTaskRow, formatTaskTable, helpLines,
} from './interpreter/reporter.js';

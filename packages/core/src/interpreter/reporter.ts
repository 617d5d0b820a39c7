/**
 * Formats everything the interpreter prints: one status line per command,
 * plus the task table for print/list and the usage lines for help.
 */

import type { ErrorKind } from '../types/errors.js';
import type { Task } from '../types/task.js';
import { TASK_PROPERTIES } from '../types/task.js';
import { COMMAND_NAMES, COMMAND_SCHEMAS } from '../commands/schema.js';
import { displayValue } from '../queries/task-helpers.js';

const COLUMN_SEPARATOR = ' | ';

export const TABLE_HEADER = 'Name | Type | Desc | Due | Rep | Prio | Done | Ctime | Id';

export function successLine(commandText: string): string {
  return `Command success: ${commandText}`;
}

export function errorLine(kind: ErrorKind, commandText: string): string {
  return `Error ${kind}: ${commandText}`;
}

export function formatTaskRow(task: Task): string {
  return TASK_PROPERTIES.map(p => displayValue(task, p)).join(COLUMN_SEPARATOR);
}

/** Header, then each task followed by an empty line */
export function formatTaskTable(tasks: readonly Task[]): string[] {
  const lines = [TABLE_HEADER];
  for (const task of tasks) {
    lines.push(formatTaskRow(task), '');
  }
  return lines;
}

export function helpLines(): string[] {
  return COMMAND_NAMES.map(name => COMMAND_SCHEMAS[name].usage);
}

/**
 * Runs one command line through tokenize → parse → validate → store and
 * reports the outcome. Nothing thrown inside a command escapes `execute`.
 */

import { CommandError, ErrorKind, isCommandError } from '../types/errors.js';
import type { CommandOutcome, DataResult, TaskResult } from '../types/results.js';
import { tokenize } from '../parsers/tokenizer.js';
import { parseCommand } from '../commands/parser.js';
import { validateCommand } from '../commands/validator.js';
import type { Command } from '../commands/types.js';
import { TaskStore } from '../queries/task-store.js';
import { successLine, errorLine, formatTaskTable, helpLines } from './reporter.js';

const LINE_ENDING_RE = /\r?\n$/;

/** Blank lines and `#` comments are skipped without reaching the interpreter */
export function isCommandLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed !== '' && !trimmed.startsWith('#');
}

/** Raise the store's failure as the matching command error */
function expectSuccess<T>(result: TaskResult | DataResult<T>): void {
  switch (result.type) {
    case 'success':
    case 'no-change':
      return;
    case 'not-found':
      throw new CommandError(
        ErrorKind.TaskNotFound,
        result.taskId == null ? 'No task matched' : `Could not find task with id ${result.taskId}`,
      );
    case 'error':
      throw new CommandError(ErrorKind.InvalidArgument, result.message);
  }
}

export class Interpreter {
  readonly store: TaskStore;

  constructor(store: TaskStore = new TaskStore()) {
    this.store = store;
  }

  execute(line: string): CommandOutcome {
    const text = line.replace(LINE_ENDING_RE, '');
    try {
      const command = validateCommand(parseCommand(tokenize(text)));
      const body = this.apply(command);
      return { type: 'success', line: successLine(text), body };
    } catch (err: unknown) {
      if (isCommandError(err)) {
        return { type: 'error', kind: err.kind, line: errorLine(err.kind, text), detail: err.message };
      }
      const detail = err instanceof Error ? err.message : String(err);
      return {
        type: 'error',
        kind: ErrorKind.InvalidArgument,
        line: errorLine(ErrorKind.InvalidArgument, text),
        detail: `Unexpected failure: ${detail}`,
      };
    }
  }

  /** Execute every command line in order, skipping blanks and comments */
  run(lines: Iterable<string>): CommandOutcome[] {
    const outcomes: CommandOutcome[] = [];
    for (const line of lines) {
      if (isCommandLine(line)) outcomes.push(this.execute(line));
    }
    return outcomes;
  }

  private apply(command: Command): string[] {
    switch (command.kind) {
      case 'help':
        return helpLines();
      case 'print':
        return formatTaskTable(this.store.select(null, command.sort));
      case 'list':
        return formatTaskTable(this.store.select(command.filter, command.sort));
      case 'add':
        this.store.add(command.fields);
        return [];
      case 'mod':
        expectSuccess(this.store.modify(command.id, command.change));
        return [];
      case 'done':
        expectSuccess(this.store.complete(command.id));
        return [];
      case 'delete':
        expectSuccess(command.target.by === 'id'
          ? this.store.delete(command.target.id)
          : this.store.deleteWhere(command.target.filter));
        return [];
    }
  }
}

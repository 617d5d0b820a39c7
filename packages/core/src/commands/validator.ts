/**
 * Field-level rules applied after the schema check. The first failing rule
 * decides the error; nothing is accumulated.
 *
 * Stored enum literals must match exactly (`prio=HIGH`). Values used only to
 * look tasks up (`list`, `delete` by property) are matched without regard to
 * case, so `val=high` and `val=true` are accepted there, and a value that
 * fits no task simply selects nothing.
 */

import { CommandError, ErrorKind } from '../types/errors.js';
import { isPriority } from '../types/priority.js';
import type { Priority } from '../types/priority.js';
import { isRepeat } from '../types/repeat.js';
import type { Repeat } from '../types/repeat.js';
import { isTaskProperty } from '../types/task.js';
import type { CanonicalDate, NewTaskFields, TaskProperty } from '../types/task.js';
import { parseDueDate, NO_DATE } from '../parsers/date-parser.js';
import type { ParsedCommand, ShapedValue } from './parser.js';
import { DEFAULT_SORT } from './types.js';
import type {
  Command, FieldChange, SortDirection, SortSpec, TaskFilter, TypedValue,
} from './types.js';

const DIGITS_RE = /^\d+$/;
const SORT_DIRECTIONS: readonly SortDirection[] = ['asc', 'desc'];

// --- Single-value rules ---

export function validateDate(text: string): CanonicalDate | null {
  if (text === NO_DATE) return null;
  const date = parseDueDate(text);
  if (date == null) {
    throw new CommandError(ErrorKind.InvalidDateFormat, `'${text}' is not a DD-MM-YYYY date`);
  }
  return date;
}

export function validatePriority(text: string): Priority {
  if (!isPriority(text)) {
    throw new CommandError(ErrorKind.InvalidPriority, `'${text}' is not one of LOW, MEDIUM, HIGH`);
  }
  return text;
}

export function validateRepeat(text: string): Repeat {
  if (!isRepeat(text)) {
    throw new CommandError(ErrorKind.InvalidRepeat, `'${text}' is not one of NONE, DAILY, WEEKLY, MONTHLY`);
  }
  return text;
}

export function validateDoneStatus(text: string): boolean {
  if (text === 'True') return true;
  if (text === 'False') return false;
  throw new CommandError(ErrorKind.InvalidDoneStatus, `'${text}' is not True or False`);
}

export function validateProperty(text: string): TaskProperty {
  if (!isTaskProperty(text)) {
    throw new CommandError(ErrorKind.InvalidArgument, `Unknown property '${text}'`);
  }
  return text;
}

/** Free-form text: an unquoted number is the wrong type */
function validateText(key: string, value: ShapedValue): string {
  if (value.shape !== 'integer' && !value.quoted && DIGITS_RE.test(value.text)) {
    throw new CommandError(ErrorKind.InvalidArgumentType, `'${key}' expects text, got number ${value.text}`);
  }
  return value.text;
}

function validateName(key: string, value: ShapedValue): string {
  const name = validateText(key, value);
  if (name.trim() === '') {
    throw new CommandError(ErrorKind.MissingArguments, 'A task needs a non-empty name');
  }
  return name;
}

// --- Argument access ---

function arg(parsed: ParsedCommand, key: string): ShapedValue | undefined {
  return parsed.args.get(key);
}

function requireArg(parsed: ParsedCommand, key: string): ShapedValue {
  const value = parsed.args.get(key);
  if (value === undefined) {
    throw new CommandError(ErrorKind.MissingArguments, `'${parsed.name}' requires '${key}'`);
  }
  return value;
}

function requireId(parsed: ParsedCommand): number {
  const value = requireArg(parsed, 'id');
  if (value.shape !== 'integer') {
    throw new CommandError(ErrorKind.InvalidArgumentType, `'id' expects an integer, got '${value.text}'`);
  }
  return value.value;
}

// --- Composite rules ---

export function validateSort(parsed: ParsedCommand): SortSpec {
  const sortBy = arg(parsed, 'sort_by');
  const direction = arg(parsed, 'direction');

  const key = sortBy ? validateProperty(sortBy.text) : DEFAULT_SORT.key;
  let dir = DEFAULT_SORT.direction;
  if (direction) {
    const found = SORT_DIRECTIONS.find(d => d === direction.text);
    if (!found) {
      throw new CommandError(ErrorKind.InvalidArgument, `Unknown direction '${direction.text}', use asc or desc`);
    }
    dir = found;
  }
  return { key, direction: dir };
}

/**
 * Type a lookup value according to the property it is compared with. A value
 * that does not parse for its property stays text and so matches no task.
 */
export function validateFilterValue(property: TaskProperty, text: string): TypedValue {
  const asText: TypedValue = { tag: 'string', value: text };
  switch (property) {
    case 'name':
    case 'type':
    case 'desc':
    case 'ctime':
      return asText;
    case 'due': {
      if (text.toUpperCase() === NO_DATE) return { tag: 'date', value: null };
      const date = parseDueDate(text);
      return date == null ? asText : { tag: 'date', value: date };
    }
    case 'rep': {
      const rep = text.toUpperCase();
      return isRepeat(rep) ? { tag: 'repeat', value: rep } : asText;
    }
    case 'prio': {
      const prio = text.toUpperCase();
      return isPriority(prio) ? { tag: 'priority', value: prio } : asText;
    }
    case 'done': {
      const done = text.toLowerCase();
      if (done === 'true') return { tag: 'boolean', value: true };
      if (done === 'false') return { tag: 'boolean', value: false };
      return asText;
    }
    case 'id':
      return DIGITS_RE.test(text) ? { tag: 'integer', value: Number(text) } : asText;
  }
}

export function validateFilter(parsed: ParsedCommand): TaskFilter {
  const property = validateProperty(requireArg(parsed, 'property').text);
  const value = validateFilterValue(property, requireArg(parsed, 'val').text);
  return { property, value };
}

export function validateChange(property: TaskProperty, value: ShapedValue): FieldChange {
  switch (property) {
    case 'name':
      return { property, value: validateName('new_val', value) };
    case 'type':
    case 'desc':
      return { property, value: validateText('new_val', value) };
    case 'due':
      return { property, value: validateDate(value.text) };
    case 'rep':
      return { property, value: validateRepeat(value.text) };
    case 'prio':
      return { property, value: validatePriority(value.text) };
    case 'done':
      return { property, value: validateDoneStatus(value.text) };
    case 'id':
    case 'ctime':
      return { property, value: value.text };
  }
}

function validateAdd(parsed: ParsedCommand): NewTaskFields {
  const name = validateName('name', requireArg(parsed, 'name'));
  const type = arg(parsed, 'type');
  const desc = arg(parsed, 'desc');
  const rep = arg(parsed, 'rep');
  const prio = arg(parsed, 'prio');
  const due = arg(parsed, 'due');

  return {
    name,
    type: type ? validateText('type', type) : null,
    desc: desc ? validateText('desc', desc) : '',
    rep: rep ? validateRepeat(rep.text) : undefined,
    prio: prio ? validatePriority(prio.text) : undefined,
    due: due ? validateDate(due.text) : null,
  };
}

/** Turn a schema-checked command into a typed Command, or throw the first rule it breaks */
export function validateCommand(parsed: ParsedCommand): Command {
  switch (parsed.name) {
    case 'help':
      return { kind: 'help' };
    case 'print':
      return { kind: 'print', sort: validateSort(parsed) };
    case 'add':
      return { kind: 'add', fields: validateAdd(parsed) };
    case 'list': {
      const filter = validateFilter(parsed);
      return { kind: 'list', filter, sort: validateSort(parsed) };
    }
    case 'mod': {
      const id = requireId(parsed);
      const property = validateProperty(requireArg(parsed, 'property').text);
      return { kind: 'mod', id, change: validateChange(property, requireArg(parsed, 'new_val')) };
    }
    case 'done':
      return { kind: 'done', id: requireId(parsed) };
    case 'delete':
      if (parsed.args.has('id')) {
        return { kind: 'delete', target: { by: 'id', id: requireId(parsed) } };
      }
      return { kind: 'delete', target: { by: 'filter', filter: validateFilter(parsed) } };
  }
}

/**
 * Static argument schemas for every command the interpreter accepts.
 */

/** Coarse value shapes checked before any field-level validation */
export type ValueShape =
  /** Free-form text; an unquoted all-digit value is rejected */
  | 'string'
  /** Non-negative integer literal */
  | 'integer'
  /** Any word; its meaning is decided by the validator */
  | 'token';

export const COMMAND_NAMES = ['help', 'print', 'add', 'list', 'mod', 'done', 'delete'] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export interface CommandSchema {
  /** Every key the command accepts, with its shape */
  readonly args: Readonly<Record<string, ValueShape>>;
  /**
   * Alternative sets of required keys. One set must be fully present; keys
   * belonging only to another set may not appear alongside it.
   */
  readonly requires: readonly (readonly string[])[];
  readonly usage: string;
}

const SORT_ARGS = { sort_by: 'token', direction: 'token' } as const;

export const COMMAND_SCHEMAS: Readonly<Record<CommandName, CommandSchema>> = {
  help: {
    args: {},
    requires: [[]],
    usage: 'help',
  },
  print: {
    args: { ...SORT_ARGS },
    requires: [[]],
    usage: 'print [sort_by=<prop>] [direction=<asc|desc>]',
  },
  add: {
    args: {
      name: 'string',
      type: 'string',
      desc: 'string',
      due: 'token',
      rep: 'token',
      prio: 'token',
    },
    requires: [['name']],
    usage: 'add name=<name> [type=<type>] [desc=<desc>] [due=<DD-MM-YYYY>] '
      + '[rep=<NONE|DAILY|WEEKLY|MONTHLY>] [prio=<LOW|MEDIUM|HIGH>]',
  },
  list: {
    args: { property: 'token', val: 'token', ...SORT_ARGS },
    requires: [['property', 'val']],
    usage: 'list property=<prop> val=<value> [sort_by=<prop>] [direction=<asc|desc>]',
  },
  mod: {
    args: { id: 'integer', property: 'token', new_val: 'token' },
    requires: [['id', 'property', 'new_val']],
    usage: 'mod id=<id> property=<prop> new_val=<value>',
  },
  done: {
    args: { id: 'integer' },
    requires: [['id']],
    usage: 'done id=<id>',
  },
  delete: {
    args: { id: 'integer', property: 'token', val: 'token' },
    requires: [['id'], ['property', 'val']],
    usage: 'delete id=<id> | delete property=<prop> val=<value>',
  },
};

export function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some(name => name === value);
}

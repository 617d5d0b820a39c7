/**
 * Checks a tokenized line against its command schema: known command, known
 * and unique keys, required keys present, coarse value shapes.
 */

import { CommandError, ErrorKind } from '../types/errors.js';
import type { TokenizedLine } from '../parsers/tokenizer.js';
import { COMMAND_SCHEMAS, isCommandName } from './schema.js';
import type { CommandName, CommandSchema, ValueShape } from './schema.js';

export type ShapedValue =
  | { readonly shape: 'string'; readonly text: string; readonly quoted: boolean }
  | { readonly shape: 'integer'; readonly text: string; readonly value: number }
  | { readonly shape: 'token'; readonly text: string; readonly quoted: boolean };

export interface ParsedCommand {
  readonly name: CommandName;
  readonly args: ReadonlyMap<string, ShapedValue>;
}

const DIGITS_RE = /^\d+$/;

function checkKeys(name: CommandName, schema: CommandSchema, line: TokenizedLine): Set<string> {
  const seen = new Set<string>();
  for (const { key } of line.args) {
    if (!Object.prototype.hasOwnProperty.call(schema.args, key)) {
      throw new CommandError(ErrorKind.TooManyArguments, `'${name}' does not take '${key}'`);
    }
    if (seen.has(key)) {
      throw new CommandError(ErrorKind.TooManyArguments, `'${key}' given more than once`);
    }
    seen.add(key);
  }
  return seen;
}

function checkRequired(name: CommandName, schema: CommandSchema, present: Set<string>): void {
  const chosen = schema.requires.find(set => set.every(k => present.has(k)));
  if (!chosen) {
    throw new CommandError(ErrorKind.MissingArguments, `Usage: ${schema.usage}`);
  }

  const conflicting = schema.requires
    .filter(set => set !== chosen)
    .flat()
    .filter(k => !chosen.includes(k) && present.has(k));
  if (conflicting.length > 0) {
    throw new CommandError(
      ErrorKind.TooManyArguments,
      `'${name}' cannot combine ${chosen.join(', ')} with ${conflicting.join(', ')}`,
    );
  }
}

function shapeValue(key: string, shape: ValueShape, raw: string, quoted: boolean): ShapedValue {
  switch (shape) {
    case 'string':
      if (!quoted && DIGITS_RE.test(raw)) {
        throw new CommandError(ErrorKind.InvalidArgumentType, `'${key}' expects text, got number ${raw}`);
      }
      return { shape, text: raw, quoted };
    case 'integer': {
      const value = Number(raw);
      if (!DIGITS_RE.test(raw) || !Number.isSafeInteger(value)) {
        throw new CommandError(ErrorKind.InvalidArgumentType, `'${key}' expects a non-negative integer, got '${raw}'`);
      }
      return { shape, text: raw, value };
    }
    case 'token':
      return { shape, text: raw, quoted };
  }
}

export function parseCommand(line: TokenizedLine): ParsedCommand {
  if (!isCommandName(line.command)) {
    throw new CommandError(ErrorKind.InvalidArgument, `Unknown command '${line.command}'`);
  }

  const name = line.command;
  const schema = COMMAND_SCHEMAS[name];
  const present = checkKeys(name, schema, line);
  checkRequired(name, schema, present);

  const args = new Map<string, ShapedValue>();
  for (const { key, raw, quoted } of line.args) {
    const shape = schema.args[key] ?? 'token';
    args.set(key, shapeValue(key, shape, raw, quoted));
  }

  return { name, args };
}

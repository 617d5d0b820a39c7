import { describe, it, expect } from 'vitest';
import { tokenize } from '../../src/parsers/tokenizer.js';
import { parseCommand } from '../../src/commands/parser.js';
import { errorKindOf } from '../helpers.js';

const parse = (line: string) => parseCommand(tokenize(line));

describe('parseCommand', () => {
  it('returns shaped values keyed by argument name', () => {
    const parsed = parse('mod id=3 property="due" new_val="01-01-2026"');
    expect(parsed.name).toBe('mod');
    expect(parsed.args.get('id')).toEqual({ shape: 'integer', text: '3', value: 3 });
    expect(parsed.args.get('property')).toEqual({ shape: 'token', text: 'due', quoted: true });
    expect(parsed.args.get('new_val')).toEqual({ shape: 'token', text: '01-01-2026', quoted: true });
  });

  it('accepts optional arguments', () => {
    const parsed = parse('print sort_by=prio direction=desc');
    expect([...parsed.args.keys()]).toEqual(['sort_by', 'direction']);
  });

  // --- Command names ---

  it('rejects unknown commands as InvalidArgument', () => {
    expect(errorKindOf(() => parse('remove id=1'))).toBe('InvalidArgument');
  });

  it('matches command names case-sensitively', () => {
    expect(errorKindOf(() => parse('ADD name="x"'))).toBe('InvalidArgument');
  });

  // --- Keys ---

  it('rejects keys outside the schema', () => {
    expect(errorKindOf(() => parse('add name="x" color="red"'))).toBe('TooManyArguments');
  });

  it('rejects a key given twice', () => {
    expect(errorKindOf(() => parse('add name="x" name="y"'))).toBe('TooManyArguments');
  });

  it('rejects any argument to help', () => {
    expect(errorKindOf(() => parse('help now=1'))).toBe('TooManyArguments');
  });

  it('reports unknown keys before missing ones', () => {
    expect(errorKindOf(() => parse('add bogus=1'))).toBe('TooManyArguments');
  });

  it('reports a missing required key', () => {
    expect(errorKindOf(() => parse('add type="x"'))).toBe('MissingArguments');
    expect(errorKindOf(() => parse('mod id=0 property="name"'))).toBe('MissingArguments');
    expect(errorKindOf(() => parse('list property="type"'))).toBe('MissingArguments');
    expect(errorKindOf(() => parse('done'))).toBe('MissingArguments');
  });

  // --- Alternatives ---

  it('accepts either delete form', () => {
    expect(parse('delete id=0').args.has('id')).toBe(true);
    expect(parse('delete property="type" val="School"').args.size).toBe(2);
  });

  it('rejects a half-given delete filter', () => {
    expect(errorKindOf(() => parse('delete property="type"'))).toBe('MissingArguments');
  });

  it('rejects mixing both delete forms', () => {
    expect(errorKindOf(() => parse('delete id=0 property="type" val="X"'))).toBe('TooManyArguments');
  });

  // --- Shapes ---

  it('rejects an unquoted numeral where text is expected', () => {
    expect(errorKindOf(() => parse('add name=123'))).toBe('InvalidArgumentType');
  });

  it('accepts a quoted numeral as text', () => {
    expect(parse('add name="123"').args.get('name')).toEqual({ shape: 'string', text: '123', quoted: true });
  });

  it('rejects a non-integer id', () => {
    expect(errorKindOf(() => parse('done id=abc'))).toBe('InvalidArgumentType');
    expect(errorKindOf(() => parse('done id=-1'))).toBe('InvalidArgumentType');
    expect(errorKindOf(() => parse('done id=1.5'))).toBe('InvalidArgumentType');
  });
});

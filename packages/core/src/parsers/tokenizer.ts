/**
 * Splits one command line into its command word and ordered key=value
 * tokens. Values may be "double quoted", 'single quoted' or bare; quotes are
 * stripped and remembered so the parser can tell `name=12` from `name="12"`.
 */

import { CommandError, ErrorKind } from '../types/errors.js';

export const MAX_LINE_LENGTH = 1024;

export interface ArgToken {
  readonly key: string;
  readonly raw: string;
  readonly quoted: boolean;
}

export interface TokenizedLine {
  readonly command: string;
  readonly args: readonly ArgToken[];
}

const COMMAND_RE = /^\s*(\w+)/;
// Each token must be preceded by whitespace; sticky so nothing is skipped
const ARG_RE = /\s+(\w+)\s*=\s*(?:"([^"]*)"|'([^']*)'|(\S+))/y;
const TRAILING_SPACE_RE = /^\s*$/;

export function tokenize(line: string): TokenizedLine {
  // Counted in code points, not UTF-16 units
  const length = [...line].length;
  if (length > MAX_LINE_LENGTH) {
    throw new CommandError(
      ErrorKind.TooLongLine,
      `Line has ${length} characters, the limit is ${MAX_LINE_LENGTH}`,
    );
  }

  const head = COMMAND_RE.exec(line);
  if (!head) {
    throw new CommandError(ErrorKind.InvalidArgument, 'Line does not start with a command word');
  }

  const args: ArgToken[] = [];
  let pos = head[0].length;

  while (!TRAILING_SPACE_RE.test(line.slice(pos))) {
    ARG_RE.lastIndex = pos;
    const m = ARG_RE.exec(line);
    if (!m) {
      throw new CommandError(
        ErrorKind.InvalidArgument,
        `Expected key=value at column ${pos + 1}, found '${line.slice(pos).trim()}'`,
      );
    }

    const bare = m[4];
    const quotedValue = m[2] ?? m[3];
    args.push({
      key: m[1]!,
      raw: quotedValue ?? bare ?? '',
      quoted: quotedValue !== undefined,
    });
    pos = ARG_RE.lastIndex;
  }

  return { command: head[1]!, args };
}

/**
 * CLI helpers: reading the command file, error handling.
 */

import { existsSync, readFileSync } from 'node:fs';
import * as out from './output.js';

/** Split file contents into lines, dropping the empty tail after a final newline */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Read a command file, or null when it does not exist */
export function readCommandLines(path: string): string[] | null {
  if (!existsSync(path)) return null;
  return splitLines(readFileSync(path, 'utf-8'));
}

/**
 * Run a command action, reporting a thrown error instead of crashing.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

/**
 * chalk-based output. Status lines keep their exact text; colour is only
 * added when the terminal supports it.
 */

import chalk from 'chalk';
import { TABLE_HEADER } from '@taskmgr/core';
import type { CommandOutcome } from '@taskmgr/core';

const detectedLevel = chalk.level;

export function setColorEnabled(enabled: boolean): void {
  chalk.level = enabled ? detectedLevel : 0;
}

// --- Command output ---

export function printOutcome(outcome: CommandOutcome, verbose = false): void {
  switch (outcome.type) {
    case 'success':
      success(outcome.line);
      for (const line of outcome.body) {
        info(line === TABLE_HEADER ? chalk.bold(line) : line);
      }
      break;
    case 'error':
      error(outcome.line);
      if (verbose) debug(`${outcome.kind}: ${outcome.detail}`);
      break;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function info(message: string): void {
  console.log(message);
}

/** Diagnostics go to stderr so stdout stays one line per command */
export function debug(message: string): void {
  console.error(chalk.dim(message));
}

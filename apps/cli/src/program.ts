import { Command } from 'commander';
import { Interpreter } from '@taskmgr/core';
import * as out from './output.js';
import { readCommandLines, $try } from './helpers.js';
import { resolveConfig } from './config.js';
import type { CliConfig, CliOptions } from './config.js';

export const VERSION = '1.0.0';

/** Exit code for a missing input file */
export const EXIT_NO_INPUT = 2;

/**
 * Feed the file's lines to a fresh interpreter, printing one outcome per
 * command. Returns false when the file does not exist.
 */
export function runFile(config: CliConfig, interpreter = new Interpreter()): boolean {
  const lines = readCommandLines(config.inputPath);
  if (lines == null) {
    out.error(`Input file not found: ${config.inputPath}`);
    return false;
  }

  for (const outcome of interpreter.run(lines)) {
    out.printOutcome(outcome, config.verbose);
  }
  return true;
}

export function createProgram(): Command {
  return new Command()
    .name('taskmgr')
    .description('Command-driven task manager')
    .version(VERSION)
    .argument('<input-file>', 'File of commands, one per line')
    .option('--no-color', 'Disable coloured output')
    .option('-v, --verbose', 'Print diagnostic detail for failed commands to stderr')
    .action((inputFile: string, opts: CliOptions) => $try(() => {
      const config = resolveConfig(inputFile, opts);
      out.setColorEnabled(config.color);
      if (!runFile(config)) process.exitCode = EXIT_NO_INPUT;
    }));
}

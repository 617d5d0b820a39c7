/**
 * Resolves CLI settings. Priority: explicit option > environment > default.
 */

export interface CliOptions {
  color?: boolean;
  verbose?: boolean;
}

export interface CliConfig {
  readonly inputPath: string;
  readonly color: boolean;
  readonly verbose: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

function envFlag(value: string | undefined): boolean {
  return value != null && TRUTHY.has(value.toLowerCase());
}

export function resolveConfig(inputPath: string, opts: CliOptions, env: Env = process.env): CliConfig {
  // NO_COLOR disables colour whenever it is set to a non-empty value
  const noColorEnv = (env['NO_COLOR'] ?? '') !== '';
  return {
    inputPath,
    color: opts.color !== false && !noColorEnv,
    verbose: opts.verbose ?? envFlag(env['TASKMGR_VERBOSE']),
  };
}

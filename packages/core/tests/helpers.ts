import { isCommandError } from '../src/types/errors.js';

/** The ErrorKind a call throws, null when it returns, 'unexpected' for other errors */
export function errorKindOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err: unknown) {
    return isCommandError(err) ? err.kind : 'unexpected';
  }
}

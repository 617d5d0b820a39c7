import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { TABLE_HEADER } from '@taskmgr/core';
import { printOutcome, setColorEnabled } from '../src/output.js';

describe('printOutcome', () => {
  let log: MockInstance<typeof console.log>;
  let err: MockInstance<typeof console.error>;

  beforeEach(() => {
    setColorEnabled(false);
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    err = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the success line then the body', () => {
    printOutcome({ type: 'success', line: 'Command success: print', body: [TABLE_HEADER] });
    expect(log.mock.calls).toEqual([['Command success: print'], [TABLE_HEADER]]);
  });

  it('prints only the error line by default', () => {
    printOutcome({
      type: 'error',
      kind: 'TaskNotFound',
      line: 'Error TaskNotFound: done id=100',
      detail: 'Could not find task with id 100',
    });
    expect(log.mock.calls).toEqual([['Error TaskNotFound: done id=100']]);
    expect(err).not.toHaveBeenCalled();
  });

  it('writes the detail to stderr when verbose', () => {
    printOutcome({
      type: 'error',
      kind: 'TaskNotFound',
      line: 'Error TaskNotFound: done id=100',
      detail: 'Could not find task with id 100',
    }, true);
    expect(err.mock.calls).toEqual([['TaskNotFound: Could not find task with id 100']]);
  });
});

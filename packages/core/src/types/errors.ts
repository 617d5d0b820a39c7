export const ErrorKind = {
  InvalidArgument: 'InvalidArgument',
  MissingArguments: 'MissingArguments',
  TooManyArguments: 'TooManyArguments',
  InvalidArgumentType: 'InvalidArgumentType',
  InvalidDateFormat: 'InvalidDateFormat',
  InvalidRepeat: 'InvalidRepeat',
  InvalidPriority: 'InvalidPriority',
  InvalidDoneStatus: 'InvalidDoneStatus',
  TaskNotFound: 'TaskNotFound',
  TooLongLine: 'TooLongLine',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/**
 * Raised anywhere in the command pipeline. Only `kind` reaches the user;
 * the message is diagnostic detail.
 */
export class CommandError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = 'CommandError';
    this.kind = kind;
  }
}

export function isCommandError(err: unknown): err is CommandError {
  return err instanceof CommandError;
}

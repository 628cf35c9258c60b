// src/errors.ts

export type InterpreterErrorKind = 'read' | 'write' | 'unbalanced-parens';

/** Base class for every fatal error raised while a program runs. */
export abstract class InterpreterError extends Error {
  abstract readonly kind: InterpreterErrorKind;
}

/** The input collaborator failed. */
export class ReadError extends InterpreterError {
  readonly kind = 'read';

  constructor(cause: unknown) {
    super(`read failed: ${describeCause(cause)}`, { cause });
    this.name = 'ReadError';
  }
}

/** The output collaborator failed. */
export class WriteError extends InterpreterError {
  readonly kind = 'write';

  constructor(cause: unknown) {
    super(`write failed: ${describeCause(cause)}`, { cause });
    this.name = 'WriteError';
  }
}

/** A `]` ran while no loop was open. */
export class UnbalancedParensError extends InterpreterError {
  readonly kind = 'unbalanced-parens';

  constructor(public readonly pc: number) {
    super(`unbalanced ']' at instruction ${pc}`);
    this.name = 'UnbalancedParensError';
  }
}

export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

/** Node's errno code (`EPIPE`, `EAGAIN`, ...) of an error's cause, if any. */
export const causeCode = (err: InterpreterError): string | undefined => {
  const cause = err.cause;
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
};

// src/errors.ts
export type ErrorKind = 'unmatched-close' | 'unmatched-open' | 'out-of-bounds' | 'input' | 'output';

export abstract class BfError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public readonly position: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A `]` with no pending `[`. `position` is its index in the filtered program. */
export class UnmatchedCloseError extends BfError {
  readonly kind = 'unmatched-close';

  constructor(position: number) {
    super(`Unmatched ']' at instruction ${position}`, position);
    this.name = 'UnmatchedCloseError';
  }
}

/** `position` is the innermost `[` still open when the source ended. */
export class UnmatchedOpenError extends BfError {
  readonly kind = 'unmatched-open';

  constructor(position: number, public readonly count: number) {
    super(
      count === 1
        ? `Unmatched '[' at instruction ${position}`
        : `${count} unmatched '[', innermost at instruction ${position}`,
      position,
    );
    this.name = 'UnmatchedOpenError';
  }
}

export class OutOfBoundsError extends BfError {
  readonly kind = 'out-of-bounds';

  constructor(position: number) {
    super(`Data pointer moved below cell 0 at PC=${position}`, position);
    this.name = 'OutOfBoundsError';
  }
}

/** No byte available, or the source handed back something that is not a byte (`value`). */
export class InputError extends BfError {
  readonly kind = 'input';
  readonly value: number | undefined;

  constructor(position: number, options: { cause?: unknown; value?: number } = {}) {
    super(
      options.value === undefined
        ? `No input available at PC=${position}`
        : `Input ${options.value} is not a byte at PC=${position}`,
      position,
      'cause' in options ? { cause: options.cause } : undefined,
    );
    this.name = 'InputError';
    this.value = options.value;
  }
}

/** The output sink threw; the thrown value is the `cause`. */
export class OutputError extends BfError {
  readonly kind = 'output';

  constructor(position: number, options: { cause?: unknown } = {}) {
    super(`Output failed at PC=${position}`, position, options);
    this.name = 'OutputError';
  }
}

export type TranslateError = UnmatchedCloseError | UnmatchedOpenError;
export type RuntimeError = OutOfBoundsError | InputError | OutputError;

/**
 * Raised by `multiPartition` when an item satisfies none of the predicates.
 * Always a bug in the predicate set or an unexpected record shape.
 */
export class UnclassifiedItemError<T = unknown> extends Error {
  constructor(public readonly item: T) {
    super('Item did not match any predicate');
    this.name = 'UnclassifiedItemError';
  }
}

/**
 * Base class for input records that cannot be used. `path` is dotted,
 * e.g. `member_list.3.age`.
 */
export class RecordValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'RecordValidationError';
  }
}

export class MissingFieldError extends RecordValidationError {
  constructor(path: string) {
    super(`Missing required field: ${path}`, path);
    this.name = 'MissingFieldError';
  }
}

export class InvalidFieldError extends RecordValidationError {
  constructor(path: string, detail: string) {
    super(`Invalid field ${path}: ${detail}`, path);
    this.name = 'InvalidFieldError';
  }
}

export class InvalidEmailError extends Error {
  constructor(public readonly address: string) {
    super(`Invalid email address: ${address}`);
    this.name = 'InvalidEmailError';
  }
}

export class InvalidReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidReportError';
  }
}

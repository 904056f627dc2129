export class AutofillInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AutofillInvariantError';
  }
}

export class ResponseValidationError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(message);
    this.name = 'ResponseValidationError';
    this.errors = errors;
  }
}

export class RequestFailedError extends Error {
  readonly requestType: 'query' | 'upload';
  readonly reason: unknown;

  constructor(requestType: 'query' | 'upload', message: string, reason?: unknown) {
    super(message);
    this.name = 'RequestFailedError';
    this.requestType = requestType;
    this.reason = reason;
  }
}

/**
 * Programming defects abort the current operation instead of producing wrong data.
 */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new AutofillInvariantError(message);
  }
}

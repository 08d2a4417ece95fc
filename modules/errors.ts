//NOTE: One error class per failure point of the lifecycle.
//NOTE: Components throw these; the lifecycle turns the first one into a failed outcome.

export type LifecycleErrorCode =
  | 'INPUT_VALIDATION'
  | 'CLONE'
  | 'MUTATION'
  | 'COMMIT'
  | 'PUSH'
  | 'PR_CREATE'
  | 'PR_FETCH'
  | 'STATUS_TRANSPORT'
  | 'STATUS_FAILED'
  | 'STATUS_TIMEOUT'
  | 'STATUS_CANCELLED'
  | 'NOT_MERGEABLE'
  | 'MERGE'
  | 'TEARDOWN';

export class LifecycleError extends Error {
  constructor(
    message: string,
    public readonly code: LifecycleErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LifecycleError';
  }
}

export class InputValidationError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INPUT_VALIDATION', options);
    this.name = 'InputValidationError';
  }
}

export class CloneError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CLONE', options);
    this.name = 'CloneError';
  }
}

//NOTE: Message is the callback's own message, unchanged
export class MutationError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'MUTATION', options);
    this.name = 'MutationError';
  }
}

export class CommitError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'COMMIT', options);
    this.name = 'CommitError';
  }
}

export class PushError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PUSH', options);
    this.name = 'PushError';
  }
}

export class PRCreateError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PR_CREATE', options);
    this.name = 'PRCreateError';
  }
}

export class PRFetchError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PR_FETCH', options);
    this.name = 'PRFetchError';
  }
}

export class StatusTransportError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STATUS_TRANSPORT', options);
    this.name = 'StatusTransportError';
  }
}

export class StatusFailedError extends LifecycleError {
  constructor(
    message: string,
    public readonly context: string,
    public readonly state: string
  ) {
    super(message, 'STATUS_FAILED');
    this.name = 'StatusFailedError';
  }
}

export class StatusTimeoutError extends LifecycleError {
  constructor(
    message: string,
    public readonly context: string,
    public readonly timeoutMs: number
  ) {
    super(message, 'STATUS_TIMEOUT');
    this.name = 'StatusTimeoutError';
  }
}

export class StatusCancelledError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STATUS_CANCELLED', options);
    this.name = 'StatusCancelledError';
  }
}

export class NotMergeableError extends LifecycleError {
  constructor(
    message: string,
    public readonly mergeable: boolean | null
  ) {
    super(message, 'NOT_MERGEABLE');
    this.name = 'NotMergeableError';
  }
}

export class MergeError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'MERGE', options);
    this.name = 'MergeError';
  }
}

export class TeardownError extends LifecycleError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'TEARDOWN', options);
    this.name = 'TeardownError';
  }
}

export function isLifecycleError(error: unknown): error is LifecycleError {
  return error instanceof LifecycleError;
}

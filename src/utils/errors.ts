/**
 * Error taxonomy shared by every component
 */

/** Bad input: unknown stage, missing close reason, malformed configuration */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  constructor(
    readonly entity: string,
    readonly id: number | string
  ) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

/** Network or collaborator failure; retried on the next scheduled run only */
export class TransientIOError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientIOError';
  }
}

/** A broken invariant that the contracts are meant to rule out */
export class ConsistencyViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConsistencyViolation';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

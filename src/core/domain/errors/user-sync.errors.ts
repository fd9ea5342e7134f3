/**
 * Base class for every error raised by the user sync core
 */
export abstract class UserSyncError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Any failure reported by the record store or its transport
 */
export class StoreError extends UserSyncError {
  constructor(
    public readonly collection: string,
    public readonly operation: string,
    public readonly cause?: unknown,
  ) {
    super(`Failed to ${operation} ${collection}: ${describeCause(cause)}`);
  }
}

/**
 * A required identifying field is missing from an event payload
 */
export class ValidationError extends UserSyncError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
  }
}

/**
 * A record that must exist for the operation was not found
 */
export class NotFoundError extends UserSyncError {
  constructor(
    public readonly collection: string,
    public readonly id: string,
  ) {
    super(`Record not found in ${collection} with ID: ${id}`);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (cause === undefined) {
    return 'unknown error';
  }
  return String(cause);
}

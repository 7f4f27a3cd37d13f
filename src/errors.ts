import type { FieldPath } from './utils/field-path';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Thrown when the values document cannot be read or parsed.
 *
 * The message is the underlying cause, so a boundary layer can surface it
 * directly as the failure detail.
 */
export class ValuesReadError extends Error {
  public readonly location: string;
  public override readonly cause: unknown;

  constructor(location: string, cause: unknown) {
    super(describeCause(cause));
    this.name = 'ValuesReadError';
    this.location = location;
    this.cause = cause;
    Object.setPrototypeOf(this, ValuesReadError.prototype);
  }
}

/**
 * Thrown when the merged values document cannot be written back.
 *
 * The in-memory merge succeeded but the edit did not land.
 */
export class ValuesWriteError extends Error {
  public readonly location: string;
  public override readonly cause: unknown;

  constructor(location: string, cause: unknown) {
    super(describeCause(cause));
    this.name = 'ValuesWriteError';
    this.location = location;
    this.cause = cause;
    Object.setPrototypeOf(this, ValuesWriteError.prototype);
  }
}

/**
 * Thrown when a submitted update is not a mapping.
 */
export class InvalidUpdateError extends Error {
  public readonly path: FieldPath;

  constructor(path: FieldPath, received: string) {
    super(
      `InvalidUpdateError: expected a mapping at "${path || '<root>'}", received ${received}.`
    );
    this.name = 'InvalidUpdateError';
    this.path = path;
    Object.setPrototypeOf(this, InvalidUpdateError.prototype);
  }
}

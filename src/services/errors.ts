/**
 * Paste lifecycle error taxonomy.
 *
 * Every error carries the HTTP status and machine-readable code that the
 * error handler puts on the wire. Anything that is not an AppError is an
 * internal failure (500).
 */

export interface FieldError {
  field: string;
  message: string;
}

export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly code: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or out-of-bound input. */
export class ValidationError extends AppError {
  constructor(readonly details: FieldError[]) {
    super("Validation failed", 400, "VALIDATION_ERROR");
  }
}

/** Absent, soft-deleted or expired paste. The three are indistinguishable to callers. */
export class PasteNotFoundError extends AppError {
  constructor(id: string) {
    super(`Paste not found: ${id}`, 404, "PASTE_NOT_FOUND");
  }
}

/** Password-protected paste read without the right password. */
export class PasteAccessDeniedError extends AppError {
  constructor() {
    super("Invalid password", 403, "ACCESS_DENIED");
  }
}

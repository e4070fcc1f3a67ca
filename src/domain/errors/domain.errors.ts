/**
 * Base class for failures surfaced by the stores and the access policy layer.
 * `code` is stable and safe to expose to clients; `message` is human readable.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required field is missing or a field holds a value outside its allowed set. */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    readonly field: string,
    readonly value: unknown,
    message = `Invalid value for '${field}'`,
  ) {
    super(message);
  }
}

/** A uniqueness (or other storage-level) invariant would be broken. */
export class ConstraintViolation extends DomainError {
  readonly code = 'CONSTRAINT_VIOLATION';

  constructor(
    readonly field: string,
    message = `Constraint violated on '${field}'`,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The access policy (or the elevated-trust check) rejected the operation. */
export class AuthorizationDenied extends DomainError {
  readonly code = 'AUTHORIZATION_DENIED';

  constructor(
    readonly operation: string,
    message = `Not authorized to ${operation}`,
  ) {
    super(message);
  }
}

/** The underlying store failed; nothing from the in-flight operation was kept. */
export class StoreUnavailable extends DomainError {
  readonly code = 'STORE_UNAVAILABLE';

  constructor(
    readonly operation: string,
    cause?: unknown,
  ) {
    super(`Store unavailable during ${operation}`, { cause });
  }
}

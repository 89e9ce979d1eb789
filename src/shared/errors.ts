/**
 * Error taxonomy for shift retrieval.
 *
 * Every error carries a `kind` so the route layer can tell a caller mistake
 * (`InvalidParameters`) apart from a credentials or portal problem.
 */

export type ErrorKind =
  | 'InvalidParameters'
  | 'CredentialsRejected'
  | 'TransportFailure'
  | 'SessionExpired'
  | 'RemoteError';

export type LoginErrorKind = Extract<ErrorKind, 'CredentialsRejected' | 'TransportFailure'>;

export abstract class ShiftServiceError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed caller input; raised before any network call */
export class InvalidParametersError extends ShiftServiceError {
  readonly kind = 'InvalidParameters';
}

/** Network error, timeout, or an unusable response unrelated to auth */
export class TransportError extends ShiftServiceError {
  readonly kind = 'TransportFailure';
}

export class LoginError extends ShiftServiceError {
  readonly kind: LoginErrorKind;

  constructor(kind: LoginErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
  }
}

/** Expiry detected and the single relogin-and-retry did not recover */
export class SessionExpiredError extends ShiftServiceError {
  readonly kind = 'SessionExpired';
}

export class RemoteError extends ShiftServiceError {
  readonly kind = 'RemoteError';
  readonly status: number;

  constructor(status: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.status = status;
  }
}

export function isShiftServiceError(error: unknown): error is ShiftServiceError {
  return error instanceof ShiftServiceError;
}

export type ErrorKind =
  | "ValidationError"
  | "DuplicateEmail"
  | "InvalidCredentials"
  | "NotPermitted"
  | "NotFound"
  | "InvalidState"
  | "TransactionFailure";

const STATUS: Record<ErrorKind, number> = {
  ValidationError: 400,
  DuplicateEmail: 409,
  InvalidCredentials: 401,
  NotPermitted: 403,
  NotFound: 404,
  InvalidState: 409,
  TransactionFailure: 500,
};

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly details?: unknown;

  constructor(kind: ErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.details = details;
  }

  get status(): number {
    return STATUS[this.kind];
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super("ValidationError", message, details);
  }
}

export class DuplicateEmailError extends AppError {
  constructor(message = "Email already in use") {
    super("DuplicateEmail", message);
  }
}

export class InvalidCredentialsError extends AppError {
  constructor() {
    // same text whether the email is unknown or the password is wrong
    super("InvalidCredentials", "Invalid credentials");
  }
}

export class NotPermittedError extends AppError {
  constructor(message = "Not permitted") {
    super("NotPermitted", message);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string) {
    super("NotFound", `${entity} not found`);
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string) {
    super("InvalidState", message);
  }
}

export class TransactionFailureError extends AppError {
  constructor(message = "Transaction failed", cause?: unknown) {
    super("TransactionFailure", message);
    if (cause !== undefined) this.cause = cause;
  }
}

export interface ErrorResult {
  kind: ErrorKind | "InternalError";
  message: string;
  details?: unknown;
}

export function toErrorResult(err: unknown): ErrorResult {
  if (err instanceof AppError) {
    return err.details === undefined
      ? { kind: err.kind, message: err.message }
      : { kind: err.kind, message: err.message, details: err.details };
  }
  return { kind: "InternalError", message: "Internal server error" };
}

/** Anything that escapes a transaction body as a non-domain error is a commit failure. */
export function asTransactionFailure(err: unknown): AppError {
  if (err instanceof AppError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TransactionFailureError(`Transaction failed: ${message}`, err);
}

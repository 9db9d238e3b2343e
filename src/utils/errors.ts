export type LedgerErrorCode =
  | "InvalidInput"
  | "NotFound"
  | "Unauthorized"
  | "InvalidState"
  | "LimitExceeded"
  | "TransferFailed";

export class LedgerError extends Error {
  constructor(
    readonly code: LedgerErrorCode,
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends LedgerError {
  constructor(message: string) {
    super("InvalidInput", message, 400);
  }
}

export class NotFoundError extends LedgerError {
  constructor(message: string) {
    super("NotFound", message, 404);
  }
}

export class UnauthorizedError extends LedgerError {
  // 403 for a known caller lacking the capability, 401 when no usable identity was presented.
  constructor(message: string, status: 401 | 403 = 403) {
    super("Unauthorized", message, status);
  }
}

export class InvalidStateError extends LedgerError {
  constructor(message: string) {
    super("InvalidState", message, 409);
  }
}

export class LimitExceededError extends LedgerError {
  constructor(message: string) {
    super("LimitExceeded", message, 422);
  }
}

export class TransferFailedError extends LedgerError {
  constructor(message: string, cause?: unknown) {
    super("TransferFailed", message, 502);
    this.cause = cause;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : "Unknown error";

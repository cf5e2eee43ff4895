export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ValidationFailure extends AppError {
  constructor(message: string, code = "VALIDATION_FAILED", details?: unknown) {
    super(message, 400, code, details);
  }
}

export class AuthorizationFailure extends AppError {
  // 401 when nobody is logged in, 403 when the principal has the wrong role
  constructor(message: string, statusCode: 401 | 403 = 401) {
    super(message, statusCode, statusCode === 401 ? "AUTH_REQUIRED" : "FORBIDDEN");
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

export interface StockShortage {
  cartItemId: string;
  snackId: string;
  snackName: string;
  available: number;
  requested: number;
}

// Stored data no longer lines up, e.g. a cart line whose snack was deleted
export class IntegrityFailure extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 409, "INTEGRITY_FAILURE", details);
  }
}

export class StockFailure extends AppError {
  readonly shortages: StockShortage[];

  constructor(shortages: StockShortage[]) {
    super(
      shortages
        .map((s) => `Only ${s.available} left for ${s.snackName}.`)
        .join(" "),
      409,
      "INSUFFICIENT_STOCK",
      { shortages }
    );
    this.shortages = shortages;
  }
}

// src/errors.ts

/**
 * Errors thrown by services. Controllers print the message and return to the menu;
 * `status` follows the HTTP code for the same failure.
 */
export class ServiceError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string) {
    super(400, message);
  }
}

export class UnauthorizedError extends ServiceError {
  constructor(message = "Invalid username or password") {
    super(401, message);
  }
}

export class InsufficientFundsError extends ServiceError {
  constructor(message = "Insufficient balance for this booking") {
    super(402, message);
  }
}

export class ForbiddenError extends ServiceError {
  constructor(message: string) {
    super(403, message);
  }
}

export class NotFoundError extends ServiceError {
  constructor(resource: string) {
    super(404, `${resource} not found`);
  }
}

export class ConflictError extends ServiceError {
  constructor(message: string) {
    super(409, message);
  }
}

/** A data file exists but cannot be read, parsed or validated. Fatal at start-up. */
export class DataFileError extends Error {
  constructor(public readonly filePath: string, reason: string) {
    super(`Cannot load ${filePath}: ${reason}`);
    this.name = "DataFileError";
  }
}

/** Standard input closed while a prompt was waiting. */
export class EndOfInputError extends Error {
  constructor() {
    super("End of input");
    this.name = "EndOfInputError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

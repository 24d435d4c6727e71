import logger from "./logger";

export type ErrorCode = "CONFIGURATION" | "TRANSPORT" | "PROTOCOL" | "INTERNAL";

// base app error

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly exitCode: number;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(message: string, code: ErrorCode = "INTERNAL", isOperational = true, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = 1;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

// bad flags, missing credentials; raised before any request
export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", details?: unknown) {
    super(message, "CONFIGURATION", true, details);
  }
}

// request could not be built or sent, or timed out
export class TransportError extends AppError {
  constructor(message = "Request to Habitica failed", details?: unknown) {
    super(message, "TRANSPORT", true, details);
  }
}

// undecodable body, success flag false, rejected invite
export class ProtocolError extends AppError {
  constructor(message = "Unexpected response from Habitica", details?: unknown) {
    super(message, "PROTOCOL", true, details);
  }
}

// convert any to AppError
export function handleError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  logger.error("Unhandled error:", { error });

  if (error instanceof Error) {
    return new AppError(error.message, "INTERNAL", false);
  }

  return new AppError("An unexpected error occurred", "INTERNAL", false);
}

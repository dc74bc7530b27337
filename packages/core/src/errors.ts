import type { CodeRejection, RuntimeTrapKind } from "./types";

export class AppError extends Error {
  constructor(
    public readonly code: string,
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "AppError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super("VALIDATION_ERROR", 400, message);
  }
}

export class AuthError extends AppError {
  constructor(message = "Unauthorized") {
    super("UNAUTHORIZED", 401, message);
  }
}

/**
 * Actor or surface denial. Callers only ever show a generic placeholder for it.
 */
export class AuthorizationError extends AppError {
  constructor(message = "Access denied") {
    super("ACCESS_DENIED", 403, message);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super("NOT_FOUND", 404, `${resource} not found`);
  }
}

export class CodeRejectedError extends AppError {
  constructor(public readonly rejection: CodeRejection) {
    super("CODE_REJECTED", 422, rejection.message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super("CONFLICT", 409, message);
  }
}

/**
 * A failure raised while the snippet body was being evaluated.
 *
 * @param kind - Which trap class fired; every kind is reported separately in the audit log
 * @param details - The engine's message, already scrubbed of host paths
 * @param line - Snippet line the failure points at, when the engine reported one
 */
export class RuntimeTrapError extends AppError {
  constructor(
    public readonly kind: RuntimeTrapKind,
    public readonly details: string,
    public readonly line?: number
  ) {
    super("EXECUTION_ERROR", 500, details);
  }
}

export class TimeoutError extends RuntimeTrapError {
  constructor(timeoutMs: number) {
    super("timeout", `Execution exceeded ${timeoutMs}ms`);
  }
}

export class RateLimitError extends AppError {
  constructor() {
    super("RATE_LIMITED", 429, "Too many requests. Please wait and try again.");
  }
}

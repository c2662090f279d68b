/**
 * Global error handling middleware.
 *
 * - Custom error classes for domain, infrastructure, and validation errors
 * - Structured error logging with metadata capture
 * - Consistent JSON error responses with appropriate status codes
 */
import { logger } from "@infrastructure/logging/Logger";
import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";

export type AppErrorType =
  | "DomainError"
  | "InfrastructureError"
  | "AppError"
  | "ValidationError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class DomainError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "DomainError", statusCode, metadata);
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "InfrastructureError", statusCode, metadata);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    statusOrMeta: number | AppErrorMetadata = 400,
    metadata?: AppErrorMetadata
  ) {
    if (typeof statusOrMeta === "number") {
      super(message, "ValidationError", statusOrMeta, metadata);
    } else {
      super(message, "ValidationError", 400, statusOrMeta);
    }
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Converts anything thrown in a request into an AppError.
 */
export function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  if (err instanceof ZodError) {
    return new ValidationError("Invalid request", { issues: err.issues });
  }

  // body-parser errors carry their HTTP status
  const statusCode =
    err &&
    typeof err === "object" &&
    typeof (err as { status?: unknown }).status === "number"
      ? Number((err as { status: number }).status)
      : 500;

  const message =
    err instanceof Error && err.message ? err.message : "Internal Server Error";

  if (statusCode >= 400 && statusCode < 500) {
    return new ValidationError(message, statusCode);
  }

  return new InfrastructureError(message, statusCode);
}

export function notFoundHandler(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  next(
    new DomainError(`Route not found: ${req.method} ${req.path}`, 404, {
      method: req.method,
      path: req.path,
    })
  );
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);
  const status = appError.statusCode ?? 500;

  logger.log(status >= 500 ? "error" : "warn", "Request failed", {
    type: appError.type,
    statusCode: status,
    message: appError.message,
    metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
    originalError: appError === err ? undefined : String(err),
  });

  res.status(status).json({
    error: {
      message: appError.message,
      code: appError.type,
      details: appError.metadata ?? {},
    },
  });
}

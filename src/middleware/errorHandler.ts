/**
 * Global error handling middleware for the memory gateway.
 *
 * Error classes for the gateway's failure taxonomy and the Express handler
 * that turns them into `{ detail }` JSON responses:
 * - ServiceUnavailableError (503): the memory engine never initialized
 * - EngineFailureError (500): the engine call threw; its message is passed on
 * - ValidationError (422): the request body or query did not match its schema
 *
 * The HTTP status is the only failure signal; bodies carry a diagnostic
 * message and no error codes.
 */
import { logger } from "@infrastructure/logging/Logger";
import type { Request, Response, NextFunction } from "express";

export type AppErrorType =
  | "AppError"
  | "ServiceUnavailableError"
  | "EngineFailureError"
  | "ValidationError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode = 500,
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

export class ServiceUnavailableError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "ServiceUnavailableError", 503, metadata);
  }
}

export class EngineFailureError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "EngineFailureError", 500, metadata);
  }
}

export class ValidationError extends AppError {
  public readonly issues: readonly unknown[];

  constructor(message: string, issues: readonly unknown[] = []) {
    super(message, "ValidationError", 422, { issueCount: issues.length });
    this.issues = issues;
  }
}

function readStatus(err: object): number | undefined {
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

function toAppError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }

  const message =
    err instanceof Error && err.message ? err.message : "Internal Server Error";
  const status =
    err && typeof err === "object" ? readStatus(err) ?? 500 : 500;

  return new AppError(message, "AppError", status, {
    originalError: String(err),
  });
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const appError = toAppError(err);
  const status = appError.statusCode;

  logger.log(status >= 500 ? "error" : "warn", "REQUEST_FAILED", {
    method: req.method,
    path: req.path,
    type: appError.type,
    statusCode: status,
    message: appError.message,
    metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
  });

  if (appError instanceof ValidationError) {
    res.status(status).json({
      detail: appError.message,
      issues: appError.issues,
    });
    return;
  }

  res.status(status).json({ detail: appError.message });
}

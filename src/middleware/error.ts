import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import type { Logger } from "../utils/logger.js";

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code?: string;

  constructor(message: string, statusCode: number, code?: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = statusCode < 500;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "validation_error");
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createErrorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      logger.warn({
        msg: "Validation error",
        errors: err.errors,
      });

      return res.status(400).json({
        error: "validation_error",
        message: "Invalid request data",
        details: err.errors.map((e) => ({
          path: e.path.join("."),
          message: e.message,
        })),
      });
    }

    if (err instanceof AppError) {
      const level = err.isOperational ? "warn" : "error";
      logger[level]({
        msg: err.isOperational ? "Operational error" : "Server error",
        code: err.code,
        statusCode: err.statusCode,
        message: err.message,
      });

      return res.status(err.statusCode).json({
        error: err.code ?? "error",
        message: err.message,
      });
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      const code = isBodyParserError(err) ? "invalid_body" : "bad_request";
      logger.warn({
        msg: "Client error",
        code,
        statusCode: clientStatus,
        error: err.message,
      });

      return res.status(clientStatus).json({
        error: code,
        message: err.message,
      });
    }

    logger.error({
      msg: "Internal server error",
      error: err.message,
      stack: err.stack,
    });

    res.status(500).json({
      error: "internal_error",
      message: err.message,
    });
  };
}

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({
    error: "not_found",
    message: "The requested resource was not found",
  });
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

type HttpErrorLike = {
  message: string;
  status?: unknown;
  statusCode?: unknown;
  type?: unknown;
};

// express and body-parser attach a 4xx `status`/`statusCode` to errors caused by the request
function clientErrorStatus(err: Error): number | null {
  const candidate: HttpErrorLike = err;
  const status = typeof candidate.status === "number" ? candidate.status : candidate.statusCode;
  if (typeof status === "number" && Number.isInteger(status) && status >= 400 && status < 500) {
    return status;
  }
  return null;
}

// body-parser also tags its errors with a `type` such as "entity.parse.failed"
function isBodyParserError(err: Error): boolean {
  const candidate: HttpErrorLike = err;
  return typeof candidate.type === "string";
}

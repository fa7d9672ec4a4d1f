// Centralized error handling
import type { Request, Response, NextFunction, RequestHandler } from "express";

export type AppErrorOptions = {
  isOperational?: boolean;
  code?: string;
  details?: unknown;
  cause?: unknown;
};

export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;
  code: string | null;
  details: unknown;

  constructor(message: string, statusCode: number = 500, options?: AppErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "AppError";
    this.statusCode = statusCode;
    this.isOperational = options?.isOperational ?? true;
    this.code = options?.code ?? null;
    this.details = options?.details ?? null;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

export const asyncHandler =
  (fn: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

export const errorHandler = (err: Error, _req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }

  const isDev = process.env.NODE_ENV === "development";
  if (isDev) {
    console.error("Error:", err);
  } else {
    console.error("Error:", err.message);
  }

  if (err instanceof AppError) {
    const payload: Record<string, unknown> = { error: err.message };
    if (err.code) payload.code = err.code;
    if (err.details) payload.details = err.details;
    if (isDev && err.stack) payload.stack = err.stack;
    return res.status(err.statusCode).json(payload);
  }

  // body-parser rejects malformed JSON with a SyntaxError carrying status 400
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    return res.status(400).json({ error: "Malformed JSON body", code: "bad_json" });
  }

  if (err.message?.includes("duplicate key")) {
    return res.status(409).json({ error: "Resource already exists" });
  }

  if (err.message?.includes("violates foreign key")) {
    return res.status(400).json({ error: "Invalid reference" });
  }

  res.status(500).json({
    error: process.env.NODE_ENV === "production" ? "Internal server error" : err.message,
    ...(isDev && { stack: err.stack }),
  });
};

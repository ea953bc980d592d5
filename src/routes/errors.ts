import type { NextFunction, Request, Response } from "express";
import type { ZodError } from "zod";
import { ValidationError, isDeckError } from "../errors";

export type ErrorBody = { success: false; error: { code: string; message: string } };

export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (isDeckError(err)) {
    return { status: err.status, body: { success: false, error: { code: err.code, message: err.message } } };
  }
  return {
    status: 500,
    body: { success: false, error: { code: "INTERNAL_ERROR", message: "Internal server error." } },
  };
}

/** Client errors are answered quietly; only 5xx get logged. */
export function sendError(res: Response, err: unknown, where: string): void {
  const { status, body } = toErrorResponse(err);
  if (status >= 500) console.error(`Error in ${where}:`, err);
  res.status(status).json(body);
}

export function validationError(error: ZodError): ValidationError {
  const issue = error.issues[0];
  const where = issue?.path.join(".");
  return new ValidationError(where ? `${where}: ${issue?.message}` : issue?.message ?? "Invalid request body.");
}

// Catches what the routers do not, e.g. express.json() parse failures.
export function errorMiddleware(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof SyntaxError) {
    sendError(res, new ValidationError("Request body is not valid JSON."), `${req.method} ${req.path}`);
    return;
  }
  sendError(res, err, `${req.method} ${req.path}`);
}

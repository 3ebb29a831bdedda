import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { logger } from "../core/logger";
import { EngineError, toErrorPayload, type ErrorKind } from "../core/errors";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  AuthenticationRequired: 401,
  NotFound: 404,
  Validation: 400,
  Config: 400,
  SessionUnavailable: 503,
  StorageUnavailable: 503,
  ExtractionTimeout: 504,
  ExtractionFailed: 502,
  WorkflowFailed: 502,
  Cancelled: 409,
  Internal: 500,
};

export function statusForError(error: unknown): number {
  if (error instanceof ZodError) return 400;
  if (error instanceof EngineError) {
    if (error.kind === "Cancelled" && error.code === "OPERATION_TIMEOUT") return 504;
    return STATUS_BY_KIND[error.kind];
  }
  return 500;
}

export function errorBody(error: unknown): { error: ReturnType<typeof toErrorPayload> } {
  if (error instanceof ZodError) {
    const message = error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
    return { error: { kind: "Validation", message, code: "REQUEST_INVALID" } };
  }
  return { error: toErrorPayload(error) };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusForError(err);
  const body = errorBody(err);

  if (status >= 500 && !(err instanceof EngineError)) {
    logger.error({ err, path: req.path }, "Unhandled error");
  } else {
    logger.warn({ kind: body.error.kind, code: body.error.code, path: req.path, status }, body.error.message);
  }
  res.status(status).json(body);
}

import type { Request, Response, NextFunction } from "express";
import { ValidateError } from "@tsoa/runtime";
import { isEngineError } from "@calm-routes/engine";

function statusOf(err: Error): number {
  const status: unknown = "status" in err ? err.status : undefined;
  return typeof status === "number" && status >= 400 && status < 600 ? status : 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ValidateError) {
    console.warn(`[validation] ${JSON.stringify(err.fields)}`);
    res.status(422).json({
      message: "Validation failed",
      details: err.fields,
    });
    return;
  }

  if (isEngineError(err)) {
    console.warn(`[error] ${err.code}: ${err.message}`);
    res.status(err.status).json({ message: err.message, code: err.code });
    return;
  }

  if (err instanceof Error) {
    console.error(`[error] ${err.message}`);
    res.status(statusOf(err)).json({ message: err.message });
    return;
  }

  next(err);
}

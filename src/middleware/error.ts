import { Request, Response, NextFunction } from "express";
import { AppError, toErrorResult } from "../domain/errors";
import logger from "../utils/logger";

/** body-parser and friends attach an HTTP status to the errors they raise */
function clientStatus(err: unknown): number | null {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    if (err.status >= 500) logger.error({ err, path: req.path }, "action failed");
    return res.status(err.status).json({ error: toErrorResult(err) });
  }

  const status = clientStatus(err);
  if (status !== null) {
    const message = err instanceof Error ? err.message : "Bad request";
    return res.status(status).json({ error: { kind: "ValidationError", message } });
  }

  logger.error({ err, path: req.path }, "unhandled error");
  return res.status(500).json({ error: toErrorResult(err) });
}

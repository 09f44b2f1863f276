/* src/middleware/authorizeAction.ts */
import { Request, Response, NextFunction } from "express";
import { AppError, NotPermittedError } from "../domain/errors";
import { authorize, type GatedAction } from "../utils/authz";
import { sessionOf } from "./session";

/** Route-level gate; services check again before they touch data. */
export function authorizeAction(action: GatedAction) {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      authorize(sessionOf(req), action);
      next();
    } catch (err) {
      // rejected bearer token: 401, not 403
      if (req.tokenRejected && err instanceof NotPermittedError) {
        return next(new AppError("InvalidCredentials", "Invalid or expired token"));
      }
      next(err);
    }
  };
}

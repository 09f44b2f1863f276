// src/middleware/session.ts
import { Request, Response, NextFunction } from "express";
import { verifyAccessToken } from "../utils/jwt";
import { Session } from "../domain/session";
import logger from "../utils/logger";

/**
 * Builds the request's Session from the bearer token. A missing, bad or
 * expired token leaves the request anonymous; gated routes answer 401 for
 * the rejected token (see authorizeAction).
 */
export function attachSession(req: Request, _res: Response, next: NextFunction) {
  const header = req.headers.authorization || "";
  const token = header.startsWith("Bearer ") ? header.slice(7) : null;
  req.session = Session.anonymous();
  if (!token) return next();

  try {
    const payload = verifyAccessToken(token);
    req.session = Session.forUser(payload.id, payload.isAdmin);
  } catch (err) {
    logger.debug({ err }, "access token rejected");
    req.tokenRejected = true;
  }
  return next();
}

export function sessionOf(req: Request): Session {
  return req.session ?? Session.anonymous();
}

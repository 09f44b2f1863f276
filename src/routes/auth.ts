import { Request, Response, Router } from "express";
import { z } from "zod";
import env from "../config/env";
import { toAccountView, type UserRecord } from "../domain/types";
import { NotPermittedError } from "../domain/errors";
import type { Services } from "../services";
import type { RefreshStore } from "../auth/refreshStore";
import { sessionOf } from "../middleware/session";
import {
  newJti,
  signAccessToken,
  signRefreshToken,
  verifyRefreshToken,
  refreshMs,
  type RefreshPayload,
} from "../utils/jwt";
import { parseInput } from "../utils/validate";
import logger from "../utils/logger";

const REFRESH_COOKIE_NAME = env.REFRESH_COOKIE_NAME;

const cookieOptions = () => ({
  httpOnly: true,
  sameSite: "lax" as const,
  secure: env.NODE_ENV === "production",
});

function readRefreshToken(req: Request): string | null {
  const fromCookie: unknown = req.cookies?.[REFRESH_COOKIE_NAME];
  if (typeof fromCookie === "string" && fromCookie) return fromCookie;
  const fromBody: unknown = req.body?.refreshToken;
  return typeof fromBody === "string" && fromBody ? fromBody : null;
}

const registerSchema = z.object({
  email: z.string().email(),
  name: z.string().min(1).max(100),
  password: z.string().min(1).max(128),
  bio: z.string().max(2000).optional(),
});

const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

export default function authRoutes(services: Services, refreshStore: RefreshStore) {
  const router = Router();

  /** Access token in the body, refresh token in an httpOnly cookie. */
  async function issueTokens(req: Request, res: Response, user: UserRecord) {
    const accessToken = signAccessToken({ id: user.id, email: user.email, name: user.name, isAdmin: user.isAdmin });
    const rtJti = newJti();
    const refreshToken = signRefreshToken({ id: user.id, jti: rtJti });
    await refreshStore.store(user.id, rtJti, { ua: req.headers["user-agent"], ip: req.ip });

    res.cookie(REFRESH_COOKIE_NAME, refreshToken, { ...cookieOptions(), maxAge: refreshMs() });
    return accessToken;
  }

  /** REGISTER */
  router.post("/register", async (req, res, next) => {
    try {
      const input = parseInput(registerSchema, req.body);
      const user = await services.identity.register(input);
      const accessToken = await issueTokens(req, res, user);
      return res.status(201).json({ user: toAccountView(user), accessToken });
    } catch (err) {
      next(err);
    }
  });

  /** LOGIN */
  router.post("/login", async (req, res, next) => {
    try {
      const { email, password } = parseInput(loginSchema, req.body);
      const user = await services.identity.authenticate(sessionOf(req), email, password);
      const accessToken = await issueTokens(req, res, user);
      return res.json({ user: toAccountView(user), accessToken });
    } catch (err) {
      next(err);
    }
  });

  /** REFRESH (rotate RT) */
  router.post("/refresh", async (req, res, next) => {
    const token = readRefreshToken(req);
    if (!token) return res.status(401).json({ error: { kind: "InvalidCredentials", message: "Missing refresh token" } });

    let payload: RefreshPayload;
    try {
      payload = verifyRefreshToken(token);
    } catch {
      return res.status(401).json({ error: { kind: "InvalidCredentials", message: "Invalid refresh token" } });
    }

    try {
      const exists = await refreshStore.has(payload.id, payload.jti);
      if (!exists) {
        return res.status(401).json({ error: { kind: "InvalidCredentials", message: "Refresh session invalid" } });
      }
      await refreshStore.delete(payload.id, payload.jti);

      // re-read so a changed admin flag reaches the new access token
      const user = await services.identity.findUser(payload.id);
      if (!user) return res.status(404).json({ error: { kind: "NotFound", message: "User not found" } });

      const accessToken = await issueTokens(req, res, user);
      return res.json({ accessToken });
    } catch (err) {
      next(err);
    }
  });

  /** LOGOUT (revoke just this RT) */
  router.post("/logout", async (req, res, next) => {
    const token = readRefreshToken(req);
    res.clearCookie(REFRESH_COOKIE_NAME, cookieOptions());
    services.identity.logout(sessionOf(req));
    if (!token) return res.status(204).send();

    let payload: RefreshPayload;
    try {
      payload = verifyRefreshToken(token);
    } catch (err) {
      // an unusable refresh token leaves nothing to revoke
      logger.debug({ err }, "logout with unusable refresh token");
      return res.status(204).send();
    }

    try {
      await refreshStore.delete(payload.id, payload.jti);
      return res.status(204).send();
    } catch (err) {
      next(err);
    }
  });

  /** LOGOUT ALL (revoke all RT sessions) */
  router.post("/logout-all", async (req, res, next) => {
    const token = readRefreshToken(req);
    if (!token) return res.status(401).json({ error: { kind: "InvalidCredentials", message: "Missing refresh token" } });

    let payload: RefreshPayload;
    try {
      payload = verifyRefreshToken(token);
    } catch {
      return res.status(401).json({ error: { kind: "InvalidCredentials", message: "Invalid refresh token" } });
    }

    try {
      await refreshStore.deleteAll(payload.id);
      services.identity.logout(sessionOf(req));
      res.clearCookie(REFRESH_COOKIE_NAME, cookieOptions());
      return res.status(204).send();
    } catch (err) {
      next(err);
    }
  });

  router.get("/me", async (req, res, next) => {
    try {
      const user = await services.identity.currentUser(sessionOf(req));
      if (!user) throw new NotPermittedError("Login required");
      return res.json({ user: toAccountView(user) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

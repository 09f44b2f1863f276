// src/utils/jwt.ts
import jwt, { SignOptions } from "jsonwebtoken";
import ms from "ms";
import crypto from "crypto";
import env from "../config/env";

/**
 * Types for what we embed in tokens
 */
export type AccessPayload = {
  id: string;
  email: string;
  name: string;
  isAdmin: boolean;
  jti: string;
  iat?: number;
  exp?: number;
};

export type RefreshPayload = {
  id: string;
  jti: string;      // refresh session id (Redis)
  iat?: number;
  exp?: number;
};

export function newJti(bytes: number = 16) {
  return crypto.randomBytes(bytes).toString("hex");
}

export function signAccessToken(payload: { id: string; email: string; name: string; isAdmin: boolean }) {
  const body: AccessPayload = { ...payload, jti: newJti() };
  return jwt.sign(body, env.JWT_ACCESS_SECRET, { expiresIn: env.JWT_ACCESS_EXPIRES as SignOptions["expiresIn"] });
}

export function signRefreshToken(payload: { id: string; jti: string }) {
  const body: RefreshPayload = { id: payload.id, jti: payload.jti };
  return jwt.sign(body, env.JWT_REFRESH_SECRET, { expiresIn: env.JWT_REFRESH_EXPIRES as SignOptions["expiresIn"] });
}

function claims(decoded: string | jwt.JwtPayload): jwt.JwtPayload {
  if (typeof decoded === "string") throw new jwt.JsonWebTokenError("unexpected string payload");
  return decoded;
}

/**
 * Verifiers: throw jsonwebtoken errors on bad signature, expiry or shape
 */
export function verifyAccessToken(token: string): AccessPayload {
  const p = claims(jwt.verify(token, env.JWT_ACCESS_SECRET));
  if (typeof p.id !== "string" || typeof p.jti !== "string") {
    throw new jwt.JsonWebTokenError("malformed access token");
  }
  return {
    id: p.id,
    email: String(p.email ?? ""),
    name: String(p.name ?? ""),
    isAdmin: p.isAdmin === true,
    jti: p.jti,
    iat: p.iat,
    exp: p.exp,
  };
}

export function verifyRefreshToken(token: string): RefreshPayload {
  const p = claims(jwt.verify(token, env.JWT_REFRESH_SECRET));
  if (typeof p.id !== "string" || typeof p.jti !== "string") {
    throw new jwt.JsonWebTokenError("malformed refresh token");
  }
  return { id: p.id, jti: p.jti, iat: p.iat, exp: p.exp };
}

/** Refresh cookie lifetime in milliseconds. */
export function refreshMs(): number {
  return ms(env.JWT_REFRESH_EXPIRES);
}

import crypto from "node:crypto";
import type { NextFunction, Request, Response } from "express";
import type { Db } from "./db";
import { getEnv } from "./env";
import type { AppState } from "./state";
import type { Identity } from "./types";

declare module "express-serve-static-core" {
  interface Request {
    identity?: Identity;
    session?: { id: string; csrfToken: string };
  }
}

const SESSION_COOKIE_NAME = "dl_session";

export function sessionCookieName() {
  return SESSION_COOKIE_NAME;
}

export function authMiddleware(state: AppState) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token: unknown = req.cookies?.[SESSION_COOKIE_NAME];
    if (!token || typeof token !== "string") return next();

    const row = state.db
      .prepare(`SELECT id, user_id, csrf_token, expires_at FROM sessions WHERE id = ?`)
      .get(token) as
      | { id: string; user_id: string; csrf_token: string; expires_at: number }
      | undefined;

    if (!row) return next();
    if (row.expires_at <= Date.now()) {
      clearSession(state.db, token);
      return next();
    }

    // Accounts deleted since login stop resolving here.
    const identity = state.resolveIdentity(row.user_id);
    if (!identity) return next();

    req.session = { id: row.id, csrfToken: row.csrf_token };
    req.identity = identity;
    return next();
  };
}

export function requireAuth(req: Request, res: Response, next: NextFunction) {
  if (!req.identity || !req.session) {
    return res.status(401).json({ error: "unauthorized" });
  }
  return next();
}

export function requireAdmin(req: Request, res: Response, next: NextFunction) {
  if (!req.identity || req.identity.role !== "admin") {
    return res.status(403).json({ error: "forbidden" });
  }
  return next();
}

export function requireCsrf(req: Request, res: Response, next: NextFunction) {
  // Only protect state-changing requests; keep GET/HEAD/OPTIONS unblocked.
  const method = req.method.toUpperCase();
  if (method === "GET" || method === "HEAD" || method === "OPTIONS") return next();

  if (!req.session) return res.status(401).json({ error: "unauthorized" });

  const token = req.header("x-csrf-token");
  if (!token || token !== req.session.csrfToken) {
    return res.status(403).json({ error: "csrf" });
  }
  return next();
}

export function newSession(db: Db, userId: string, ttlDays: number) {
  const id = crypto.randomBytes(32).toString("base64url");
  const csrfToken = crypto.randomBytes(32).toString("base64url");
  const now = Date.now();
  const expiresAt = now + ttlDays * 24 * 60 * 60 * 1000;

  db.prepare(
    `INSERT INTO sessions (id, user_id, csrf_token, created_at, expires_at)
     VALUES (?, ?, ?, ?, ?)`
  ).run(id, userId, csrfToken, now, expiresAt);

  return { id, csrfToken, expiresAt };
}

export function clearSession(db: Db, sessionId: string) {
  db.prepare("DELETE FROM sessions WHERE id = ?").run(sessionId);
}

export function clearUserSessions(db: Db, userId: string, keepSessionId?: string) {
  if (keepSessionId) {
    db.prepare("DELETE FROM sessions WHERE user_id = ? AND id <> ?").run(userId, keepSessionId);
  } else {
    db.prepare("DELETE FROM sessions WHERE user_id = ?").run(userId);
  }
}

/** First `x-forwarded-for` hop when present, else the socket address. */
export function clientIp(req: Request) {
  const forwarded = req.header("x-forwarded-for");
  if (forwarded) {
    const first = forwarded.split(",")[0]?.trim();
    if (first) return first;
  }
  return req.socket.remoteAddress ?? "unknown";
}

export function setSessionCookie(res: Response, sessionId: string, expiresAt: number) {
  const env = getEnv();
  const maxAgeMs = Math.max(0, expiresAt - Date.now());
  res.cookie(SESSION_COOKIE_NAME, sessionId, {
    httpOnly: true,
    sameSite: "strict",
    secure: env.NODE_ENV === "production",
    path: "/",
    maxAge: maxAgeMs
  });
}

export function clearSessionCookie(res: Response) {
  const env = getEnv();
  res.clearCookie(SESSION_COOKIE_NAME, {
    httpOnly: true,
    sameSite: "strict",
    secure: env.NODE_ENV === "production",
    path: "/"
  });
}

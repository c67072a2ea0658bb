import { Router } from "express";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import {
  clearSession,
  clearSessionCookie,
  clearUserSessions,
  clientIp,
  newSession,
  sessionCookieName,
  setSessionCookie
} from "../auth";
import { getEnv } from "../env";
import { moduleLogger } from "../logger";
import type { AppState } from "../state";

const log = moduleLogger("auth");

const LoginSchema = z.object({
  username: z.string().trim().min(1).max(64),
  password: z.string().max(256).optional().default("")
});

export function authRoutes(state: AppState) {
  const router = Router();

  const loginLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 25,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "rate_limited" }
  });

  router.post("/login", loginLimiter, async (req, res) => {
    const parsed = LoginSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "invalid_request" });

    const { username, password } = parsed.data;
    const identity = await state.verifyLogin(username, password);
    // Unknown ids and wrong credentials answer the same way.
    if (!identity) {
      log.info({ userId: username }, "login failed");
      return res.status(401).json({ error: "invalid_credentials" });
    }

    const ip = clientIp(req);
    state.logins.record(identity.id, ip);

    clearUserSessions(state.db, identity.id);
    const session = newSession(state.db, identity.id, getEnv().SESSION_TTL_DAYS);
    setSessionCookie(res, session.id, session.expiresAt);

    log.info({ userId: identity.id, role: identity.role, ip }, "login");
    return res.json({ user: identity, csrfToken: session.csrfToken });
  });

  router.post("/logout", (req, res) => {
    const sessionId: unknown = req.cookies?.[sessionCookieName()];
    if (sessionId && typeof sessionId === "string") {
      clearSession(state.db, sessionId);
    }
    clearSessionCookie(res);
    return res.json({ ok: true });
  });

  router.get("/csrf", (req, res) => {
    if (!req.session) return res.status(401).json({ error: "unauthorized" });
    return res.json({ csrfToken: req.session.csrfToken });
  });

  return router;
}

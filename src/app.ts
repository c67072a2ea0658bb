import express, { type NextFunction, type Request, type Response } from "express";
import helmet from "helmet";
import cookieParser from "cookie-parser";
import cors from "cors";
import rateLimit from "express-rate-limit";
import pinoHttp from "pino-http";
import { nanoid } from "nanoid";
import type { AnnouncementsClient } from "./announcements";
import { authMiddleware, requireCsrf } from "./auth";
import type { Env } from "./env";
import { logger } from "./logger";
import type { EmailSender } from "./mail";
import { adminRoutes } from "./routes/adminRoutes";
import { announcementRoutes } from "./routes/announcementRoutes";
import { authRoutes } from "./routes/authRoutes";
import { contactRoutes } from "./routes/contactRoutes";
import { meRoutes } from "./routes/meRoutes";
import { todoRoutes } from "./routes/todoRoutes";
import type { AppState } from "./state";

export type AppDeps = {
  state: AppState;
  env: Env;
  mailer: EmailSender;
  announcements: AnnouncementsClient;
};

// Reachable without a session, so there is no CSRF token to check.
const CSRF_EXEMPT = new Set(["/auth/login", "/auth/logout", "/contact"]);

export function createApp({ state, env, mailer, announcements }: AppDeps) {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", 1);

  app.use(
    pinoHttp({
      logger,
      genReqId: (req, res) => {
        const existing = req.headers["x-request-id"];
        if (typeof existing === "string" && existing) return existing;
        const id = nanoid();
        res.setHeader("x-request-id", id);
        return id;
      }
    })
  );

  app.use(express.json({ limit: "100kb" }));
  app.use(express.urlencoded({ extended: false, limit: "50kb" }));
  app.use(cookieParser());

  app.use(
    helmet({
      contentSecurityPolicy:
        env.NODE_ENV === "production"
          ? {
              useDefaults: true,
              directives: {
                "default-src": ["'self'"],
                "base-uri": ["'self'"],
                "frame-ancestors": ["'none'"],
                "img-src": ["'self'", "data:"],
                "script-src": ["'self'"],
                "connect-src": ["'self'"],
                "object-src": ["'none'"]
              }
            }
          : false
    })
  );

  // The dashboard front end runs on its own port during development.
  if (env.NODE_ENV !== "production") {
    app.use(cors({ origin: env.APP_ORIGIN, credentials: true }));
  }

  const apiLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 600,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "rate_limited" }
  });

  app.get("/api/health", (_req, res) => res.json({ ok: true }));

  app.use("/api", apiLimiter);
  app.use(authMiddleware(state));

  app.use("/api", (req, res, next) => {
    if (CSRF_EXEMPT.has(req.path)) return next();
    return requireCsrf(req, res, next);
  });

  app.use("/api/auth", authRoutes(state));
  app.use("/api/me", meRoutes(state));
  app.use("/api/todos", todoRoutes(state));
  app.use("/api/admin", adminRoutes(state));
  app.use("/api/contact", contactRoutes(mailer, env.CONTACT_TO));
  app.use("/api/announcements", announcementRoutes(announcements));

  app.use("/api", (_req, res) => res.status(404).json({ error: "not_found" }));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    req.log.error({ err }, "unhandled error");
    if (res.headersSent) return;
    res.status(500).json({ error: "internal_error" });
  });

  return app;
}

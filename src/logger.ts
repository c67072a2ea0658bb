import pino from "pino";
import { getEnv } from "./env";

const env = getEnv();

export const logger = pino({
  level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
  base: { service: "dues-ledger" },
  redact: [
    "password",
    "credential",
    "*.password",
    "*.credential",
    "req.headers.authorization",
    "req.headers.cookie",
    "req.headers[\"x-csrf-token\"]"
  ]
});

export function moduleLogger(module: string) {
  return logger.child({ module });
}

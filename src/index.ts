import "dotenv/config";
import { AnnouncementsClient } from "./announcements";
import { createApp } from "./app";
import { getDb } from "./db";
import { getEnv } from "./env";
import { logger } from "./logger";
import { ResendEmailSender } from "./mail";
import { AppState, stateConfigFromEnv } from "./state";

async function main() {
  const env = getEnv();
  const state = new AppState(getDb(), stateConfigFromEnv(env));

  if (await state.admin.seedIfMissing(env.BOOTSTRAP_ADMIN_PASSWORD)) {
    logger.warn("seeded admin credential from BOOTSTRAP_ADMIN_PASSWORD; change it after first login");
  }
  if (env.SEED_DEFAULT_ACCOUNTS) state.seedDefaultAccounts();

  const app = createApp({
    state,
    env,
    mailer: new ResendEmailSender(env.RESEND_API_KEY, env.EMAIL_FROM),
    announcements: new AnnouncementsClient(env.ANNOUNCEMENTS_API_KEY, env.ANNOUNCEMENTS_BASE_URL)
  });

  app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV }, "server listening");
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "startup failed");
  process.exit(1);
});

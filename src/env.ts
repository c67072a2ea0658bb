import { z } from "zod";

const USER_CLASSES = ["member", "partner", "backer", "customer"] as const;

const ClassListSchema = z
  .string()
  .transform((s) =>
    s
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
  )
  .pipe(z.array(z.enum(USER_CLASSES)));

// Blank values (as left by a copied .env.example) count as unset.
const OptionalSecret = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  APP_ORIGIN: z.string().default("http://localhost:5173"),
  DATABASE_PATH: z.string().default("./data/app.sqlite"),
  SESSION_TTL_DAYS: z.coerce.number().int().min(1).max(365).default(30),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  LEDGER_FIRST_YEAR: z.coerce.number().int().min(2000).max(2100).default(2025),
  LEDGER_YEAR_COUNT: z.coerce.number().int().min(1).max(50).default(6),
  DEFAULT_LEDGER_YEAR: z.coerce.number().int().min(2000).max(2100).default(2026),

  // Backers and customers have always been stored verbatim; clear this to hash every class.
  PLAINTEXT_CREDENTIAL_CLASSES: ClassListSchema.default("backer,customer"),

  // One-time bootstrap: if no admin credential exists, the server seeds one with this.
  BOOTSTRAP_ADMIN_PASSWORD: z.string().min(12).default("change-me-please-1234"),
  SEED_DEFAULT_ACCOUNTS: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),

  CONTACT_TO: z.string().email().default("contact@example.com"),
  EMAIL_FROM: z.string().default("Dues Ledger <noreply@example.com>"),
  RESEND_API_KEY: OptionalSecret,

  ANNOUNCEMENTS_API_KEY: OptionalSecret,
  ANNOUNCEMENTS_BASE_URL: z.string().url().default("https://www.bizinfo.go.kr/uss/rss/bizinfoApi.do")
});

export type Env = z.infer<typeof EnvSchema>;

let cached: Env | null = null;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    // Avoid dumping env values; only show schema errors.
    // eslint-disable-next-line no-console
    console.error(parsed.error.flatten());
    throw new Error("Invalid environment configuration");
  }
  return parsed.data;
}

export function getEnv(): Env {
  if (!cached) cached = parseEnv(process.env);
  return cached;
}

export function ledgerYears(env: Pick<Env, "LEDGER_FIRST_YEAR" | "LEDGER_YEAR_COUNT">): string[] {
  return Array.from({ length: env.LEDGER_YEAR_COUNT }, (_, i) => String(env.LEDGER_FIRST_YEAR + i));
}

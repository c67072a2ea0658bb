import { describe, it, expect, vi, afterEach } from "vitest";
import { ledgerYears, parseEnv } from "../../env";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseEnv", () => {
  it("fills defaults for an empty environment", () => {
    const env = parseEnv({});
    expect(env.PORT).toBe(3001);
    expect(env.LEDGER_FIRST_YEAR).toBe(2025);
    expect(env.LEDGER_YEAR_COUNT).toBe(6);
    expect(env.DEFAULT_LEDGER_YEAR).toBe(2026);
    expect(env.PLAINTEXT_CREDENTIAL_CLASSES).toEqual(["backer", "customer"]);
    expect(env.SEED_DEFAULT_ACCOUNTS).toBe(false);
    expect(env.RESEND_API_KEY).toBeUndefined();
  });

  it("parses the plaintext class list and seeding flag", () => {
    const env = parseEnv({ PLAINTEXT_CREDENTIAL_CLASSES: " customer , ", SEED_DEFAULT_ACCOUNTS: "true" });
    expect(env.PLAINTEXT_CREDENTIAL_CLASSES).toEqual(["customer"]);
    expect(env.SEED_DEFAULT_ACCOUNTS).toBe(true);
    expect(parseEnv({ PLAINTEXT_CREDENTIAL_CLASSES: "" }).PLAINTEXT_CREDENTIAL_CLASSES).toEqual([]);
  });

  it("treats blank secrets as unset", () => {
    const env = parseEnv({ RESEND_API_KEY: "  ", ANNOUNCEMENTS_API_KEY: " test-key " });
    expect(env.RESEND_API_KEY).toBeUndefined();
    expect(env.ANNOUNCEMENTS_API_KEY).toBe("test-key");
  });

  it("throws on an unknown user class", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    expect(() => parseEnv({ PLAINTEXT_CREDENTIAL_CLASSES: "member,guest" })).toThrow(
      "Invalid environment configuration"
    );
  });
});

describe("ledgerYears", () => {
  it("lists consecutive years as strings", () => {
    expect(ledgerYears({ LEDGER_FIRST_YEAR: 2025, LEDGER_YEAR_COUNT: 3 })).toEqual([
      "2025",
      "2026",
      "2027"
    ]);
  });
});

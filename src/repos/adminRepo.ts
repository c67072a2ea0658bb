import argon2 from "argon2";
import type { Db } from "../db";
import { looksHashed, verifyCredential } from "../password";
import { ADMIN_ID } from "../types";

export const MIN_ADMIN_PASSWORD_LENGTH = 4;

export type PasswordChange = {
  currentPassword: string;
  newPassword: string;
  newPasswordConfirm: string;
};

export type PasswordChangeResult = "ok" | "invalid_request" | "invalid_credentials";

export class AdminRepo {
  constructor(private readonly db: Db) {}

  private stored() {
    const row = this.db
      .prepare("SELECT password_hash FROM admin_credential WHERE id = ?")
      .get(ADMIN_ID) as { password_hash: string } | undefined;
    return row?.password_hash ?? null;
  }

  /** Seeds the singleton admin credential on first run. Returns true when it did. */
  async seedIfMissing(password: string) {
    if (this.stored() !== null) return false;
    const hash = await argon2.hash(password, { type: argon2.argon2id });
    const info = this.db
      .prepare("INSERT OR IGNORE INTO admin_credential (id, password_hash) VALUES (?, ?)")
      .run(ADMIN_ID, hash);
    return info.changes > 0;
  }

  /** Accepts argon2 hashes, `salt:hex` hashes and (legacy) plain stored values. */
  async verify(password: string) {
    const stored = this.stored();
    if (!stored) return false;
    if (stored.startsWith("$argon2")) return argon2.verify(stored, password);
    if (looksHashed(stored)) return verifyCredential(password, stored);
    return password === stored;
  }

  async setPassword(password: string) {
    const hash = await argon2.hash(password, { type: argon2.argon2id });
    this.db
      .prepare(
        `INSERT INTO admin_credential (id, password_hash) VALUES (?, ?)
         ON CONFLICT(id) DO UPDATE SET password_hash = excluded.password_hash`
      )
      .run(ADMIN_ID, hash);
  }

  async changePassword(change: PasswordChange): Promise<PasswordChangeResult> {
    const current = change.currentPassword.trim();
    const next = change.newPassword.trim();
    const confirm = change.newPasswordConfirm.trim();
    if (!current || !next || next !== confirm || next.length < MIN_ADMIN_PASSWORD_LENGTH) {
      return "invalid_request";
    }
    if (!(await this.verify(current))) return "invalid_credentials";
    await this.setPassword(next);
    return "ok";
  }
}

import type { Db } from "../db";
import { localTimestamp } from "../time";
import type { LastLogin } from "../types";

export class LoginRepo {
  constructor(private readonly db: Db) {}

  record(userId: string, ip: string, at: string = localTimestamp()) {
    this.db
      .prepare(
        `INSERT INTO last_login (user_id, at, ip) VALUES (?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET at = excluded.at, ip = excluded.ip`
      )
      .run(userId, at, ip);
  }

  all(): Record<string, LastLogin> {
    const rows = this.db.prepare("SELECT user_id, at, ip FROM last_login").all() as Array<{
      user_id: string;
      at: string;
      ip: string | null;
    }>;
    const out: Record<string, LastLogin> = {};
    for (const row of rows) out[row.user_id] = { at: row.at, ip: row.ip ?? "" };
    return out;
  }

  delete(userId: string) {
    this.db.prepare("DELETE FROM last_login WHERE user_id = ?").run(userId);
  }
}

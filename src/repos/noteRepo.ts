import type { Db } from "../db";
import { withSchemaHeal } from "../schema";
import { localTimestamp } from "../time";
import type { Note } from "../types";

type NoteRow = { member_id: string; note: string; updated_at: string | null };

export class NoteRepo {
  constructor(private readonly db: Db) {}

  all(): Record<string, Note> {
    const rows = withSchemaHeal(
      this.db,
      () =>
        this.db
          .prepare("SELECT member_id, note, updated_at FROM member_notes")
          .all() as NoteRow[],
      () =>
        this.db
          .prepare("SELECT member_id, note, NULL AS updated_at FROM member_notes")
          .all() as NoteRow[]
    );
    const out: Record<string, Note> = {};
    for (const row of rows) {
      out[row.member_id] = { text: row.note ?? "", updatedAt: row.updated_at || null };
    }
    return out;
  }

  get(memberId: string): Note {
    return this.all()[memberId] ?? { text: "", updatedAt: null };
  }

  /** Overwrites the member's note and stamps it with `at`. */
  set(memberId: string, text: string, at: string = localTimestamp()) {
    const params = { member_id: memberId, note: text.trim(), updated_at: at };
    withSchemaHeal(
      this.db,
      () =>
        this.db
          .prepare(
            `INSERT INTO member_notes (member_id, note, updated_at)
             VALUES (@member_id, @note, @updated_at)
             ON CONFLICT(member_id) DO UPDATE SET note = excluded.note, updated_at = excluded.updated_at`
          )
          .run(params),
      () =>
        this.db
          .prepare(
            `INSERT INTO member_notes (member_id, note) VALUES (@member_id, @note)
             ON CONFLICT(member_id) DO UPDATE SET note = excluded.note`
          )
          .run({ member_id: params.member_id, note: params.note })
    );
  }

  delete(memberId: string) {
    this.db.prepare("DELETE FROM member_notes WHERE member_id = ?").run(memberId);
  }
}

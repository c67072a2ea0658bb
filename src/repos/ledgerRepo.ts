import type { Db } from "../db";
import { USER_CLASSES, type UserClass } from "../types";

export const MONTHS_PER_YEAR = 12;

/** `userId -> year -> 12 paid flags`, January first. */
export type LedgerTable = Record<string, Record<string, boolean[]>>;

export type LedgerEdit = {
  userId: string;
  year: string;
  month: number;
};

export type BulkSetResult = {
  applied: number;
  skipped: number;
};

function emptyYear() {
  return new Array<boolean>(MONTHS_PER_YEAR).fill(false);
}

/** Parses a bulk-edit checkbox key `data_<userId>_<year>_<month>`; anything else is null. */
export function parseLedgerEditKey(key: string): LedgerEdit | null {
  const parts = key.split("_");
  if (parts.length !== 4) return null;
  const [prefix, userId, year, month] = parts;
  if (prefix !== "data" || !userId || !year || !month || !/^\d+$/.test(month)) return null;
  return { userId, year, month: Number(month) };
}

export function isChecked(value: unknown) {
  return value === true || value === "on" || value === "true" || value === "1";
}

export type LedgerForm = {
  edits: LedgerEdit[];
  notes: Record<string, string>;
  malformed: number;
};

/** Splits a bulk-edit submission into paid-month assertions and member note texts. */
export function parseLedgerForm(body: Record<string, unknown>): LedgerForm {
  const form: LedgerForm = { edits: [], notes: {}, malformed: 0 };
  for (const [key, value] of Object.entries(body)) {
    if (key.startsWith("data_")) {
      if (!isChecked(value)) continue;
      const edit = parseLedgerEditKey(key);
      if (edit) form.edits.push(edit);
      else form.malformed += 1;
    } else if (key.startsWith("note_")) {
      const memberId = key.slice("note_".length);
      if (memberId && typeof value === "string") form.notes[memberId] = value.trim();
    }
  }
  return form;
}

/**
 * Per-user yearly payment state for every account, mirrored from the `ledger` table.
 * Only paid months are stored; a missing row means unpaid.
 */
export class PaymentLedger {
  private readonly tables: Record<UserClass, Map<string, Map<string, boolean[]>>> = {
    member: new Map(),
    partner: new Map(),
    backer: new Map(),
    customer: new Map()
  };

  constructor(
    private readonly db: Db,
    readonly years: readonly string[]
  ) {}

  private skeleton(userIds: Iterable<string>) {
    const table = new Map<string, Map<string, boolean[]>>();
    for (const userId of userIds) {
      table.set(userId, new Map(this.years.map((y) => [y, emptyYear()])));
    }
    return table;
  }

  /** Rebuilds every class from the known user ids, then overlays the persisted paid months. */
  load(users: Record<UserClass, readonly string[]>) {
    for (const userClass of USER_CLASSES) {
      this.tables[userClass] = this.skeleton(users[userClass]);
    }

    const rows = this.db
      .prepare("SELECT user_id, year, month FROM ledger WHERE paid = 1")
      .all() as Array<{ user_id: string; year: string; month: number }>;
    for (const row of rows) {
      const months = this.find(row.user_id)?.get(row.year);
      if (months && Number.isInteger(row.month) && row.month >= 0 && row.month < MONTHS_PER_YEAR) {
        months[row.month] = true;
      }
    }
  }

  private find(userId: string) {
    for (const userClass of USER_CLASSES) {
      const years = this.tables[userClass].get(userId);
      if (years) return years;
    }
    return undefined;
  }

  hasYear(year: string) {
    return this.years.includes(year);
  }

  /** Always 12 flags; unknown users and years outside the window read as unpaid. */
  getYear(userId: string, year: string): boolean[] {
    const months = this.find(userId)?.get(year);
    return months ? [...months] : emptyYear();
  }

  table(userClass: UserClass): LedgerTable {
    const out: LedgerTable = {};
    for (const [userId, years] of this.tables[userClass]) {
      out[userId] = {};
      for (const [year, months] of years) out[userId][year] = [...months];
    }
    return out;
  }

  addUser(userClass: UserClass, userId: string) {
    const table = this.tables[userClass];
    if (table.has(userId)) return;
    const [entry] = this.skeleton([userId]).values();
    if (entry) table.set(userId, entry);
  }

  removeUser(userClass: UserClass, userId: string) {
    this.tables[userClass].delete(userId);
    this.db.prepare("DELETE FROM ledger WHERE user_id = ?").run(userId);
  }

  /**
   * Replaces the whole table of one class: every month not asserted paid here ends up unpaid.
   * Edits naming an unknown user, a year outside the window or a month outside 0..11 are skipped.
   */
  bulkSet(userClass: UserClass, edits: Iterable<LedgerEdit>): BulkSetResult {
    const next = this.skeleton(this.tables[userClass].keys());
    const result: BulkSetResult = { applied: 0, skipped: 0 };

    for (const edit of edits) {
      const months = next.get(edit.userId)?.get(edit.year);
      if (!months || !Number.isInteger(edit.month) || edit.month < 0 || edit.month >= MONTHS_PER_YEAR) {
        result.skipped += 1;
        continue;
      }
      months[edit.month] = true;
      result.applied += 1;
    }

    const previous = this.tables[userClass];
    this.tables[userClass] = next;
    try {
      this.persist();
    } catch (err) {
      this.tables[userClass] = previous;
      throw err;
    }
    return result;
  }

  /** Rewrites the `ledger` table from all four classes. */
  persist() {
    const insert = this.db.prepare(
      "INSERT OR IGNORE INTO ledger (user_id, year, month, paid) VALUES (?, ?, ?, 1)"
    );
    this.db.transaction(() => {
      this.db.prepare("DELETE FROM ledger").run();
      for (const userClass of USER_CLASSES) {
        for (const [userId, years] of this.tables[userClass]) {
          for (const [year, months] of years) {
            months.forEach((paid, month) => {
              if (paid) insert.run(userId, year, month);
            });
          }
        }
      }
    })();
  }
}

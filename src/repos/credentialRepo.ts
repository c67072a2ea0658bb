import type { Db } from "../db";
import { hashCredential, looksHashed, verifyCredential } from "../password";
import { withSchemaHeal } from "../schema";
import type { PublicUser, UserClass, UserRecord } from "../types";

export const CLASS_TABLES: Record<UserClass, string> = {
  member: "members",
  partner: "partners",
  backer: "backers",
  customer: "customers"
};

export type AddUserInput = {
  id: string;
  credential: string;
  sortOrder?: number;
  equity?: string;
};

export type UpdateUserInput = {
  credential?: string;
  sortOrder?: number;
  equity?: string;
};

type UserRow = {
  id: string;
  credential: string;
  sort_order: number;
  equity: string;
};

export function isUniqueViolation(err: unknown) {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return err.code === "SQLITE_CONSTRAINT_PRIMARYKEY" || err.code === "SQLITE_CONSTRAINT_UNIQUE";
}

function compareUsers(a: UserRecord, b: UserRecord) {
  if (a.sortOrder !== b.sortOrder) return a.sortOrder - b.sortOrder;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function toRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    credential: row.credential,
    sortOrder: row.sort_order,
    equity: row.equity.trim()
  };
}

/**
 * Account pool for one user class. Reads are served from an in-memory mirror that every
 * write here keeps in step with the table.
 */
export class CredentialRepo {
  private readonly table: string;
  private readonly mirror = new Map<string, UserRecord>();

  constructor(
    private readonly db: Db,
    readonly userClass: UserClass,
    private readonly plaintext: boolean
  ) {
    this.table = CLASS_TABLES[userClass];
    this.reload();
  }

  private select(id?: string): UserRow[] {
    const where = id === undefined ? "" : " WHERE id = ?";
    const run = (sql: string) => {
      const stmt = this.db.prepare(sql);
      return (id === undefined ? stmt.all() : stmt.all(id)) as UserRow[];
    };
    return withSchemaHeal(
      this.db,
      () =>
        run(
          `SELECT id, credential, COALESCE(sort_order, 0) AS sort_order, COALESCE(equity, '') AS equity
           FROM ${this.table}${where}`
        ),
      () => run(`SELECT id, credential, 0 AS sort_order, '' AS equity FROM ${this.table}${where}`)
    );
  }

  reload() {
    const rows = this.select();
    this.mirror.clear();
    for (const row of rows) this.mirror.set(row.id, toRecord(row));
  }

  list(): UserRecord[] {
    return [...this.mirror.values()].map((u) => ({ ...u })).sort(compareUsers);
  }

  listPublic(): PublicUser[] {
    return this.list().map(({ id, sortOrder, equity }) => ({ id, sortOrder, equity }));
  }

  ids(): string[] {
    return this.list().map((u) => u.id);
  }

  has(id: string) {
    return this.mirror.has(id);
  }

  get(id: string): UserRecord | null {
    const found = this.mirror.get(id);
    return found ? { ...found } : null;
  }

  private prepareCredential(raw: string) {
    if (this.plaintext) return raw.trim();
    return looksHashed(raw) ? raw : hashCredential(raw);
  }

  /** Returns false (and changes nothing) when the id is empty or already taken. */
  add(input: AddUserInput): boolean {
    const id = input.id.trim();
    if (!id) return false;

    const params = {
      id,
      credential: this.prepareCredential(input.credential),
      sort_order: input.sortOrder ?? null,
      equity: (input.equity ?? "").trim()
    };

    try {
      withSchemaHeal(
        this.db,
        () =>
          this.db
            .prepare(
              `INSERT INTO ${this.table} (id, credential, sort_order, equity)
               VALUES (@id, @credential,
                 COALESCE(@sort_order, (SELECT COALESCE(MAX(sort_order), -1) + 1 FROM ${this.table})),
                 @equity)`
            )
            .run(params),
        () =>
          this.db
            .prepare(`INSERT INTO ${this.table} (id, credential) VALUES (@id, @credential)`)
            .run({ id: params.id, credential: params.credential })
      );
    } catch (err) {
      if (isUniqueViolation(err)) return false;
      throw err;
    }

    this.refresh(id);
    return true;
  }

  /** Partial update: only the fields present are written. Returns false for unknown ids. */
  update(id: string, input: UpdateUserInput): boolean {
    if (!this.mirror.has(id)) return false;

    const sets: string[] = [];
    const params: Record<string, string | number> = { id };

    if (input.credential !== undefined) {
      sets.push("credential = @credential");
      params.credential = this.prepareCredential(input.credential);
    }
    if (input.sortOrder !== undefined) {
      sets.push("sort_order = @sort_order");
      params.sort_order = input.sortOrder;
    }
    if (input.equity !== undefined) {
      sets.push("equity = @equity");
      params.equity = input.equity.trim();
    }
    if (sets.length === 0) return true;

    withSchemaHeal(this.db, () =>
      this.db.prepare(`UPDATE ${this.table} SET ${sets.join(", ")} WHERE id = @id`).run(params)
    );
    this.refresh(id);
    return true;
  }

  /** Removes the account; members take their badges with them. */
  delete(id: string): boolean {
    if (this.userClass === "member") {
      this.db.prepare("DELETE FROM member_badges WHERE member_id = ?").run(id);
    }
    const info = this.db.prepare(`DELETE FROM ${this.table} WHERE id = ?`).run(id);
    this.mirror.delete(id);
    return info.changes > 0;
  }

  verify(id: string, supplied: string) {
    const user = this.mirror.get(id);
    if (!user) return false;
    if (this.plaintext) return supplied === user.credential;
    return verifyCredential(supplied, user.credential);
  }

  private refresh(id: string) {
    const [row] = this.select(id);
    if (row) this.mirror.set(row.id, toRecord(row));
    else this.mirror.delete(id);
  }
}

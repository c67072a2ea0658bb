import type Database from "better-sqlite3";
import { moduleLogger } from "./logger";

type Db = Database.Database;

const log = moduleLogger("schema");

/**
 * Base tables in their oldest shape. Columns added later live in the migration
 * list so that a fresh file and a legacy file converge through the same steps.
 */
function createBaseTables(instance: Db) {
  instance.exec(`
    CREATE TABLE IF NOT EXISTS members (
      id TEXT PRIMARY KEY,
      credential TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS partners (
      id TEXT PRIMARY KEY,
      credential TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS backers (
      id TEXT PRIMARY KEY,
      credential TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS customers (
      id TEXT PRIMARY KEY,
      credential TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS ledger (
      user_id TEXT NOT NULL,
      year TEXT NOT NULL,
      month INTEGER NOT NULL,
      paid INTEGER NOT NULL,
      PRIMARY KEY (user_id, year, month)
    );

    CREATE TABLE IF NOT EXISTS member_notes (
      member_id TEXT PRIMARY KEY,
      note TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS todos (
      id INTEGER PRIMARY KEY,
      title TEXT NOT NULL,
      done INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS member_badges (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      member_id TEXT NOT NULL,
      mission_name TEXT NOT NULL,
      icon_type INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_member_badges_member_id ON member_badges(member_id);

    CREATE TABLE IF NOT EXISTS admin_credential (
      id TEXT PRIMARY KEY,
      password_hash TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS last_login (
      user_id TEXT PRIMARY KEY,
      at TEXT NOT NULL,
      ip TEXT NOT NULL DEFAULT ''
    );

    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      csrf_token TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      expires_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_sessions_user_id ON sessions(user_id);
    CREATE INDEX IF NOT EXISTS idx_sessions_expires_at ON sessions(expires_at);

    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    );
  `);
}

export type Migration = {
  name: string;
  up: (db: Db) => void;
};

export function hasColumn(db: Db, table: string, column: string) {
  const cols = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  return cols.some((c) => c.name === column);
}

function addColumn(db: Db, table: string, column: string, definition: string) {
  if (hasColumn(db, table, column)) return false;
  db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
  return true;
}

// Existing rows get a dense order by id so the list keeps its previous ordering.
function addSortOrder(table: string): Migration {
  return {
    name: `${table}.sort_order`,
    up: (db) => {
      if (!addColumn(db, table, "sort_order", "INTEGER DEFAULT 0")) return;
      db.exec(
        `UPDATE ${table} SET sort_order = (SELECT COUNT(*) FROM ${table} t2 WHERE t2.id < ${table}.id)`
      );
    }
  };
}

function addEquity(table: string): Migration {
  return {
    name: `${table}.equity`,
    up: (db) => {
      addColumn(db, table, "equity", "TEXT DEFAULT ''");
    }
  };
}

function tableSql(db: Db, table: string) {
  const row = db
    .prepare(`SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?`)
    .get(table) as { sql: string } | undefined;
  return row?.sql ?? "";
}

export const MIGRATIONS: readonly Migration[] = [
  {
    name: "todos.audience",
    up: (db) => {
      addColumn(db, "todos", "audience", "TEXT DEFAULT 'all'");
    }
  },
  addSortOrder("members"),
  {
    name: "member_notes.updated_at",
    up: (db) => {
      addColumn(db, "member_notes", "updated_at", "TEXT");
    }
  },
  addSortOrder("partners"),
  addEquity("members"),
  addEquity("partners"),
  {
    name: "todos.sort_order",
    up: (db) => {
      addColumn(db, "todos", "sort_order", "INTEGER DEFAULT 0");
    }
  },
  {
    name: "todos.detail",
    up: (db) => {
      addColumn(db, "todos", "detail", "TEXT DEFAULT ''");
    }
  },
  addSortOrder("backers"),
  addEquity("backers"),
  addSortOrder("customers"),
  addEquity("customers"),
  {
    // SQLite can't add AUTOINCREMENT in place; rebuild so deleted ids are never handed out again.
    name: "todos.autoincrement",
    up: (db) => {
      if (/AUTOINCREMENT/i.test(tableSql(db, "todos"))) return;
      db.exec(`
        CREATE TABLE todos_new (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          title TEXT NOT NULL,
          done INTEGER NOT NULL,
          audience TEXT DEFAULT 'all',
          sort_order INTEGER DEFAULT 0,
          detail TEXT DEFAULT ''
        );
        INSERT INTO todos_new (id, title, done, audience, sort_order, detail)
        SELECT id, title, done, COALESCE(audience, 'all'), COALESCE(sort_order, 0), COALESCE(detail, '')
        FROM todos;
        DROP TABLE todos;
        ALTER TABLE todos_new RENAME TO todos;
      `);
    }
  }
];

export type MigrationReport = {
  applied: string[];
  failed: string[];
};

/**
 * Runs every migration not yet recorded in `schema_migrations`, in order. Each step is
 * check-then-act, and a failing step is logged and left for the next start.
 */
export function runMigrations(db: Db, migrations: readonly Migration[] = MIGRATIONS): MigrationReport {
  const done = new Set(
    (db.prepare("SELECT name FROM schema_migrations").all() as Array<{ name: string }>).map(
      (r) => r.name
    )
  );
  const record = db.prepare("INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)");
  const report: MigrationReport = { applied: [], failed: [] };

  for (const migration of migrations) {
    if (done.has(migration.name)) continue;
    try {
      db.transaction(() => {
        migration.up(db);
        record.run(migration.name, Date.now());
      })();
      report.applied.push(migration.name);
    } catch (err) {
      report.failed.push(migration.name);
      log.warn({ err, migration: migration.name }, "migration failed; continuing");
    }
  }

  if (report.applied.length > 0) log.info({ applied: report.applied }, "schema migrated");
  return report;
}

export function ensureSchema(db: Db) {
  createBaseTables(db);
  return runMigrations(db);
}

export function isSchemaError(err: unknown) {
  if (!(err instanceof Error)) return false;
  return /no such column|has no column named|no such table/i.test(err.message);
}

/**
 * Runs `write`; on a structural failure, brings the schema up to date and retries once.
 * If the retry still fails structurally, `narrow` (a write against the oldest shape) runs
 * instead when given.
 */
export function withSchemaHeal<T>(db: Db, write: () => T, narrow?: () => T): T {
  try {
    return write();
  } catch (err) {
    if (!isSchemaError(err)) throw err;
    log.warn({ err }, "schema mismatch; healing");
    ensureSchema(db);
  }
  try {
    return write();
  } catch (err) {
    if (!narrow || !isSchemaError(err)) throw err;
    log.warn({ err }, "schema still behind; using narrow write");
    return narrow();
  }
}

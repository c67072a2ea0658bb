import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { getEnv } from "./env";
import { ensureSchema } from "./schema";

export type Db = Database.Database;

let db: Db | null = null;

export function openDatabase(dbPath: string): Db {
  const inMemory = dbPath === ":memory:";
  const resolved =
    inMemory || path.isAbsolute(dbPath) ? dbPath : path.join(process.cwd(), dbPath);
  if (!inMemory) fs.mkdirSync(path.dirname(resolved), { recursive: true });

  const instance = new Database(resolved);
  if (!inMemory) instance.pragma("journal_mode = WAL");

  ensureSchema(instance);

  // Opportunistic cleanup (keeps the sessions table from growing forever).
  instance.prepare("DELETE FROM sessions WHERE expires_at <= ?").run(Date.now());

  return instance;
}

export function getDb(): Db {
  if (db) return db;
  db = openDatabase(getEnv().DATABASE_PATH);
  return db;
}

import type { Db } from "../db";
import { parseAudience, serializeAudience } from "../audience";
import { withSchemaHeal } from "../schema";
import type { Audience, TodoItem } from "../types";

type TodoRow = {
  id: number;
  title: string;
  done: number;
  audience: string | null;
  sort_order: number | null;
  detail: string | null;
};

export type NewTodo = {
  title: string;
  audience: Audience;
  sortOrder?: number;
  detail?: string;
};

export type TodoEdit = {
  /** Empty keeps the stored title, so a detail-only edit can leave it out. */
  title: string;
  audience: Audience;
  sortOrder?: number;
  detail?: string;
};

function toTodo(row: TodoRow): TodoItem {
  return {
    id: row.id,
    title: row.title,
    done: row.done === 1,
    audience: parseAudience(row.audience),
    sortOrder: row.sort_order ?? 0,
    detail: (row.detail ?? "").trim()
  };
}

export class TodoRepo {
  constructor(private readonly db: Db) {}

  private select(id?: number): TodoRow[] {
    const where = id === undefined ? "" : " WHERE id = ?";
    const run = (sql: string) => {
      const stmt = this.db.prepare(sql);
      return (id === undefined ? stmt.all() : stmt.all(id)) as TodoRow[];
    };
    return withSchemaHeal(
      this.db,
      () =>
        run(
          `SELECT id, title, done, COALESCE(audience, 'all') AS audience,
                  COALESCE(sort_order, 0) AS sort_order, COALESCE(detail, '') AS detail
           FROM todos${where}
           ORDER BY sort_order ASC, id ASC`
        ),
      () =>
        run(
          `SELECT id, title, done, 'all' AS audience, 0 AS sort_order, '' AS detail
           FROM todos${where}
           ORDER BY id ASC`
        )
    );
  }

  list(): TodoItem[] {
    return this.select().map(toTodo);
  }

  get(id: number): TodoItem | null {
    const [row] = this.select(id);
    return row ? toTodo(row) : null;
  }

  /** Returns null without writing when the title is empty. */
  add(todo: NewTodo): TodoItem | null {
    const title = todo.title.trim();
    if (!title) return null;

    const params = {
      title,
      audience: serializeAudience(todo.audience),
      sort_order: todo.sortOrder ?? null,
      detail: (todo.detail ?? "").trim()
    };
    const info = withSchemaHeal(
      this.db,
      () =>
        this.db
          .prepare(
            `INSERT INTO todos (title, done, audience, sort_order, detail)
             VALUES (@title, 0, @audience,
               COALESCE(@sort_order, (SELECT COALESCE(MAX(sort_order), -1) + 1 FROM todos)),
               @detail)`
          )
          .run(params),
      () => this.db.prepare("INSERT INTO todos (title, done) VALUES (?, 0)").run(title)
    );
    return this.get(Number(info.lastInsertRowid));
  }

  toggle(id: number): TodoItem | null {
    this.db.prepare("UPDATE todos SET done = 1 - done WHERE id = ?").run(id);
    return this.get(id);
  }

  edit(id: number, edit: TodoEdit): TodoItem | null {
    const existing = this.get(id);
    if (!existing) return null;

    const sets = ["title = @title", "audience = @audience"];
    const params: Record<string, string | number> = {
      id,
      title: edit.title.trim() || existing.title,
      audience: serializeAudience(edit.audience)
    };
    if (edit.sortOrder !== undefined) {
      sets.push("sort_order = @sort_order");
      params.sort_order = edit.sortOrder;
    }
    if (edit.detail !== undefined) {
      sets.push("detail = @detail");
      params.detail = edit.detail.trim();
    }

    withSchemaHeal(
      this.db,
      () => this.db.prepare(`UPDATE todos SET ${sets.join(", ")} WHERE id = @id`).run(params),
      () =>
        this.db
          .prepare("UPDATE todos SET title = @title WHERE id = @id")
          .run({ id, title: params.title })
    );
    return this.get(id);
  }

  delete(id: number) {
    return this.db.prepare("DELETE FROM todos WHERE id = ?").run(id).changes > 0;
  }
}

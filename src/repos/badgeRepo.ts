import type { Db } from "../db";
import type { Badge } from "../types";

export const ICON_TYPE_MIN = 1;
export const ICON_TYPE_MAX = 10;

type BadgeRow = { id: number; member_id: string; mission_name: string; icon_type: number };

function toBadge(row: BadgeRow): Badge {
  return {
    id: row.id,
    memberId: row.member_id,
    missionName: row.mission_name,
    iconType: row.icon_type
  };
}

/** Integer in 1..10, otherwise 1. */
export function normalizeIconType(value: unknown) {
  const n =
    typeof value === "number"
      ? value
      : typeof value === "string" && /^\s*-?\d+\s*$/.test(value)
        ? Number(value)
        : NaN;
  if (!Number.isInteger(n) || n < ICON_TYPE_MIN || n > ICON_TYPE_MAX) return ICON_TYPE_MIN;
  return n;
}

export class BadgeRepo {
  constructor(private readonly db: Db) {}

  /** Badges grouped by member, each group in insertion (id) order. */
  listByMember(): Record<string, Badge[]> {
    const rows = this.db
      .prepare("SELECT id, member_id, mission_name, icon_type FROM member_badges ORDER BY id")
      .all() as BadgeRow[];
    const out: Record<string, Badge[]> = {};
    for (const row of rows) {
      (out[row.member_id] ??= []).push(toBadge(row));
    }
    return out;
  }

  listFor(memberId: string): Badge[] {
    const rows = this.db
      .prepare(
        "SELECT id, member_id, mission_name, icon_type FROM member_badges WHERE member_id = ? ORDER BY id"
      )
      .all(memberId) as BadgeRow[];
    return rows.map(toBadge);
  }

  add(memberId: string, missionName: string, iconType: unknown): Badge | null {
    const member = memberId.trim();
    const mission = missionName.trim();
    if (!member || !mission) return null;

    const icon = normalizeIconType(iconType);
    const info = this.db
      .prepare("INSERT INTO member_badges (member_id, mission_name, icon_type) VALUES (?, ?, ?)")
      .run(member, mission, icon);
    return { id: Number(info.lastInsertRowid), memberId: member, missionName: mission, iconType: icon };
  }

  update(id: number, missionName: string, iconType: unknown) {
    const mission = missionName.trim();
    if (!mission) return false;
    const info = this.db
      .prepare("UPDATE member_badges SET mission_name = ?, icon_type = ? WHERE id = ?")
      .run(mission, normalizeIconType(iconType), id);
    return info.changes > 0;
  }

  delete(id: number) {
    return this.db.prepare("DELETE FROM member_badges WHERE id = ?").run(id).changes > 0;
  }
}

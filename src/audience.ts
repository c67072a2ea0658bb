import type { Audience, Identity, UserClass } from "./types";

export const ALL: Audience = { kind: "all" };

export function parseAudience(raw: string | null | undefined): Audience {
  const value = (raw ?? "").trim();
  if (value === "" || value === "all") return ALL;
  if (value === "members") return { kind: "members" };
  if (value === "partners") return { kind: "partners" };

  const ids = value
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  return ids.length > 0 ? { kind: "explicit", ids: new Set(ids) } : ALL;
}

export function serializeAudience(audience: Audience): string {
  switch (audience.kind) {
    case "all":
    case "members":
    case "partners":
      return audience.kind;
    case "explicit":
      return audience.ids.size > 0 ? [...audience.ids].join(",") : "all";
  }
}

export type AudienceType = "all" | "members" | "partners" | "selected";

/**
 * Builds an audience from a form selection: `selected` keeps the ids whose flag is set
 * and degrades to everyone when nothing is ticked.
 */
export function audienceFromSelection(
  type: AudienceType,
  flags: Record<string, boolean> = {}
): Audience {
  if (type !== "selected") return type === "all" ? ALL : { kind: type };
  const ids = Object.entries(flags)
    .filter(([id, on]) => on && id.trim().length > 0)
    .map(([id]) => id.trim());
  return ids.length > 0 ? { kind: "explicit", ids: new Set(ids) } : ALL;
}

export type Viewer = {
  id: string;
  userClass: UserClass | null;
  isAdmin: boolean;
};

export function toViewer(identity: Identity): Viewer {
  return { id: identity.id, userClass: identity.userClass, isAdmin: identity.role === "admin" };
}

export function isVisibleTo(audience: Audience, viewer: Viewer) {
  if (viewer.isAdmin) return true;
  switch (audience.kind) {
    case "all":
      return true;
    case "members":
      return viewer.userClass === "member";
    case "partners":
      return viewer.userClass === "partner";
    case "explicit":
      return audience.ids.has(viewer.id);
  }
}

export function visibleTo<T extends { audience: Audience }>(items: readonly T[], viewer: Viewer) {
  return viewer.isAdmin ? [...items] : items.filter((item) => isVisibleTo(item.audience, viewer));
}

/** JSON shape of an audience: the form selection that would recreate it. */
export function describeAudience(audience: Audience): { type: AudienceType; ids: string[] } {
  if (audience.kind === "explicit") return { type: "selected", ids: [...audience.ids] };
  return { type: audience.kind, ids: [] };
}

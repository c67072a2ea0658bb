import { Router } from "express";
import { requireAuth } from "../auth";
import { toViewer, visibleTo } from "../audience";
import type { AppState } from "../state";
import { formatNoteDate } from "../time";
import { BADGE_ICONS, MONTHS, USER_CLASSES, type PublicUser, type UserClass } from "../types";
import { presentTodo, YearQuery } from "./schemas";

export function directory(state: AppState): Record<UserClass, PublicUser[]> {
  return {
    member: state.credentials.member.listPublic(),
    partner: state.credentials.partner.listPublic(),
    backer: state.credentials.backer.listPublic(),
    customer: state.credentials.customer.listPublic()
  };
}

export function meRoutes(state: AppState) {
  const router = Router();

  router.get("/", requireAuth, (req, res) => {
    return res.json({ user: req.identity! });
  });

  router.get("/dashboard", requireAuth, (req, res) => {
    const identity = req.identity!;
    if (identity.role === "admin") return res.json({ admin: true });

    const parsed = YearQuery.safeParse(req.query.year);
    if (!parsed.success) return res.status(400).json({ error: "invalid_request" });
    const year = parsed.data ?? state.config.defaultYear;

    const months = state.ledger.getYear(identity.id, year);
    const isMember = identity.userClass === "member";
    const note = isMember ? state.notes.get(identity.id) : null;

    return res.json({
      year,
      years: state.config.years,
      months: MONTHS,
      userClass: identity.userClass,
      status: months.map((paid, month) => ({ month, paid })),
      paidCount: months.filter(Boolean).length,
      todos: visibleTo(state.todos.list(), toViewer(identity)).map(presentTodo),
      note: note ? { ...note, updatedOn: formatNoteDate(note.updatedAt) } : null,
      badges: isMember ? state.badges.listFor(identity.id) : [],
      directory: directory(state),
      classes: USER_CLASSES,
      badgeIcons: BADGE_ICONS
    });
  });

  return router;
}

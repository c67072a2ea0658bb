import { Router } from "express";
import { z } from "zod";
import { clearUserSessions, requireAdmin, requireAuth } from "../auth";
import { moduleLogger } from "../logger";
import { parseLedgerForm, type LedgerTable } from "../repos/ledgerRepo";
import { USER_ID_PATTERN, type AppState } from "../state";
import { formatNoteDate } from "../time";
import {
  ADMIN_ID,
  BADGE_ICONS,
  isUserClass,
  MONTHS,
  type LastLogin,
  type PublicUser,
  type UserClass
} from "../types";
import { IdParam, SortOrderField, YearQuery } from "./schemas";

const log = moduleLogger("admin");

const UserIdSchema = z.string().trim().regex(USER_ID_PATTERN);

const CreateUserSchema = z.object({
  id: UserIdSchema,
  credential: z.string().min(1).max(256),
  sortOrder: SortOrderField,
  equity: z.string().max(200).optional()
});

const UpdateUserSchema = z.object({
  credential: z.string().max(256).optional(),
  sortOrder: SortOrderField,
  equity: z.string().max(200).optional()
});

const LedgerBodySchema = z.record(z.string(), z.unknown());

const CreateBadgeSchema = z.object({
  memberId: z.string().max(64).default(""),
  missionName: z.string().max(200).default(""),
  iconType: z.unknown()
});

const UpdateBadgeSchema = z.object({
  missionName: z.string().max(200).default(""),
  iconType: z.unknown()
});

const PasswordChangeSchema = z.object({
  currentPassword: z.string().max(256).default(""),
  newPassword: z.string().max(256).default(""),
  newPasswordConfirm: z.string().max(256).default("")
});

type AccountView = PublicUser & { lastLogin: LastLogin | null };

export function adminRoutes(state: AppState) {
  const router = Router();
  router.use(requireAuth, requireAdmin);

  router.get("/overview", (req, res) => {
    const year = YearQuery.safeParse(req.query.year);
    if (!year.success) return res.status(400).json({ error: "invalid_request" });
    const selected = isUserClass(req.query.class) ? req.query.class : "member";

    const logins = state.logins.all();
    const accountsOf = (userClass: UserClass): AccountView[] =>
      state.credentials[userClass]
        .listPublic()
        .map((user) => ({ ...user, lastLogin: logins[user.id] ?? null }));
    const accounts: Record<UserClass, AccountView[]> = {
      member: accountsOf("member"),
      partner: accountsOf("partner"),
      backer: accountsOf("backer"),
      customer: accountsOf("customer")
    };
    const ledger: Record<UserClass, LedgerTable> = {
      member: state.ledger.table("member"),
      partner: state.ledger.table("partner"),
      backer: state.ledger.table("backer"),
      customer: state.ledger.table("customer")
    };

    const notes = Object.fromEntries(
      Object.entries(state.notes.all()).map(([memberId, note]) => [
        memberId,
        { ...note, updatedOn: formatNoteDate(note.updatedAt) }
      ])
    );

    return res.json({
      year: year.data ?? state.config.defaultYear,
      userClass: selected,
      years: state.config.years,
      months: MONTHS,
      accounts,
      ledger,
      notes,
      badges: state.badges.listByMember(),
      badgeIcons: BADGE_ICONS
    });
  });

  router.post("/users/:userClass", (req, res) => {
    const { userClass } = req.params;
    if (!isUserClass(userClass)) return res.status(404).json({ error: "not_found" });
    const parsed = CreateUserSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "invalid_request" });

    const created = state.addUser(userClass, parsed.data);
    if (created) log.info({ userClass, userId: parsed.data.id }, "account added");
    return res.status(created ? 201 : 200).json({ ok: true, created });
  });

  router.patch("/users/:userClass/:id", (req, res) => {
    const { userClass } = req.params;
    if (!isUserClass(userClass)) return res.status(404).json({ error: "not_found" });
    const parsed = UpdateUserSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "invalid_request" });

    const { credential, sortOrder, equity } = parsed.data;
    const updated = state.updateUser(userClass, req.params.id, {
      // An empty credential leaves the stored one in place.
      credential: credential ? credential : undefined,
      sortOrder,
      equity
    });
    if (!updated) return res.status(404).json({ error: "not_found" });
    return res.json({ ok: true });
  });

  router.delete("/users/:userClass/:id", (req, res) => {
    const { userClass } = req.params;
    if (!isUserClass(userClass)) return res.status(404).json({ error: "not_found" });

    const deleted = state.deleteUser(userClass, req.params.id);
    if (deleted) log.info({ userClass, userId: req.params.id }, "account deleted");
    return res.json({ ok: true, deleted });
  });

  router.post("/ledger/:userClass", (req, res) => {
    const { userClass } = req.params;
    if (!isUserClass(userClass)) return res.status(404).json({ error: "not_found" });
    const parsed = LedgerBodySchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "invalid_request" });

    const form = parseLedgerForm(parsed.data);
    const result = state.saveLedger(userClass, form.edits, form.notes);
    log.info({ userClass, ...result, malformed: form.malformed }, "ledger saved");
    return res.json({ ok: true, applied: result.applied, skipped: result.skipped + form.malformed });
  });

  router.post("/badges", (req, res) => {
    const parsed = CreateBadgeSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "invalid_request" });

    const { memberId, missionName, iconType } = parsed.data;
    const badge = state.badges.add(memberId, missionName, iconType);
    if (!badge) return res.json({ ok: true, created: false });
    return res.status(201).json({ ok: true, created: true, badge });
  });

  router.put("/badges/:id", (req, res) => {
    const id = IdParam.safeParse(req.params.id);
    const parsed = UpdateBadgeSchema.safeParse(req.body);
    if (!id.success || !parsed.success) return res.status(400).json({ error: "invalid_request" });

    const updated = state.badges.update(id.data, parsed.data.missionName, parsed.data.iconType);
    return res.json({ ok: true, updated });
  });

  router.delete("/badges/:id", (req, res) => {
    const id = IdParam.safeParse(req.params.id);
    if (!id.success) return res.status(400).json({ error: "invalid_request" });

    if (!state.badges.delete(id.data)) return res.status(404).json({ error: "not_found" });
    return res.json({ ok: true });
  });

  router.post("/password", async (req, res) => {
    const parsed = PasswordChangeSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "invalid_request" });

    const result = await state.admin.changePassword(parsed.data);
    if (result === "invalid_request") return res.status(400).json({ error: "invalid_request" });
    if (result === "invalid_credentials") {
      return res.status(401).json({ error: "invalid_credentials" });
    }

    // Other admin sessions end; the one that made the change stays.
    clearUserSessions(state.db, ADMIN_ID, req.session?.id);
    log.info("admin password changed");
    return res.json({ ok: true });
  });

  return router;
}

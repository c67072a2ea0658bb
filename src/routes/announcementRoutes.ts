import { Router } from "express";
import { z } from "zod";
import { AnnouncementsError, type AnnouncementsClient } from "../announcements";
import { requireAuth } from "../auth";
import { moduleLogger } from "../logger";

const log = moduleLogger("announcements");

const QuerySchema = z.object({
  count: z.coerce.number().int().min(0).max(100).optional(),
  page: z.coerce.number().int().min(1).max(1000).optional(),
  pageSize: z.coerce.number().int().min(1).max(100).optional()
});

export function announcementRoutes(client: AnnouncementsClient) {
  const router = Router();

  router.get("/", requireAuth, async (req, res) => {
    const parsed = QuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ error: "invalid_request" });

    try {
      const data = await client.fetchLatest(parsed.data);
      return res.json({ ok: true, data });
    } catch (err) {
      if (!(err instanceof AnnouncementsError)) throw err;
      log.warn({ code: err.code, status: err.status }, err.message);
      if (err.code === "missing_api_key") {
        return res.status(503).json({ error: err.code, hint: "set ANNOUNCEMENTS_API_KEY" });
      }
      return res.status(502).json({ error: err.code });
    }
  });

  return router;
}

import { Router } from "express";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import { moduleLogger } from "../logger";
import { sendContactMails, type EmailSender } from "../mail";

const log = moduleLogger("contact");

const Required = z.string().trim().min(1).max(200);
const Optional = z.string().trim().max(200).optional();

const ContactSchema = z.object({
  company: Required,
  name: Required,
  email: z.string().trim().email().max(200),
  phone: Required,
  message: z.string().trim().min(1).max(5000),
  location: Optional,
  revenue: Optional,
  employees: Optional,
  industry: Optional,
  years: Optional,
  interest: Optional,
  companyUrl: Optional,
  // Honeypot: people never see it, form-filling bots do.
  website: z.string().max(200).optional()
});

export function contactRoutes(mailer: EmailSender, operator: string) {
  const router = Router();

  const contactLimiter = rateLimit({
    windowMs: 10 * 60 * 1000,
    limit: 3,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "rate_limited" }
  });

  router.post("/", contactLimiter, async (req, res) => {
    const parsed = ContactSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "invalid_request" });

    const { website, ...fields } = parsed.data;
    if (website && website.trim()) {
      log.info({ ip: req.ip }, "contact honeypot filled, dropping submission");
      return res.json({ ok: true });
    }

    const result = await sendContactMails(mailer, fields, operator);
    if (!result.ok) return res.status(502).json({ error: result.error });
    return res.json({ ok: true });
  });

  return router;
}

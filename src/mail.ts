import { Resend } from "resend";
import { moduleLogger } from "./logger";

const log = moduleLogger("mail");

export type ContactFields = {
  company: string;
  name: string;
  email: string;
  phone: string;
  message: string;
  location?: string;
  revenue?: string;
  employees?: string;
  industry?: string;
  years?: string;
  interest?: string;
  companyUrl?: string;
};

export type OutgoingMail = {
  to: string;
  subject: string;
  text: string;
};

export type SendResult = { ok: true } | { ok: false; error: "mail_not_configured" | "mail_failed" };

export interface EmailSender {
  send(mail: OutgoingMail): Promise<SendResult>;
}

const OPTIONAL_LABELS: Array<[keyof ContactFields, string]> = [
  ["location", "Company location"],
  ["revenue", "Annual revenue"],
  ["employees", "Employees"],
  ["industry", "Industry"],
  ["years", "Years in business"],
  ["interest", "Area of interest"],
  ["companyUrl", "Company website"]
];

/** The operator notification and the acknowledgement sent back to the enquirer. */
export function buildContactMails(fields: ContactFields, operator: string): [OutgoingMail, OutgoingMail] {
  const extras = OPTIONAL_LABELS.flatMap(([key, label]) => {
    const value = (fields[key] ?? "").trim();
    return value ? [`${label}: ${value}`] : [];
  });

  const notification: OutgoingMail = {
    to: operator,
    subject: `[Contact] ${fields.company} - ${fields.name}`,
    text: [
      "A new enquiry arrived through the contact form.",
      "",
      `Company: ${fields.company}`,
      `Contact: ${fields.name}`,
      `Email: ${fields.email}`,
      `Phone: ${fields.phone}`,
      "",
      "Message:",
      fields.message,
      "",
      "[Additional information]",
      extras.length > 0 ? extras.join("\n") : "(none selected)"
    ].join("\n")
  };

  const acknowledgement: OutgoingMail = {
    to: fields.email,
    subject: "We received your enquiry",
    text: [
      `Hello ${fields.name},`,
      "",
      "Thank you for getting in touch. We have received your enquiry",
      "and will get back to you shortly.",
      ""
    ].join("\n")
  };

  return [notification, acknowledgement];
}

export class ResendEmailSender implements EmailSender {
  private readonly client: Resend | null;

  constructor(
    apiKey: string | undefined,
    private readonly from: string
  ) {
    this.client = apiKey ? new Resend(apiKey) : null;
  }

  async send(mail: OutgoingMail): Promise<SendResult> {
    if (!this.client) {
      log.warn({ to: mail.to }, "RESEND_API_KEY not configured, skipping email");
      return { ok: false, error: "mail_not_configured" };
    }

    try {
      const { error } = await this.client.emails.send({
        from: this.from,
        to: mail.to,
        subject: mail.subject,
        text: mail.text
      });
      if (error) {
        log.error({ to: mail.to, error }, "resend rejected email");
        return { ok: false, error: "mail_failed" };
      }
      return { ok: true };
    } catch (err) {
      log.error({ to: mail.to, err }, "email send failed");
      return { ok: false, error: "mail_failed" };
    }
  }
}

/** Sends the notification, then the acknowledgement; the first failure wins. */
export async function sendContactMails(
  sender: EmailSender,
  fields: ContactFields,
  operator: string
): Promise<SendResult> {
  const [notification, acknowledgement] = buildContactMails(fields, operator);
  const first = await sender.send(notification);
  if (!first.ok) return first;
  return sender.send(acknowledgement);
}

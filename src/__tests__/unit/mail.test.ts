import { describe, it, expect, vi } from "vitest";
import {
  buildContactMails,
  ResendEmailSender,
  sendContactMails,
  type ContactFields,
  type EmailSender,
  type OutgoingMail,
  type SendResult
} from "../../mail";

const fields: ContactFields = {
  company: "Acme",
  name: "Kim",
  email: "kim@example.com",
  phone: "010-0000-0000",
  message: "Hello there",
  location: "Seoul",
  industry: "  "
};

describe("buildContactMails", () => {
  it("addresses the operator with every field and the filled extras", () => {
    const [notification] = buildContactMails(fields, "ops@example.com");
    expect(notification.to).toBe("ops@example.com");
    expect(notification.subject).toBe("[Contact] Acme - Kim");
    expect(notification.text.split("\n")).toEqual([
      "A new enquiry arrived through the contact form.",
      "",
      "Company: Acme",
      "Contact: Kim",
      "Email: kim@example.com",
      "Phone: 010-0000-0000",
      "",
      "Message:",
      "Hello there",
      "",
      "[Additional information]",
      "Company location: Seoul"
    ]);
  });

  it("says so when no extras were chosen", () => {
    const [notification] = buildContactMails({ ...fields, location: undefined }, "ops@example.com");
    expect(notification.text.endsWith("[Additional information]\n(none selected)")).toBe(true);
  });

  it("acknowledges to the sender", () => {
    const [, acknowledgement] = buildContactMails(fields, "ops@example.com");
    expect(acknowledgement.to).toBe("kim@example.com");
    expect(acknowledgement.text.startsWith("Hello Kim,\n")).toBe(true);
  });
});

describe("sendContactMails", () => {
  function fakeSender(results: SendResult[]) {
    const send = vi.fn(async (_mail: OutgoingMail): Promise<SendResult> => results.shift() ?? { ok: true });
    const sender: EmailSender = { send };
    return { sender, send };
  }

  it("sends the notification then the acknowledgement", async () => {
    const { sender, send } = fakeSender([{ ok: true }, { ok: true }]);
    await expect(sendContactMails(sender, fields, "ops@example.com")).resolves.toEqual({ ok: true });
    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls.map(([mail]) => mail.to)).toEqual(["ops@example.com", "kim@example.com"]);
  });

  it("stops at the first failure", async () => {
    const { sender, send } = fakeSender([{ ok: false, error: "mail_failed" }]);
    await expect(sendContactMails(sender, fields, "ops@example.com")).resolves.toEqual({
      ok: false,
      error: "mail_failed"
    });
    expect(send).toHaveBeenCalledTimes(1);
  });
});

describe("ResendEmailSender", () => {
  it("reports missing configuration without an API key", async () => {
    const sender = new ResendEmailSender(undefined, "Dues Ledger <noreply@example.com>");
    await expect(sender.send({ to: "ops@example.com", subject: "s", text: "t" })).resolves.toEqual({
      ok: false,
      error: "mail_not_configured"
    });
  });
});

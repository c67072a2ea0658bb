import type { Server } from "node:http";
import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { AnnouncementsClient } from "../../announcements";
import { createApp } from "../../app";
import { parseEnv } from "../../env";
import type { EmailSender, OutgoingMail, SendResult } from "../../mail";
import { addUsers, createTestState } from "../helpers/factories";

const authLog = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn()
}));

vi.mock("../../logger", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../logger")>();
  return {
    ...actual,
    moduleLogger: (module: string) => (module === "auth" ? authLog : actual.moduleLogger(module))
  };
});

type Session = { cookie: string; csrfToken: string };

const state = createTestState();
const send = vi.fn(async (_mail: OutgoingMail): Promise<SendResult> => ({ ok: true }));
const mailer: EmailSender = { send };

let server: Server;
let baseUrl = "";

beforeAll(async () => {
  await state.admin.seedIfMissing("test-admin-pass");
  addUsers(state, "member", ["m1"], "test-pass");
  state.saveLedger("member", [
    { userId: "m1", year: "2026", month: 0 },
    { userId: "m1", year: "2026", month: 1 }
  ]);

  const app = createApp({
    state,
    env: parseEnv({ NODE_ENV: "test" }),
    mailer,
    announcements: new AnnouncementsClient(undefined, "https://feed.example.test/api")
  });
  await new Promise<void>((resolve) => {
    server = app.listen(0, "127.0.0.1", () => resolve());
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server did not bind a port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

type RequestOptions = { method?: string; session?: Session; body?: unknown };

function request(path: string, { method = "GET", session, body }: RequestOptions = {}) {
  const headers: Record<string, string> = { "content-type": "application/json" };
  if (session) {
    headers.cookie = session.cookie;
    headers["x-csrf-token"] = session.csrfToken;
  }
  return fetch(`${baseUrl}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body)
  });
}

async function login(username: string, password: string): Promise<Session> {
  const res = await request("/api/auth/login", { method: "POST", body: { username, password } });
  expect(res.status).toBe(200);
  const data = (await res.json()) as { csrfToken: string };
  const cookie = (res.headers.get("set-cookie") ?? "").split(";")[0] ?? "";
  return { cookie, csrfToken: data.csrfToken };
}

describe("HTTP surface", () => {
  it("answers the health check", async () => {
    const res = await request("/api/health");
    expect(await res.json()).toEqual({ ok: true });
  });

  it("rejects bad credentials uniformly", async () => {
    const wrong = await request("/api/auth/login", {
      method: "POST",
      body: { username: "m1", password: "nope" }
    });
    const unknown = await request("/api/auth/login", {
      method: "POST",
      body: { username: "ghost", password: "nope" }
    });
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ error: "invalid_credentials" });
    expect(unknown.status).toBe(401);
    expect(await unknown.json()).toEqual({ error: "invalid_credentials" });

    expect(authLog.info).toHaveBeenCalledWith({ userId: "m1" }, "login failed");
    expect(authLog.info).toHaveBeenCalledWith({ userId: "ghost" }, "login failed");
    expect(JSON.stringify(authLog.info.mock.calls)).not.toContain("nope");
  });

  it("requires a session for /api/me", async () => {
    const res = await request("/api/me");
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "unauthorized" });
  });

  it("logs a member in and serves their dashboard", async () => {
    const session = await login("m1", "test-pass");
    expect(session.cookie.startsWith("dl_session=")).toBe(true);

    const me = await request("/api/me", { session });
    expect(await me.json()).toEqual({ user: { id: "m1", role: "user", userClass: "member" } });

    const res = await request("/api/me/dashboard?year=2026", { session });
    const dashboard = (await res.json()) as {
      year: string;
      paidCount: number;
      status: Array<{ month: number; paid: boolean }>;
      note: { text: string; updatedAt: string | null; updatedOn: string };
    };
    expect(dashboard.year).toBe("2026");
    expect(dashboard.paidCount).toBe(2);
    expect(dashboard.status[0]).toEqual({ month: 0, paid: true });
    expect(dashboard.status[2]).toEqual({ month: 2, paid: false });
    expect(dashboard.note).toEqual({ text: "", updatedAt: null, updatedOn: "" });
    expect(state.logins.all().m1?.ip).not.toBe("");
  });

  it("checks the CSRF token before the role", async () => {
    const session = await login("m1", "test-pass");
    const noToken = await request("/api/todos", {
      method: "POST",
      session: { cookie: session.cookie, csrfToken: "wrong" },
      body: { title: "x" }
    });
    expect(noToken.status).toBe(403);
    expect(await noToken.json()).toEqual({ error: "csrf" });

    const notAdmin = await request("/api/todos", { method: "POST", session, body: { title: "x" } });
    expect(notAdmin.status).toBe(403);
    expect(await notAdmin.json()).toEqual({ error: "forbidden" });
    expect(state.todos.list()).toEqual([]);
  });

  it("lets the admin manage users and todos", async () => {
    const session = await login("admin", "test-admin-pass");

    const added = await request("/api/admin/users/partner", {
      method: "POST",
      session,
      body: { id: "p9", credential: "test-pass", equity: "3%" }
    });
    expect(added.status).toBe(201);
    expect(await added.json()).toEqual({ ok: true, created: true });
    expect(state.credentials.partner.get("p9")?.equity).toBe("3%");

    const badClass = await request("/api/admin/users/guest", {
      method: "POST",
      session,
      body: { id: "g1", credential: "test-pass" }
    });
    expect(badClass.status).toBe(404);

    const badId = await request("/api/admin/users/member", {
      method: "POST",
      session,
      body: { id: "m_2", credential: "test-pass" }
    });
    expect(badId.status).toBe(400);
    expect(await badId.json()).toEqual({ error: "invalid_request" });
    expect(state.credentials.member.has("m_2")).toBe(false);

    const empty = await request("/api/todos", { method: "POST", session, body: { title: "" } });
    expect(await empty.json()).toEqual({ ok: true, created: false });

    const created = await request("/api/todos", {
      method: "POST",
      session,
      body: { title: "Send reminders", audienceType: "selected", audienceIds: { p9: true, m1: false } }
    });
    expect(created.status).toBe(201);
    const body = (await created.json()) as { todo: { audienceType: string; audienceIds: string[] } };
    expect(body.todo.audienceType).toBe("selected");
    expect(body.todo.audienceIds).toEqual(["p9"]);
  });

  it("saves a bulk ledger edit from form keys", async () => {
    const session = await login("admin", "test-admin-pass");
    const res = await request("/api/admin/ledger/member", {
      method: "POST",
      session,
      body: { data_m1_2025_3: "on", data_ghost_2025_3: "on", note_m1: "reminded" }
    });
    expect(await res.json()).toEqual({ ok: true, applied: 1, skipped: 1 });
    expect(state.ledger.getYear("m1", "2025")[3]).toBe(true);
    expect(state.ledger.getYear("m1", "2026")[0]).toBe(false);
    expect(state.notes.get("m1").text).toBe("reminded");
  });

  it("drops honeypot contact submissions and mails real ones", async () => {
    const fields = {
      company: "Acme",
      name: "Kim",
      email: "kim@example.com",
      phone: "010-0000-0000",
      message: "Hello"
    };
    const trap = await request("/api/contact", { method: "POST", body: { ...fields, website: "spam" } });
    expect(await trap.json()).toEqual({ ok: true });
    expect(send).not.toHaveBeenCalled();

    const real = await request("/api/contact", { method: "POST", body: fields });
    expect(await real.json()).toEqual({ ok: true });
    expect(send).toHaveBeenCalledTimes(2);
  });

  it("reports a missing announcements key without failing", async () => {
    const session = await login("m1", "test-pass");
    const res = await request("/api/announcements", { session });
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: "missing_api_key", hint: "set ANNOUNCEMENTS_API_KEY" });
  });
});

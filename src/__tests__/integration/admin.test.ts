import { describe, it, expect } from "vitest";
import { createTestState } from "../helpers/factories";

describe("admin password change", () => {
  async function seeded() {
    const state = createTestState();
    await state.admin.seedIfMissing("test-admin-pass");
    return state;
  }

  it("rejects mismatched or short new passwords", async () => {
    const state = await seeded();
    await expect(
      state.admin.changePassword({
        currentPassword: "test-admin-pass",
        newPassword: "new-pass",
        newPasswordConfirm: "new-pass-2"
      })
    ).resolves.toBe("invalid_request");
    await expect(
      state.admin.changePassword({
        currentPassword: "test-admin-pass",
        newPassword: "abc",
        newPasswordConfirm: "abc"
      })
    ).resolves.toBe("invalid_request");
  });

  it("rejects a wrong current password", async () => {
    const state = await seeded();
    await expect(
      state.admin.changePassword({
        currentPassword: "wrong",
        newPassword: "new-pass",
        newPasswordConfirm: "new-pass"
      })
    ).resolves.toBe("invalid_credentials");
  });

  it("replaces the credential", async () => {
    const state = await seeded();
    await expect(
      state.admin.changePassword({
        currentPassword: " test-admin-pass ",
        newPassword: "new-pass",
        newPasswordConfirm: "new-pass"
      })
    ).resolves.toBe("ok");

    expect(await state.admin.verify("new-pass")).toBe(true);
    expect(await state.admin.verify("test-admin-pass")).toBe(false);
  });
});

describe("default accounts", () => {
  it("seeds an empty store once", async () => {
    const state = createTestState();
    expect(state.seedDefaultAccounts()).toBe(true);
    expect(state.credentials.member.ids()).toEqual(["member-a", "member-b", "member-c", "member-d"]);
    expect(state.credentials.partner.ids()).toEqual(["partner-a"]);
    expect(await state.verifyLogin("member-b", "changeme")).not.toBeNull();
    expect(state.seedDefaultAccounts()).toBe(false);
  });

  it("leaves a populated store alone", () => {
    const state = createTestState();
    state.addUser("partner", { id: "p1", credential: "test-pass" });
    expect(state.seedDefaultAccounts()).toBe(false);
    expect(state.credentials.member.ids()).toEqual([]);
  });
});

describe("user deletion", () => {
  it("removes logins and sessions with the account", () => {
    const state = createTestState();
    state.addUser("customer", { id: "c1", credential: "test-pass" });
    state.logins.record("c1", "127.0.0.1", "2026-03-01 10:00:00");
    state.db
      .prepare("INSERT INTO sessions (id, user_id, csrf_token, created_at, expires_at) VALUES (?, ?, ?, ?, ?)")
      .run("s1", "c1", "t1", 0, Date.now() + 60_000);

    expect(state.logins.all()).toEqual({ c1: { at: "2026-03-01 10:00:00", ip: "127.0.0.1" } });
    expect(state.deleteUser("customer", "c1")).toBe(true);
    expect(state.logins.all()).toEqual({});
    expect(state.db.prepare("SELECT COUNT(*) AS n FROM sessions").get()).toEqual({ n: 0 });
    expect(state.resolveIdentity("c1")).toBeNull();
  });
});

import { describe, it, expect } from "vitest";
import { addUsers, createTestState } from "../helpers/factories";

describe("badges", () => {
  it("groups badges by member in insertion order", () => {
    const state = createTestState();
    const first = state.badges.add("m1", "Recruited a member", 3);
    const second = state.badges.add("m2", "Ran the stall", "2");
    const third = state.badges.add("m1", "Perfect attendance", 99);

    expect(state.badges.listByMember()).toEqual({
      m1: [
        { id: first?.id, memberId: "m1", missionName: "Recruited a member", iconType: 3 },
        { id: third?.id, memberId: "m1", missionName: "Perfect attendance", iconType: 1 }
      ],
      m2: [{ id: second?.id, memberId: "m2", missionName: "Ran the stall", iconType: 2 }]
    });
  });

  it("does nothing for an empty member or mission", () => {
    const state = createTestState();
    expect(state.badges.add("", "Mission", 1)).toBeNull();
    expect(state.badges.add("m1", "   ", 1)).toBeNull();
    expect(state.badges.listByMember()).toEqual({});
  });

  it("updates and deletes by id", () => {
    const state = createTestState();
    const badge = state.badges.add("m1", "Draft", 1);
    const id = badge?.id ?? 0;

    expect(state.badges.update(id, "Final", "4")).toBe(true);
    expect(state.badges.update(id, "  ", 4)).toBe(false);
    expect(state.badges.listFor("m1")).toEqual([{ id, memberId: "m1", missionName: "Final", iconType: 4 }]);

    expect(state.badges.delete(id)).toBe(true);
    expect(state.badges.delete(id)).toBe(false);
  });

  it("are removed with their member but not with a partner of the same id", () => {
    const state = createTestState();
    addUsers(state, "member", ["m1"]);
    addUsers(state, "partner", ["p1"]);
    state.badges.add("m1", "One", 1);
    state.badges.add("m1", "Two", 2);
    state.badges.add("p1", "Kept", 5);

    state.deleteUser("partner", "p1");
    expect(state.badges.listFor("p1")).toHaveLength(1);

    state.deleteUser("member", "m1");
    expect(state.badges.listFor("m1")).toEqual([]);
  });
});

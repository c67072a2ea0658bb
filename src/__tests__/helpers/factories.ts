import { openDatabase, type Db } from "../../db";
import { AppState, type StateConfig } from "../../state";
import type { UserClass } from "../../types";

export const TEST_CONFIG: StateConfig = {
  years: ["2025", "2026", "2027"],
  defaultYear: "2026",
  plaintextClasses: ["backer", "customer"]
};

export function createTestDb(): Db {
  return openDatabase(":memory:");
}

export function createTestState(config: Partial<StateConfig> = {}, db: Db = createTestDb()) {
  return new AppState(db, { ...TEST_CONFIG, ...config });
}

/** Adds `ids` to one class in order, all with the same placeholder credential. */
export function addUsers(state: AppState, userClass: UserClass, ids: string[], credential = "test-pass") {
  for (const id of ids) state.addUser(userClass, { id, credential });
}

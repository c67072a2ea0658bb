import type { Db } from "./db";
import type { Env } from "./env";
import { ledgerYears } from "./env";
import { moduleLogger } from "./logger";
import { AdminRepo } from "./repos/adminRepo";
import { BadgeRepo } from "./repos/badgeRepo";
import {
  CredentialRepo,
  type AddUserInput,
  type UpdateUserInput
} from "./repos/credentialRepo";
import { PaymentLedger, type BulkSetResult, type LedgerEdit } from "./repos/ledgerRepo";
import { LoginRepo } from "./repos/loginRepo";
import { NoteRepo } from "./repos/noteRepo";
import { TodoRepo } from "./repos/todoRepo";
import { localTimestamp } from "./time";
import { ADMIN_ID, USER_CLASSES, type Identity, type UserClass } from "./types";

const log = moduleLogger("state");

export type StateConfig = {
  years: readonly string[];
  defaultYear: string;
  plaintextClasses: readonly UserClass[];
};

export function stateConfigFromEnv(env: Env): StateConfig {
  return {
    years: ledgerYears(env),
    defaultYear: String(env.DEFAULT_LEDGER_YEAR),
    plaintextClasses: env.PLAINTEXT_CREDENTIAL_CLASSES
  };
}

/**
 * Ids must survive the bulk-edit key (`data_<id>_<year>_<month>`) and the comma-joined
 * audience list, and must not read as an audience keyword.
 */
export const USER_ID_PATTERN = /^[A-Za-z0-9.-]{1,64}$/;
const RESERVED_USER_IDS = new Set([ADMIN_ID, "all", "members", "partners"]);

export function isValidUserId(id: string) {
  return USER_ID_PATTERN.test(id) && !RESERVED_USER_IDS.has(id);
}

const DEFAULT_MEMBERS = ["member-a", "member-b", "member-c", "member-d"];
const DEFAULT_PARTNERS = ["partner-a"];
const DEFAULT_CREDENTIAL = "changeme";

/**
 * Everything a request handler needs: the store, the account pools and the payment
 * ledger mirror. One instance per process, handed to each router.
 *
 * Mutations run inside a single better-sqlite3 transaction and touch the mirrors in the
 * same synchronous call, so no request can see the table and the mirror disagree. If the
 * transaction throws, mirrors are rebuilt from the store.
 */
export class AppState {
  readonly credentials: Record<UserClass, CredentialRepo>;
  readonly ledger: PaymentLedger;
  readonly notes: NoteRepo;
  readonly badges: BadgeRepo;
  readonly todos: TodoRepo;
  readonly logins: LoginRepo;
  readonly admin: AdminRepo;

  constructor(
    readonly db: Db,
    readonly config: StateConfig
  ) {
    const plaintext = new Set(config.plaintextClasses);
    this.credentials = {
      member: new CredentialRepo(db, "member", plaintext.has("member")),
      partner: new CredentialRepo(db, "partner", plaintext.has("partner")),
      backer: new CredentialRepo(db, "backer", plaintext.has("backer")),
      customer: new CredentialRepo(db, "customer", plaintext.has("customer"))
    };
    this.ledger = new PaymentLedger(db, config.years);
    this.notes = new NoteRepo(db);
    this.badges = new BadgeRepo(db);
    this.todos = new TodoRepo(db);
    this.logins = new LoginRepo(db);
    this.admin = new AdminRepo(db);
    this.ledger.load(this.knownUsers());
  }

  private knownUsers(): Record<UserClass, string[]> {
    return {
      member: this.credentials.member.ids(),
      partner: this.credentials.partner.ids(),
      backer: this.credentials.backer.ids(),
      customer: this.credentials.customer.ids()
    };
  }

  /** Rebuilds every mirror from the store. */
  reload() {
    for (const userClass of USER_CLASSES) this.credentials[userClass].reload();
    this.ledger.load(this.knownUsers());
  }

  private mutate<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (err) {
      this.reload();
      throw err;
    }
  }

  /** `admin`, else the first class (member, partner, backer, customer) that knows the id. */
  resolveIdentity(userId: string): Identity | null {
    if (userId === ADMIN_ID) return { id: ADMIN_ID, role: "admin", userClass: null };
    for (const userClass of USER_CLASSES) {
      if (this.credentials[userClass].has(userId)) return { id: userId, role: "user", userClass };
    }
    return null;
  }

  /** Generic failure for unknown ids and wrong credentials alike. */
  async verifyLogin(userId: string, password: string): Promise<Identity | null> {
    const identity = this.resolveIdentity(userId);
    if (!identity) return null;
    if (identity.role === "admin") return (await this.admin.verify(password)) ? identity : null;
    return this.credentials[identity.userClass].verify(userId, password) ? identity : null;
  }

  /**
   * Adds the account and gives it an unpaid ledger. An id already known to any class
   * changes nothing: ledger rows carry no class, and only the first class could log in.
   */
  addUser(userClass: UserClass, input: AddUserInput): boolean {
    const id = input.id.trim();
    if (!isValidUserId(id) || this.resolveIdentity(id)) return false;
    return this.mutate(() => {
      const added = this.credentials[userClass].add(input);
      if (added) this.ledger.addUser(userClass, input.id.trim());
      return added;
    });
  }

  updateUser(userClass: UserClass, id: string, input: UpdateUserInput): boolean {
    return this.mutate(() => this.credentials[userClass].update(id, input));
  }

  /** Removes the account with its ledger rows, last login and sessions (and, for members, note and badges). */
  deleteUser(userClass: UserClass, id: string): boolean {
    return this.mutate(() => {
      const removed = this.credentials[userClass].delete(id);
      this.ledger.removeUser(userClass, id);
      if (userClass === "member") this.notes.delete(id);
      this.logins.delete(id);
      this.db.prepare("DELETE FROM sessions WHERE user_id = ?").run(id);
      return removed;
    });
  }

  /**
   * Admin bulk edit: replaces the class's ledger with `edits` and, for members, re-saves every
   * member's note with one stamp, taking submitted text over the stored one. Notes for unknown
   * members are ignored.
   */
  saveLedger(
    userClass: UserClass,
    edits: Iterable<LedgerEdit>,
    notes: Record<string, string> = {}
  ): BulkSetResult {
    return this.mutate(() => {
      const result = this.ledger.bulkSet(userClass, edits);
      if (userClass === "member") {
        // The whole note set is re-saved under one stamp, submitted or not.
        const at = localTimestamp();
        const stored = this.notes.all();
        for (const memberId of this.credentials.member.ids()) {
          const text = notes[memberId] ?? stored[memberId]?.text;
          if (text !== undefined) this.notes.set(memberId, text, at);
        }
      }
      return result;
    });
  }

  /** Seeds a starter member/partner pool into an empty store. */
  seedDefaultAccounts() {
    if (this.credentials.member.ids().length > 0 || this.credentials.partner.ids().length > 0) {
      return false;
    }
    this.mutate(() => {
      DEFAULT_MEMBERS.forEach((id, i) =>
        this.addUser("member", { id, credential: DEFAULT_CREDENTIAL, sortOrder: i })
      );
      DEFAULT_PARTNERS.forEach((id, i) =>
        this.addUser("partner", { id, credential: DEFAULT_CREDENTIAL, sortOrder: i })
      );
    });
    log.info(
      { members: DEFAULT_MEMBERS.length, partners: DEFAULT_PARTNERS.length },
      "seeded default accounts"
    );
    return true;
  }
}

export const USER_CLASSES = ["member", "partner", "backer", "customer"] as const;

export type UserClass = (typeof USER_CLASSES)[number];

export const ADMIN_ID = "admin";

export function isUserClass(value: unknown): value is UserClass {
  return USER_CLASSES.some((userClass) => userClass === value);
}

export type UserRecord = {
  id: string;
  credential: string;
  sortOrder: number;
  equity: string;
};

/** A {@link UserRecord} without its credential, safe to hand to views. */
export type PublicUser = Omit<UserRecord, "credential">;

export type LastLogin = {
  at: string;
  ip: string;
};

export type Note = {
  text: string;
  updatedAt: string | null;
};

export type Badge = {
  id: number;
  memberId: string;
  missionName: string;
  iconType: number;
};

export type Audience =
  | { kind: "all" }
  | { kind: "members" }
  | { kind: "partners" }
  | { kind: "explicit"; ids: ReadonlySet<string> };

export type TodoItem = {
  id: number;
  title: string;
  done: boolean;
  audience: Audience;
  sortOrder: number;
  detail: string;
};

export type Identity =
  | { id: string; role: "admin"; userClass: null }
  | { id: string; role: "user"; userClass: UserClass };

export const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec"
] as const;

export const BADGE_ICONS: ReadonlyArray<readonly [emoji: string, label: string]> = [
  ["🏆", "Trophy"],
  ["🥇", "Gold medal"],
  ["⭐", "Star"],
  ["🎯", "Bullseye"],
  ["💡", "Light bulb"],
  ["🔥", "Flame"],
  ["🌟", "Glowing star"],
  ["✨", "Sparkles"],
  ["🎖️", "Military medal"],
  ["🏅", "Sports medal"]
];

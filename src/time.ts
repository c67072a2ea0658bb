function pad(n: number) {
  return String(n).padStart(2, "0");
}

/** Local wall-clock time as `YYYY-MM-DD HH:mm:ss`, the format notes and logins are stored in. */
export function localTimestamp(date: Date = new Date()) {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Day part of a stored timestamp, e.g. `2026-01-30 14:30:00` -> `2026-01-30`. */
export function formatNoteDate(stamp: string | null | undefined) {
  if (!stamp) return "";
  return stamp.slice(0, 10);
}

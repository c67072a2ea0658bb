import crypto from "node:crypto";

const ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const DIGEST = "sha256";

/** Stored form is `salt:hashhex`; the salt is hex text used as-is (not decoded). */
export function hashCredential(plain: string) {
  const salt = crypto.randomBytes(16).toString("hex");
  const hash = crypto.pbkdf2Sync(plain, salt, ITERATIONS, KEY_LENGTH, DIGEST);
  return `${salt}:${hash.toString("hex")}`;
}

export function looksHashed(stored: string) {
  return stored.includes(":");
}

export function verifyCredential(plain: string, stored: string) {
  if (!looksHashed(stored)) return plain === stored;

  const sep = stored.indexOf(":");
  const salt = stored.slice(0, sep);
  const hex = stored.slice(sep + 1);
  if (hex.length === 0 || hex.length % 2 !== 0 || !/^[0-9a-f]+$/i.test(hex)) return false;

  const expected = Buffer.from(hex, "hex");
  const actual = crypto.pbkdf2Sync(plain, salt, ITERATIONS, expected.length, DIGEST);
  return crypto.timingSafeEqual(actual, expected);
}

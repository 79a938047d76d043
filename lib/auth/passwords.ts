/**
 * Password hashing with Node's scrypt.
 * Stored format: "salt:hash", both hex-encoded.
 */

import crypto from "node:crypto";

const KEY_LENGTH = 64;

export function hashPassword(password: string): string {
  const salt = crypto.randomBytes(16);
  const derived = crypto.scryptSync(password, salt, KEY_LENGTH);
  return `${salt.toString("hex")}:${derived.toString("hex")}`;
}

/**
 * Verify a plain-text password against a stored "salt:hash" value.
 * An empty or malformed hash (unusable password) never matches.
 */
export function verifyPassword(password: string, storedHash: string): boolean {
  const [saltHex, hashHex] = storedHash.split(":");
  if (!saltHex || !hashHex) return false;

  const salt = Buffer.from(saltHex, "hex");
  const storedDerived = Buffer.from(hashHex, "hex");
  if (storedDerived.length !== KEY_LENGTH) return false;

  const derived = crypto.scryptSync(password, salt, KEY_LENGTH);
  return crypto.timingSafeEqual(derived, storedDerived);
}

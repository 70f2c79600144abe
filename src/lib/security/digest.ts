import crypto from "node:crypto";

/**
 * Lowercase hex SHA-256 of a UTF-8 string.
 */
export function sha256Hex(value: string): string {
  return crypto.createHash("sha256").update(value, "utf8").digest("hex");
}

/**
 * Password digest as stored in `users.password_hash`.
 *
 * Known limitation: a single unsalted SHA-256 pass, not a slow KDF.
 */
export function hashPassword(password: string): string {
  return sha256Hex(password);
}

/**
 * Compares the digest of `password` with `storedHash` byte for byte.
 * Equal-length inputs are compared in constant time.
 */
export function verifyPasswordHash(password: string, storedHash: string): boolean {
  const actual = Buffer.from(hashPassword(password), "utf8");
  const expected = Buffer.from(storedHash, "utf8");

  if (actual.byteLength !== expected.byteLength) {
    return false;
  }

  return crypto.timingSafeEqual(actual, expected);
}

/**
 * Session token for a user at a point in time: the SHA-256 hex of
 * `<userId>_<timestamp>`, with `_<attempt>` appended when an earlier attempt
 * collided with a live token.
 *
 * Known limitation: not drawn from a CSPRNG.
 */
export function deriveSessionToken(userId: number, timestamp: string, attempt = 0): string {
  const input = attempt === 0 ? `${userId}_${timestamp}` : `${userId}_${timestamp}_${attempt}`;
  return sha256Hex(input);
}

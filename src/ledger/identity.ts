import { createHash } from "node:crypto";

const IDENTITY_BYTES = 6;

/**
 * Maps a platform user id to the ledger identity: the first 48 bits of
 * SHA-256(`salt:rawId`), which always fit a safe integer.
 */
export function hashIdentity(rawId: string | number, salt = ""): number {
  const digest = createHash("sha256").update(`${salt}:${rawId}`).digest();
  return digest.readUIntBE(0, IDENTITY_BYTES);
}

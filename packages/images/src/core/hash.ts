import crypto from "node:crypto"

/**
 * Generate content-addressed hash (full SHA-256, 64 hex chars)
 *
 * Same content = same hash, so it doubles as the source image identity and
 * as a deduplication key for stored outputs.
 */
export function generateContentHash(buffer: Uint8Array): string {
  return crypto.createHash("sha256").update(buffer).digest("hex")
}

export function isContentHash(value: string): boolean {
  return /^[0-9a-f]{64}$/.test(value)
}

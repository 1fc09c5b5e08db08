import crypto from "node:crypto"
import { ValidationError } from "@pixelforge/shared"
import { type OperationSet, validateOperationSet } from "../operations/schema.js"
import { canonicalizeOperations } from "./canonical.js"
import { isContentHash } from "./hash.js"

const FINGERPRINT_NAMESPACE = "pixelforge/v1"

/**
 * Deterministic cache and ledger key for a (source image, operation set) pair.
 *
 * Pure: no I/O, no randomness. Rejects unknown operations and out-of-range
 * parameters with a ValidationError.
 */
export function fingerprint(sourceContentHash: string, operations: OperationSet): string {
  if (!isContentHash(sourceContentHash)) {
    throw new ValidationError("Source content hash must be a SHA-256 hex digest", "validation:source")
  }
  const validated = validateOperationSet(operations)
  const payload = `${FINGERPRINT_NAMESPACE}\n${sourceContentHash}\n${canonicalizeOperations(validated)}`
  return crypto.createHash("sha256").update(payload).digest("hex")
}

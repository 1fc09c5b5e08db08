import { ValidationError } from "@pixelforge/shared"
import { type SupportedMimeType, validateImageType } from "./magic-numbers.js"
import { MAX_FILE_SIZE, MIN_FILE_SIZE, validateFileSize } from "./size-limits.js"

/**
 * Reject anything that is not a JPEG, PNG or GIF within the size limits.
 * Size is checked first so oversized bodies never get sniffed.
 */
export function validateImageBuffer(buffer: Uint8Array, maxSize: number = MAX_FILE_SIZE): SupportedMimeType {
  const sizeError = validateFileSize(buffer.length, maxSize)
  if (sizeError) {
    const tooLarge = buffer.length >= MIN_FILE_SIZE
    throw new ValidationError(sizeError, "validation:size", tooLarge ? 413 : 400)
  }

  const mimeType = validateImageType(buffer)
  if (!mimeType) {
    throw new ValidationError("Invalid file type. Only JPEG, PNG and GIF images are allowed.", "validation:type")
  }
  return mimeType
}

/**
 * MIME type signatures (magic numbers)
 * These are the first bytes of valid image files
 *
 * SECURITY: Never trust file extensions or Content-Type headers.
 * Always validate using magic numbers to prevent .php.jpg attacks.
 */
export type SupportedMimeType = "image/jpeg" | "image/png" | "image/gif"

const SIGNATURES: Record<SupportedMimeType, readonly number[]> = {
  "image/jpeg": [0xff, 0xd8, 0xff],
  "image/png": [0x89, 0x50, 0x4e, 0x47],
  "image/gif": [0x47, 0x49, 0x46, 0x38],
}

const SUPPORTED_MIME_TYPES: SupportedMimeType[] = ["image/jpeg", "image/png", "image/gif"]

/**
 * Validate image type by reading file signature (magic numbers)
 * @returns Detected MIME type or null if invalid
 */
export function validateImageType(buffer: Uint8Array): SupportedMimeType | null {
  for (const mimeType of SUPPORTED_MIME_TYPES) {
    if (SIGNATURES[mimeType].every((byte, i) => buffer[i] === byte)) {
      return mimeType
    }
  }
  return null
}

export function getAllowedMimeTypes(): SupportedMimeType[] {
  return [...SUPPORTED_MIME_TYPES]
}

export function extensionFor(mimeType: SupportedMimeType): "jpg" | "png" | "gif" {
  switch (mimeType) {
    case "image/jpeg":
      return "jpg"
    case "image/png":
      return "png"
    case "image/gif":
      return "gif"
  }
}

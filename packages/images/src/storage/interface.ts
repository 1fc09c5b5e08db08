import type { BlobNamespace } from "../core/keys.js"
import type { HResponse } from "../types/response.js"

/**
 * Blob store adapter. Locators are opaque to callers; the filesystem store
 * uses content-addressed keys, so writing the same id twice is a no-op
 * overwrite.
 */
export interface BlobStore {
  /**
   * Store bytes under a namespace and content-derived id
   * @param id - Content hash for sources, fingerprint for outputs
   * @param extension - File extension without the dot
   * @returns Locator for later retrieval
   */
  put(namespace: BlobNamespace, id: string, extension: string, data: Buffer): HResponse<string>

  /**
   * @returns Blob bytes, or null when nothing is stored under the locator
   */
  get(locator: string): HResponse<Buffer | null>

  ping(): Promise<boolean>
}

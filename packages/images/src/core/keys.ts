export type BlobNamespace = "sources" | "outputs"

const KEY_PATTERN = /^(sources|outputs)\/([0-9a-f]{2})\/([0-9a-f]{64})\.(jpg|png|gif)$/

/**
 * Generate storage key following content-addressed pattern:
 * {namespace}/{id[0..2]}/{id}.{ext}
 *
 * Sources are keyed by content hash, outputs by fingerprint, so repeated
 * writes of the same content land on the same key.
 */
export function generateStorageKey(namespace: BlobNamespace, id: string, extension: string): string {
  return `${namespace}/${id.slice(0, 2)}/${id}.${extension}`
}

/**
 * Parse storage key back into components
 */
export function parseStorageKey(key: string): {
  namespace: BlobNamespace
  id: string
  extension: string
} | null {
  const match = key.match(KEY_PATTERN)
  if (!match) return null

  const [, namespace, shard, id, extension] = match
  if (!id.startsWith(shard)) return null
  return {
    namespace: namespace === "sources" ? "sources" : "outputs",
    id,
    extension,
  }
}

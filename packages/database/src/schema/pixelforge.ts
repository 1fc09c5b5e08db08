/**
 * Pixelforge Schema - Source Images and Processed Versions
 *
 * Source images are keyed by the SHA-256 of their bytes; processed versions
 * by the fingerprint of (source, operation set). Both are append-only.
 */
import type { OperationSet } from "@pixelforge/images"
import { relations } from "drizzle-orm"
import { bigserial, foreignKey, index, integer, jsonb, pgSchema, text, timestamp, unique, uuid } from "drizzle-orm/pg-core"

export const pixelforgeSchema = pgSchema("pixelforge")

export const sourceTypeEnum = pixelforgeSchema.enum("source_type", ["upload", "url"])

// ============================================================================
// TABLES
// ============================================================================

/**
 * Source Images - one row per distinct original
 */
export const sourceImages = pixelforgeSchema.table(
  "source_images",
  {
    id: uuid("id").defaultRandom().primaryKey().notNull(),
    contentHash: text("content_hash").notNull(),
    perceptualHash: text("perceptual_hash").notNull(),
    mimeType: text("mime_type").notNull(),
    width: integer("width").notNull(),
    height: integer("height").notNull(),
    byteSize: integer("byte_size").notNull(),
    sourceType: sourceTypeEnum("source_type").notNull(),
    sourceUrl: text("source_url"),
    locator: text("locator").notNull(),
    // millisecond precision so keyset cursors round-trip through JS Dates
    createdAt: timestamp("created_at", { withTimezone: true, mode: "date", precision: 3 }).defaultNow().notNull(),
  },
  table => [
    unique("source_images_content_hash_key").on(table.contentHash),
    index("idx_source_images_perceptual_hash").on(table.perceptualHash),
  ],
)

/**
 * Processed Versions - one row per fingerprint
 */
export const processedVersions = pixelforgeSchema.table(
  "processed_versions",
  {
    id: uuid("id").defaultRandom().primaryKey().notNull(),
    seq: bigserial("seq", { mode: "number" }).notNull(),
    sourceId: text("source_id").notNull(), // source content hash
    fingerprint: text("fingerprint").notNull(),
    operations: jsonb("operations").$type<OperationSet>().notNull(),
    locator: text("locator").notNull(),
    outputHash: text("output_hash").notNull(),
    mimeType: text("mime_type").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true, mode: "date", precision: 3 }).defaultNow().notNull(),
  },
  table => [
    unique("processed_versions_fingerprint_key").on(table.fingerprint),
    index("idx_processed_versions_source_created").on(table.sourceId, table.createdAt, table.seq),
    foreignKey({
      columns: [table.sourceId],
      foreignColumns: [sourceImages.contentHash],
      name: "processed_versions_source_id_fkey",
    }).onDelete("cascade"),
  ],
)

// ============================================================================
// RELATIONS
// ============================================================================

export const sourceImagesRelations = relations(sourceImages, ({ many }) => ({
  versions: many(processedVersions),
}))

export const processedVersionsRelations = relations(processedVersions, ({ one }) => ({
  source: one(sourceImages, {
    fields: [processedVersions.sourceId],
    references: [sourceImages.contentHash],
  }),
}))

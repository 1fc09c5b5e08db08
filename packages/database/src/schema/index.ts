/**
 * Database Schema Index
 *
 * Usage:
 * ```typescript
 * import { schema } from '@pixelforge/database'
 * import { drizzle } from 'drizzle-orm/node-postgres'
 *
 * const db = drizzle(pool, { schema })
 * ```
 */
export {
  // Schema
  pixelforgeSchema,
  // Enums
  sourceTypeEnum,
  // Tables
  sourceImages,
  processedVersions,
  // Relations
  sourceImagesRelations,
  processedVersionsRelations,
} from "./pixelforge.js"

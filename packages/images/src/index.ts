// Core
export { canonicalizeOperations } from "./core/canonical.js"
export { fingerprint } from "./core/fingerprint.js"
export { generateContentHash, isContentHash } from "./core/hash.js"
export type { BlobNamespace } from "./core/keys.js"
export { generateStorageKey, parseStorageKey } from "./core/keys.js"
export { computePerceptualHash, hammingDistance } from "./core/perceptual.js"

// Operations
export type { TransformationsDocument } from "./operations/document.js"
export { parseTransformationsDocument, TransformationsDocumentSchema } from "./operations/document.js"
export type {
  BlurOp,
  GrayscaleOp,
  OperationName,
  OperationSet,
  OperationSpec,
  RemoveBackgroundOp,
  ResizeMode,
  ResizeOp,
  RotateAngle,
  RotateOp,
} from "./operations/schema.js"
export {
  BLUR_RADIUS,
  includesOperation,
  OPERATION_NAMES,
  operationSetSchema,
  RESIZE_DIMENSION,
  RESIZE_MODES,
  ROTATE_ANGLES,
  validateOperationSet,
} from "./operations/schema.js"

// Transform
export type { Dimensions, OutputMimeType, RgbaImage } from "./transform/codec.js"
export { readDimensions } from "./transform/codec.js"
export type { TransformEngineOptions, TransformFailure, TransformResult } from "./transform/engine.js"
export { TransformEngine } from "./transform/engine.js"
export { resolveResizeDimensions } from "./transform/resize.js"
export type { BackgroundSegmenter, BorderFloodSegmenterOptions } from "./transform/segmentation.js"
export { applyAlphaMask, BorderFloodSegmenter } from "./transform/segmentation.js"

// Storage
export type { FilesystemBlobStoreConfig } from "./storage/filesystem.js"
export { FilesystemBlobStore } from "./storage/filesystem.js"
export type { BlobStore } from "./storage/interface.js"

// Types
export type { ErrorShape, HResponse, Result } from "./types/response.js"
export { Rs } from "./types/response.js"

// Validation
export { validateImageBuffer } from "./validation/intake.js"
export type { SupportedMimeType } from "./validation/magic-numbers.js"
export { extensionFor, getAllowedMimeTypes, validateImageType } from "./validation/magic-numbers.js"
export { MAX_FILE_SIZE, MIN_FILE_SIZE, validateFileSize } from "./validation/size-limits.js"

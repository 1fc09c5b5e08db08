import crypto from "node:crypto"
import fs from "node:fs/promises"
import path from "node:path"
import { extractErrorCode } from "@pixelforge/shared"
import { generateStorageKey, type BlobNamespace, parseStorageKey } from "../core/keys.js"
import type { HResponse } from "../types/response.js"
import { Rs } from "../types/response.js"
import type { BlobStore } from "./interface.js"

export interface FilesystemBlobStoreConfig {
  basePath: string
}

/**
 * Filesystem implementation of BlobStore
 * Stores blobs in a content-addressed structure on local disk
 */
export class FilesystemBlobStore implements BlobStore {
  private readonly basePath: string

  constructor(config: FilesystemBlobStoreConfig) {
    this.basePath = path.resolve(config.basePath)
  }

  async put(namespace: BlobNamespace, id: string, extension: string, data: Buffer): HResponse<string> {
    const key = generateStorageKey(namespace, id, extension)
    if (!parseStorageKey(key)) {
      return Rs.error(`Invalid blob id or extension: ${id}.${extension}`, "fs:key")
    }

    const fullPath = path.join(this.basePath, key)
    // Write then rename so readers never see a partial file
    const tempPath = `${fullPath}.${crypto.randomUUID()}.tmp`
    try {
      await fs.mkdir(path.dirname(fullPath), { recursive: true })
      await fs.writeFile(tempPath, data)
      await fs.rename(tempPath, fullPath)

      return Rs.data(key)
    } catch (error) {
      await fs.rm(tempPath, { force: true })
      return Rs.fromError(error, "fs:put")
    }
  }

  async get(locator: string): HResponse<Buffer | null> {
    if (!parseStorageKey(locator)) {
      return Rs.error(`Invalid locator: ${locator}`, "fs:key")
    }

    try {
      const data = await fs.readFile(path.join(this.basePath, locator))
      return Rs.data(data)
    } catch (error) {
      if (extractErrorCode(error) === "ENOENT") {
        return Rs.data(null)
      }
      return Rs.fromError(error, "fs:get")
    }
  }

  async ping(): Promise<boolean> {
    try {
      await fs.mkdir(this.basePath, { recursive: true })
      await fs.access(this.basePath, fs.constants.W_OK)
      return true
    } catch {
      return false
    }
  }
}

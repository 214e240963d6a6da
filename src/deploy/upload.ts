import fs from "node:fs";
import path from "node:path";
import { errorMessage, siteError } from "../lib/errors.js";
import { listFiles, md5Hex } from "../lib/files.js";
import { createLogger, type Logger } from "../lib/log.js";
import { contentTypeFor } from "./content_type.js";
import type { StorageBackend } from "./storage/types.js";

export type UploadOptions = {
  storage: StorageBackend;
  dir: string;
  prefix: string;
  /** Upload every file even when the stored copy is identical. */
  force?: boolean;
  logger?: Logger;
};

export type UploadResult = {
  uploaded: string[];
  skipped: string[];
};

export function normalizePrefix(prefix: string | undefined): string {
  const trimmed = String(prefix || "").trim().replace(/^\/+/, "");
  if (!trimmed) return "";
  return trimmed.endsWith("/") ? trimmed : `${trimmed}/`;
}

export function objectKey(prefix: string, relPath: string): string {
  const rel = relPath.split(path.sep).join("/");
  return prefix ? `${prefix}${rel}` : rel;
}

export async function uploadDirectory(options: UploadOptions): Promise<UploadResult> {
  const log = options.logger ?? createLogger("deploy");
  const { storage, dir, prefix } = options;
  const uploaded: string[] = [];
  const skipped: string[] = [];

  for (const rel of listFiles(dir)) {
    const key = objectKey(prefix, rel);
    const data = fs.readFileSync(path.join(dir, rel));
    try {
      if (!options.force) {
        const existing = await storage.headObject(key);
        if (existing?.etag === md5Hex(data)) {
          skipped.push(key);
          log.verbose(`unchanged ${storage.name}:${key}`);
          continue;
        }
      }
      const result = await storage.putObject(key, data, contentTypeFor(rel));
      uploaded.push(key);
      log.info(`Uploaded ${result.url ?? key}`);
    } catch (err) {
      throw siteError("upload_failed", `${rel} -> ${key}: ${errorMessage(err)}`, err);
    }
  }

  return { uploaded, skipped };
}

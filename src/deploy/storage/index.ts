import { S3Client } from "@aws-sdk/client-s3";
import { createLocalStorage } from "./local.js";
import { createS3Storage } from "./s3.js";
import type { StorageBackend } from "./types.js";

export type { StorageBackend, StorageResult, StoredObject } from "./types.js";
export { createLocalStorage } from "./local.js";
export { createS3Storage } from "./s3.js";

export type StorageConfig =
  | { kind: "s3"; bucket: string; region: string; client?: S3Client }
  | { kind: "local"; dir: string };

export function createStorage(cfg: StorageConfig): StorageBackend {
  if (cfg.kind === "local") return createLocalStorage(cfg.dir);
  return createS3Storage({ client: cfg.client ?? new S3Client({ region: cfg.region }), bucket: cfg.bucket });
}

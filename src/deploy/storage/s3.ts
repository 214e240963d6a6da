import {
  HeadObjectCommand,
  NotFound,
  PutObjectCommand,
  S3ServiceException,
  type S3Client
} from "@aws-sdk/client-s3";
import type { StorageBackend, StorageResult, StoredObject } from "./types.js";

export type S3StorageConfig = {
  client: S3Client;
  bucket: string;
};

function stripQuotes(etag: string | undefined): string | null {
  if (!etag) return null;
  return etag.replace(/^"+|"+$/g, "");
}

function isMissing(err: unknown): boolean {
  if (err instanceof NotFound) return true;
  if (!(err instanceof S3ServiceException)) return false;
  // without s3:ListBucket a missing key answers 403 instead of 404
  const status = err.$metadata.httpStatusCode;
  return status === 404 || status === 403;
}

export function createS3Storage(cfg: S3StorageConfig): StorageBackend {
  const { client, bucket } = cfg;
  if (!bucket) {
    throw new Error("S3 bucket not configured");
  }
  return {
    name: "s3",
    async headObject(key: string): Promise<StoredObject | null> {
      try {
        const res = await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
        return { key, etag: stripQuotes(res.ETag) };
      } catch (err) {
        if (isMissing(err)) return null;
        throw err;
      }
    },
    async putObject(key: string, data: Buffer, contentType?: string): Promise<StorageResult> {
      const res = await client.send(
        new PutObjectCommand({ Bucket: bucket, Key: key, Body: data, ContentType: contentType })
      );
      const etag = stripQuotes(res.ETag);
      return { key, url: `s3://${bucket}/${key}`, ...(etag ? { etag } : {}) };
    }
  };
}

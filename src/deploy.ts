import fs from "node:fs";
import path from "node:path";
import type { CloudFrontClient } from "@aws-sdk/client-cloudfront";
import { invalidateDistribution } from "./deploy/cloudfront.js";
import type { StorageBackend } from "./deploy/storage/index.js";
import { normalizePrefix, uploadDirectory } from "./deploy/upload.js";
import { siteError } from "./lib/errors.js";
import { createLogger, type Logger } from "./lib/log.js";

export type DeployTarget = {
  bucket: string;
  prefix: string;
  distributionId?: string;
};

export type DeployOptions = {
  dir: string;
  target: DeployTarget;
  storage: StorageBackend;
  /** CloudFront client; null skips invalidation even when a distribution id is set. */
  cdn: CloudFrontClient | null;
  force?: boolean;
  logger?: Logger;
};

export type DeployResult = {
  uploaded: string[];
  skipped: string[];
  invalidationId: string | null;
};

export type DeployEnv = Partial<Record<"AWS_S3_BUCKET" | "AWS_S3_PREFIX" | "CLOUDFRONT_DIST_ID", string>>;

export function readDeployTarget(env: DeployEnv): DeployTarget {
  const bucket = String(env.AWS_S3_BUCKET || "").trim();
  if (!bucket) {
    throw siteError("deploy_config_error", "AWS_S3_BUCKET environment variable is required");
  }
  const distributionId = String(env.CLOUDFRONT_DIST_ID || "").trim();
  return {
    bucket,
    prefix: normalizePrefix(env.AWS_S3_PREFIX),
    ...(distributionId ? { distributionId } : {})
  };
}

export async function deploySite(options: DeployOptions): Promise<DeployResult> {
  const log = options.logger ?? createLogger("deploy");
  const dir = path.resolve(options.dir);
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw siteError("dist_missing", `${dir} not found. Run \`npm run site:build\` first.`);
  }

  const { uploaded, skipped } = await uploadDirectory({
    storage: options.storage,
    dir,
    prefix: options.target.prefix,
    force: options.force,
    logger: log
  });
  log.info(`${uploaded.length} uploaded, ${skipped.length} unchanged (${options.storage.name})`);

  let invalidationId: string | null = null;
  if (options.cdn && options.target.distributionId) {
    invalidationId = await invalidateDistribution({
      client: options.cdn,
      distributionId: options.target.distributionId
    });
    log.info(`Invalidation created: ${invalidationId}`);
  }

  return { uploaded, skipped, invalidationId };
}

import { CloudFrontClient } from "@aws-sdk/client-cloudfront";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { AWS_REGION, OUT_DIR } from "./config.js";
import { deploySite, readDeployTarget } from "./deploy.js";
import { createStorage } from "./deploy/storage/index.js";
import { normalizePrefix } from "./deploy/upload.js";
import { errorMessage } from "./lib/errors.js";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("dir", { type: "string", default: OUT_DIR, describe: "built site to upload" })
    .option("bucket", { type: "string", default: process.env.AWS_S3_BUCKET || "" })
    .option("prefix", { type: "string", default: process.env.AWS_S3_PREFIX || "" })
    .option("distribution-id", { type: "string", default: process.env.CLOUDFRONT_DIST_ID || "" })
    .option("region", { type: "string", default: AWS_REGION })
    .option("force", { type: "boolean", default: false, describe: "upload files even when unchanged" })
    .option("local", { type: "string", describe: "copy into this directory instead of S3 (no invalidation)" })
    .strict()
    .parse();

  if (argv.local) {
    await deploySite({
      dir: argv.dir,
      target: { bucket: argv.local, prefix: normalizePrefix(argv.prefix) },
      storage: createStorage({ kind: "local", dir: argv.local }),
      cdn: null,
      force: argv.force
    });
    return;
  }

  const target = readDeployTarget({
    AWS_S3_BUCKET: argv.bucket,
    AWS_S3_PREFIX: argv.prefix,
    CLOUDFRONT_DIST_ID: argv["distribution-id"]
  });
  await deploySite({
    dir: argv.dir,
    target,
    storage: createStorage({ kind: "s3", bucket: target.bucket, region: argv.region }),
    cdn: target.distributionId ? new CloudFrontClient({ region: argv.region }) : null,
    force: argv.force
  });
}

main().catch((err: unknown) => {
  process.stderr.write(errorMessage(err) + "\n");
  process.exit(1);
});

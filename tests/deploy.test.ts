import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createStorage } from "../src/deploy/storage/index.js";
import { deploySite, readDeployTarget } from "../src/deploy.js";
import { silentLogger } from "../src/lib/log.js";

let tmp: string;

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "site-deploy-test-"));
});

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe("readDeployTarget", () => {
  it("requires a bucket", () => {
    expect(() => readDeployTarget({ AWS_S3_PREFIX: "site/" })).toThrow(
      "deploy_config_error: AWS_S3_BUCKET environment variable is required"
    );
    expect(() => readDeployTarget({ AWS_S3_BUCKET: "  " })).toThrow(/^deploy_config_error/);
  });

  it("normalizes the prefix and drops an empty distribution id", () => {
    expect(readDeployTarget({ AWS_S3_BUCKET: "test-bucket", AWS_S3_PREFIX: "/site", CLOUDFRONT_DIST_ID: "" })).toEqual({
      bucket: "test-bucket",
      prefix: "site/"
    });
    expect(readDeployTarget({ AWS_S3_BUCKET: "test-bucket", CLOUDFRONT_DIST_ID: "E2TESTDIST" })).toEqual({
      bucket: "test-bucket",
      prefix: "",
      distributionId: "E2TESTDIST"
    });
  });
});

describe("deploySite", () => {
  it("fails before touching storage when the output directory is missing", async () => {
    const missing = path.join(tmp, "out");
    const bucketDir = path.join(tmp, "bucket");
    await expect(
      deploySite({
        dir: missing,
        target: { bucket: "test-bucket", prefix: "" },
        storage: createStorage({ kind: "local", dir: bucketDir }),
        cdn: null,
        logger: silentLogger
      })
    ).rejects.toThrow(`dist_missing: ${missing} not found. Run \`npm run site:build\` first.`);
    expect(fs.existsSync(bucketDir)).toBe(false);
  });

  it("copies into a local directory and skips invalidation without a client", async () => {
    const siteDir = path.join(tmp, "out");
    fs.mkdirSync(siteDir);
    fs.writeFileSync(path.join(siteDir, "index.html"), "<h1>Inicio</h1>", "utf8");
    const bucketDir = path.join(tmp, "bucket");

    const result = await deploySite({
      dir: siteDir,
      target: { bucket: bucketDir, prefix: "preview/", distributionId: "E2TESTDIST" },
      storage: createStorage({ kind: "local", dir: bucketDir }),
      cdn: null,
      logger: silentLogger
    });

    expect(result).toEqual({ uploaded: ["preview/index.html"], skipped: [], invalidationId: null });
    expect(fs.readFileSync(path.join(bucketDir, "preview", "index.html"), "utf8")).toBe("<h1>Inicio</h1>");
  });
});

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { contentTypeFor } from "../src/deploy/content_type.js";
import { createLocalStorage } from "../src/deploy/storage/index.js";
import type { StorageBackend, StorageResult } from "../src/deploy/storage/index.js";
import { normalizePrefix, objectKey, uploadDirectory } from "../src/deploy/upload.js";
import { silentLogger } from "../src/lib/log.js";

let tmp: string;
let siteDir: string;
let bucketDir: string;

function writeSiteFile(rel: string, body: string) {
  const target = path.join(siteDir, rel);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, body, "utf8");
}

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "site-upload-test-"));
  siteDir = path.join(tmp, "out");
  bucketDir = path.join(tmp, "bucket");
  writeSiteFile("index.html", "<h1>Inicio</h1>");
  writeSiteFile("assets/styles.css", "body{margin:0}");
});

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe("object keys", () => {
  it("normalizes prefixes", () => {
    expect(normalizePrefix("site")).toBe("site/");
    expect(normalizePrefix("/site/")).toBe("site/");
    expect(normalizePrefix("  ")).toBe("");
    expect(normalizePrefix(undefined)).toBe("");
  });

  it("joins prefix and relative path", () => {
    expect(objectKey("site/", "index.html")).toBe("site/index.html");
    expect(objectKey("", "assets/styles.css")).toBe("assets/styles.css");
  });
});

describe("content types", () => {
  it("maps known extensions", () => {
    expect(contentTypeFor("index.html")).toBe("text/html; charset=utf-8");
    expect(contentTypeFor("assets/styles.css")).toBe("text/css; charset=utf-8");
    expect(contentTypeFor("assets/animations.js")).toBe("application/javascript; charset=utf-8");
    expect(contentTypeFor("assets/LOGO.SVG")).toBe("image/svg+xml");
  });

  it("falls back for unknown extensions", () => {
    expect(contentTypeFor("notes.bin")).toBe("application/octet-stream");
    expect(contentTypeFor("LICENSE")).toBe("application/octet-stream");
  });
});

describe("uploadDirectory", () => {
  it("uploads every file under the prefix", async () => {
    const storage = createLocalStorage(bucketDir);
    const result = await uploadDirectory({ storage, dir: siteDir, prefix: "site/", logger: silentLogger });

    expect(result).toEqual({ uploaded: ["site/assets/styles.css", "site/index.html"], skipped: [] });
    expect(fs.readFileSync(path.join(bucketDir, "site", "index.html"), "utf8")).toBe("<h1>Inicio</h1>");
  });

  it("skips unchanged files on the next run", async () => {
    const storage = createLocalStorage(bucketDir);
    await uploadDirectory({ storage, dir: siteDir, prefix: "", logger: silentLogger });

    writeSiteFile("index.html", "<h1>Inicio 2</h1>");
    const result = await uploadDirectory({ storage, dir: siteDir, prefix: "", logger: silentLogger });

    expect(result).toEqual({ uploaded: ["index.html"], skipped: ["assets/styles.css"] });
  });

  it("uploads everything when forced", async () => {
    const storage = createLocalStorage(bucketDir);
    await uploadDirectory({ storage, dir: siteDir, prefix: "", logger: silentLogger });
    const result = await uploadDirectory({ storage, dir: siteDir, prefix: "", force: true, logger: silentLogger });

    expect(result.uploaded).toEqual(["assets/styles.css", "index.html"]);
    expect(result.skipped).toEqual([]);
  });

  it("passes the content type of each file", async () => {
    const putObject = vi.fn(async (key: string, _data: Buffer, _type?: string): Promise<StorageResult> => ({ key }));
    const storage: StorageBackend = { name: "fake", headObject: async () => null, putObject };
    await uploadDirectory({ storage, dir: siteDir, prefix: "site/", logger: silentLogger });

    expect(putObject.mock.calls.map(([key, , type]) => [key, type])).toEqual([
      ["site/assets/styles.css", "text/css; charset=utf-8"],
      ["site/index.html", "text/html; charset=utf-8"]
    ]);
  });

  it("names the file that failed to upload", async () => {
    const storage: StorageBackend = {
      name: "fake",
      headObject: async () => null,
      putObject: async () => {
        throw new Error("AccessDenied");
      }
    };
    await expect(uploadDirectory({ storage, dir: siteDir, prefix: "site/", logger: silentLogger })).rejects.toThrow(
      "upload_failed: assets/styles.css -> site/assets/styles.css: AccessDenied"
    );
  });

  it("refuses keys outside the local bucket directory", async () => {
    const storage = createLocalStorage(bucketDir);
    await expect(storage.putObject("../escape.html", Buffer.from("x"))).rejects.toThrow("invalid_key: ../escape.html");
  });
});

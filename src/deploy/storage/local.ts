import fs from "node:fs";
import path from "node:path";
import { md5Hex, writeFileEnsuringDir } from "../../lib/files.js";
import type { StorageBackend, StorageResult, StoredObject } from "./types.js";

export function createLocalStorage(baseDir: string): StorageBackend {
  const root = path.resolve(baseDir);

  function resolveKey(key: string): string {
    const target = path.resolve(root, key);
    if (target !== root && !target.startsWith(root + path.sep)) {
      throw new Error(`invalid_key: ${key}`);
    }
    return target;
  }

  return {
    name: "local",
    async headObject(key: string): Promise<StoredObject | null> {
      const target = resolveKey(key);
      if (!fs.existsSync(target) || !fs.statSync(target).isFile()) return null;
      return { key, etag: md5Hex(fs.readFileSync(target)) };
    },
    async putObject(key: string, data: Buffer): Promise<StorageResult> {
      const target = resolveKey(key);
      writeFileEnsuringDir(target, data);
      return { key, url: `file://${target}`, etag: md5Hex(data) };
    }
  };
}

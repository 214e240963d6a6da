import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function toPosix(relPath: string): string {
  return relPath.split(path.sep).join("/");
}

/** Relative POSIX paths of every regular file under `dir`, sorted. */
export function listFiles(dir: string): string[] {
  const out: string[] = [];
  const walk = (current: string) => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.isFile()) out.push(toPosix(path.relative(dir, full)));
    }
  };
  walk(dir);
  return out.sort();
}

export function md5Hex(data: Uint8Array): string {
  return crypto.createHash("md5").update(data).digest("hex");
}

export function sha256Hex(data: Uint8Array | string): string {
  return crypto.createHash("sha256").update(data).digest("hex");
}

export function writeFileEnsuringDir(target: string, data: Uint8Array | string) {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, data);
}

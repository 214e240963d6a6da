import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const PROJECT_ROOT = path.resolve(__dirname, "..");

export const TEMPLATES_DIR = process.env.SITE_TEMPLATES_DIR || path.join(PROJECT_ROOT, "templates");
export const ASSETS_DIR = process.env.SITE_ASSETS_DIR || path.join(PROJECT_ROOT, "assets");
export const CONTENT_PATH = process.env.SITE_CONTENT_PATH || path.join(PROJECT_ROOT, "content", "site.json");
export const OUT_DIR = process.env.SITE_OUT_DIR || path.join(PROJECT_ROOT, "out");
export const CLIENT_ENTRY = path.join(PROJECT_ROOT, "src", "browser", "main.ts");

export const PREVIEW_PORT = Number(process.env.PORT || "8000");
export const PREVIEW_HOST = process.env.HOST || "localhost";

export const AWS_REGION = process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || "us-east-1";

import fs from "node:fs";
import path from "node:path";
import * as esbuild from "esbuild";
import nunjucks from "nunjucks";
import type { Environment } from "nunjucks";
import { errorMessage, siteError } from "./lib/errors.js";
import { listFiles, sha256Hex, writeFileEnsuringDir } from "./lib/files.js";
import { createLogger, type Logger } from "./lib/log.js";
import type { SiteContext } from "./site/context.js";
import { pageUrlPath, type PageRoute } from "./site/pages.js";

export const CLIENT_SCRIPT_PATH = "assets/animations.js";

export type BuildOptions = {
  templatesDir: string;
  assetsDir: string;
  outDir: string;
  context: SiteContext;
  pages: readonly PageRoute[];
  /** Browser script entry; when omitted no script is bundled. */
  clientEntry?: string;
  logger?: Logger;
};

export type RenderedPage = {
  template: string;
  output: string;
  bytes: number;
  sha256: string;
};

export type BuildResult = {
  outDir: string;
  pages: RenderedPage[];
  assets: string[];
  script: string | null;
  files: string[];
};

const PLACEHOLDER_RE = /\{\{|\{%|\{#/;
const ASSET_REF_RE = /\b(?:src|href)="(\/assets\/[^"?#]+)/g;

/** Refuses an output directory that is, or holds, one of the build's inputs; it is wiped on every build. */
export function assertSafeOutDir(outDir: string, sources: readonly string[]) {
  const out = path.resolve(outDir);
  for (const source of sources) {
    const resolved = path.resolve(source);
    if (resolved === out || resolved.startsWith(out.endsWith(path.sep) ? out : out + path.sep)) {
      throw siteError("unsafe_out_dir", `${out} contains build input ${resolved}`);
    }
  }
}

export function cleanOutDir(outDir: string) {
  fs.rmSync(outDir, { recursive: true, force: true });
  fs.mkdirSync(outDir, { recursive: true });
}

export function copyAssets(assetsDir: string, outDir: string): string[] {
  if (!fs.existsSync(assetsDir) || !fs.statSync(assetsDir).isDirectory()) {
    throw siteError("assets_missing", `assets directory not found: ${assetsDir}`);
  }
  const target = path.join(outDir, "assets");
  fs.mkdirSync(target, { recursive: true });
  fs.cpSync(assetsDir, target, { recursive: true });
  return listFiles(target).map((rel) => `assets/${rel}`);
}

export async function bundleClientScript(entry: string, outDir: string): Promise<string> {
  if (!fs.existsSync(entry)) {
    throw siteError("bundle_failed", `client entry not found: ${entry}`);
  }
  const result = await esbuild
    .build({
      entryPoints: [entry],
      bundle: true,
      write: false,
      format: "iife",
      platform: "browser",
      target: "es2019",
      minify: false,
      sourcemap: false,
      legalComments: "none",
      logLevel: "silent"
    })
    .catch((err: unknown) => {
      throw siteError("bundle_failed", errorMessage(err), err);
    });
  const [file] = result.outputFiles;
  if (!file) {
    throw siteError("bundle_failed", `no output produced for ${entry}`);
  }
  writeFileEnsuringDir(path.join(outDir, CLIENT_SCRIPT_PATH), file.contents);
  return CLIENT_SCRIPT_PATH;
}

// JSON for an inline <script>; "<" is escaped so a value cannot close the tag
export function jsonScript(value: unknown): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}

export function createTemplateEnvironment(templatesDir: string): Environment {
  const env = new nunjucks.Environment(new nunjucks.FileSystemLoader(templatesDir, { noCache: true }), {
    autoescape: true,
    throwOnUndefined: true
  });
  env.addFilter("json_script", jsonScript);
  return env;
}

export function renderPages(
  templatesDir: string,
  outDir: string,
  context: SiteContext,
  pages: readonly PageRoute[],
  script: string | null = null
): RenderedPage[] {
  const env = createTemplateEnvironment(templatesDir);
  return pages.map((route) => {
    if (!fs.existsSync(path.join(templatesDir, route.template))) {
      throw siteError("template_missing", `${route.template} (for ${route.output}) not found in ${templatesDir}`);
    }
    let html: string;
    try {
      html = env.render(route.template, {
        ...context,
        script,
        page: { template: route.template, output: route.output, path: pageUrlPath(route.output) }
      });
    } catch (err) {
      throw siteError("template_render_failed", `${route.template}: ${errorMessage(err)}`, err);
    }
    const data = Buffer.from(html, "utf8");
    writeFileEnsuringDir(path.join(outDir, route.output), data);
    return { template: route.template, output: route.output, bytes: data.length, sha256: sha256Hex(data) };
  });
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function renderSitemap(siteUrl: string, pages: readonly PageRoute[]): string {
  const base = siteUrl.replace(/\/+$/, "");
  const urls = pages.map((page) => `  <url><loc>${escapeXml(base + pageUrlPath(page.output))}</loc></url>`);
  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">`,
    ...urls,
    `</urlset>`,
    ""
  ].join("\n");
}

export function renderRobots(siteUrl: string): string {
  const base = siteUrl.replace(/\/+$/, "");
  return `User-agent: *\nAllow: /\n\nSitemap: ${base}/sitemap.xml\n`;
}

export function writeSitemap(outDir: string, siteUrl: string, pages: readonly PageRoute[]): string[] {
  fs.writeFileSync(path.join(outDir, "sitemap.xml"), renderSitemap(siteUrl, pages), "utf8");
  fs.writeFileSync(path.join(outDir, "robots.txt"), renderRobots(siteUrl), "utf8");
  return ["sitemap.xml", "robots.txt"];
}

export function verifyOutput(outDir: string, pages: readonly RenderedPage[]) {
  for (const page of pages) {
    const html = fs.readFileSync(path.join(outDir, page.output), "utf8");
    const leftover = html.match(PLACEHOLDER_RE);
    if (leftover) {
      throw siteError("unrendered_placeholder", `${page.output} still contains "${leftover[0]}"`);
    }
    for (const match of html.matchAll(ASSET_REF_RE)) {
      const ref = match[1];
      if (!fs.existsSync(path.join(outDir, ref))) {
        throw siteError("asset_missing", `${ref} referenced by ${page.output}`);
      }
    }
  }
}

export async function buildSite(options: BuildOptions): Promise<BuildResult> {
  const log = options.logger ?? createLogger("build");
  const outDir = path.resolve(options.outDir);

  assertSafeOutDir(outDir, [
    options.templatesDir,
    options.assetsDir,
    ...(options.clientEntry ? [options.clientEntry] : [])
  ]);
  cleanOutDir(outDir);
  const assets = copyAssets(options.assetsDir, outDir);
  log.verbose(`copied ${assets.length} assets`);

  const script = options.clientEntry ? await bundleClientScript(options.clientEntry, outDir) : null;
  if (script) log.verbose(`bundled ${script}`);

  const pages = renderPages(options.templatesDir, outDir, options.context, options.pages, script);
  for (const page of pages) log.verbose(`rendered ${page.template} -> ${page.output}`);

  writeSitemap(outDir, options.context.site_url, options.pages);
  verifyOutput(outDir, pages);

  const files = listFiles(outDir);
  log.info(`Build complete: ${outDir} (${pages.length} pages, ${files.length} files)`);
  return { outDir, pages, assets, script, files };
}

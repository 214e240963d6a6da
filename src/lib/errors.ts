export const SITE_ERROR_CODES = [
  "content_invalid",
  "unsafe_out_dir",
  "assets_missing",
  "bundle_failed",
  "template_missing",
  "template_render_failed",
  "unrendered_placeholder",
  "asset_missing",
  "dist_missing",
  "port_in_use",
  "serve_failed",
  "deploy_config_error",
  "upload_failed",
  "invalidation_failed"
] as const;

export type SiteErrorCode = (typeof SITE_ERROR_CODES)[number];

export type SiteError = Error & { code: SiteErrorCode };

export function siteError(code: SiteErrorCode, detail: string, cause?: unknown): SiteError {
  const message = `${code}: ${detail}`;
  const err = cause === undefined ? new Error(message) : new Error(message, { cause });
  return Object.assign(err, { code });
}

export function isSiteError(err: unknown): err is SiteError {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return SITE_ERROR_CODES.some((code) => code === err.code);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

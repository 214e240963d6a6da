import fs from "node:fs";
import { z } from "zod";
import { siteError } from "../lib/errors.js";

const text = z.string().trim().min(1);

export const serviceSchema = z.object({
  title: text,
  slug: z.string().regex(/^[a-z0-9-]+$/, "slug must be lowercase letters, digits and dashes")
});

export const siteContextSchema = z.object({
  site_url: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, "")),
  site_phone: text,
  site_phone_link: z.string().startsWith("tel:"),
  site_address: text,
  site_title: text,
  hero_title: text,
  hero_subtitle: text,
  cta_referral: text,
  cta_appointment: text,
  menu_home: text,
  menu_about: text,
  menu_services: text,
  menu_contact: text,
  services: z.array(serviceSchema).min(1),
  specialist_name: text,
  specialist_title: text,
  specialist_bio: text
});

export type SiteService = z.infer<typeof serviceSchema>;
export type SiteContext = z.infer<typeof siteContextSchema>;

export function parseSiteContext(raw: unknown, source = "site context"): SiteContext {
  const parsed = siteContextSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length ? issue.path.join(".") : "(root)";
    throw siteError("content_invalid", `${source}: ${where}: ${issue.message}`);
  }
  return parsed.data;
}

export function loadSiteContext(file: string): SiteContext {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    throw siteError("content_invalid", `cannot read ${file}`, err);
  }
  return parseSiteContext(raw, file);
}

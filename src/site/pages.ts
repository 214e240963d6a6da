export type PageRoute = {
  template: string;
  output: string;
};

export const SITE_PAGES: readonly PageRoute[] = [
  { template: "index.html", output: "index.html" },
  { template: "root-canal.html", output: "root-canal-treatment/index.html" },
  { template: "root-canal-retreatment.html", output: "root-canal-retreatment/index.html" },
  { template: "endodontic-microsurgery.html", output: "endodontic-microsurgery/index.html" },
  { template: "dental-trauma.html", output: "dental-trauma/index.html" },
  { template: "internal-bleaching.html", output: "internal-bleaching/index.html" },
  { template: "contact-form.html", output: "contacto/index.html" }
];

/** Public URL path of a page: `root-canal-treatment/index.html` -> `/root-canal-treatment/`. */
export function pageUrlPath(output: string): string {
  const posix = output.split("\\").join("/");
  if (posix === "index.html") return "/";
  if (posix.endsWith("/index.html")) return `/${posix.slice(0, -"index.html".length)}`;
  return `/${posix}`;
}

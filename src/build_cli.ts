import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { buildSite } from "./build.js";
import { ASSETS_DIR, CLIENT_ENTRY, CONTENT_PATH, OUT_DIR, TEMPLATES_DIR } from "./config.js";
import { errorMessage } from "./lib/errors.js";
import { loadSiteContext } from "./site/context.js";
import { SITE_PAGES } from "./site/pages.js";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("out", { type: "string", default: OUT_DIR, describe: "output directory (wiped on every build)" })
    .option("templates", { type: "string", default: TEMPLATES_DIR })
    .option("assets", { type: "string", default: ASSETS_DIR })
    .option("content", { type: "string", default: CONTENT_PATH, describe: "site context JSON" })
    .option("script", { type: "boolean", default: true, describe: "bundle the browser script" })
    .strict()
    .parse();

  await buildSite({
    templatesDir: argv.templates,
    assetsDir: argv.assets,
    outDir: argv.out,
    context: loadSiteContext(argv.content),
    pages: SITE_PAGES,
    clientEntry: argv.script ? CLIENT_ENTRY : undefined
  });
}

main().catch((err: unknown) => {
  process.stderr.write(errorMessage(err) + "\n");
  process.exit(1);
});

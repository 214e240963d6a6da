import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { OUT_DIR, PREVIEW_HOST, PREVIEW_PORT } from "./config.js";
import { errorMessage } from "./lib/errors.js";
import { createLogger } from "./lib/log.js";
import { startPreview } from "./serve.js";

const log = createLogger("serve");

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("port", { type: "number", default: PREVIEW_PORT })
    .option("host", { type: "string", default: PREVIEW_HOST })
    .option("dir", { type: "string", default: OUT_DIR })
    .strict()
    .parse();

  const server = await startPreview({ dir: argv.dir, port: argv.port, host: argv.host, logger: log });
  log.info("Press Ctrl+C to stop the server");

  server.on("error", (err: Error) => {
    log.error(`Server error: ${err.message}`);
    process.exit(1);
  });

  process.on("SIGINT", () => {
    server.close(() => {
      log.info("Server stopped by user");
      process.exit(0);
    });
  });
}

main().catch((err: unknown) => {
  process.stderr.write(errorMessage(err) + "\n");
  process.exit(1);
});

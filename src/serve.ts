import fs from "node:fs";
import type { Server } from "node:http";
import path from "node:path";
import express from "express";
import { siteError } from "./lib/errors.js";
import { createLogger, type Logger } from "./lib/log.js";

export const NO_CACHE_HEADERS: Record<string, string> = {
  "Cache-Control": "no-cache, no-store, must-revalidate",
  Pragma: "no-cache",
  Expires: "0"
};

export function createPreviewApp(outDir: string) {
  const root = path.resolve(outDir);
  const app = express();
  app.disable("x-powered-by");

  app.use((_req, res, next) => {
    res.set(NO_CACHE_HEADERS);
    next();
  });

  app.use(express.static(root, { index: "index.html", etag: false, lastModified: false, cacheControl: false }));

  app.use((_req, res) => {
    const notFound = path.join(root, "404.html");
    if (fs.existsSync(notFound)) {
      res.status(404).sendFile(notFound, { cacheControl: false, lastModified: false });
      return;
    }
    res.status(404).type("text/plain").send("Not found");
  });

  return app;
}

export type PreviewOptions = {
  dir: string;
  port: number;
  host: string;
  logger?: Logger;
};

/** Listens with the preview app; rejects when the output is missing or the port cannot be bound. */
export function startPreview(options: PreviewOptions): Promise<Server> {
  const log = options.logger ?? createLogger("serve");
  const dir = path.resolve(options.dir);
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    return Promise.reject(siteError("dist_missing", `${dir} not found. Run \`npm run site:build\` first.`));
  }

  return new Promise((resolve, reject) => {
    const server = createPreviewApp(dir).listen(options.port, options.host);

    const onError = (err: Error) => {
      server.off("listening", onListening);
      if ("code" in err && err.code === "EADDRINUSE") {
        reject(
          siteError(
            "port_in_use",
            `Port ${options.port} is already in use. Try a different port: --port ${options.port + 1}`,
            err
          )
        );
        return;
      }
      reject(siteError("serve_failed", err.message, err));
    };

    const onListening = () => {
      server.off("error", onError);
      const address = server.address();
      const port = address && typeof address !== "string" ? address.port : options.port;
      log.info(`Serving ${dir}`);
      log.info(`URL: http://${options.host}:${port}`);
      resolve(server);
    };

    server.once("error", onError);
    server.once("listening", onListening);
  });
}

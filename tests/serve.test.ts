import fs from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { silentLogger } from "../src/lib/log.js";
import { createPreviewApp, startPreview } from "../src/serve.js";

let outDir: string;

beforeEach(() => {
  outDir = fs.mkdtempSync(path.join(os.tmpdir(), "site-serve-test-"));
  fs.mkdirSync(path.join(outDir, "contacto"));
  fs.mkdirSync(path.join(outDir, "assets"));
  fs.writeFileSync(path.join(outDir, "index.html"), "<h1>Inicio</h1>", "utf8");
  fs.writeFileSync(path.join(outDir, "contacto", "index.html"), "<h1>Contacto</h1>", "utf8");
  fs.writeFileSync(path.join(outDir, "assets", "styles.css"), "body{margin:0}", "utf8");
});

afterEach(() => {
  fs.rmSync(outDir, { recursive: true, force: true });
});

describe("preview server", () => {
  it("serves the home page with caching disabled", async () => {
    const res = await request(createPreviewApp(outDir)).get("/");
    expect(res.status).toBe(200);
    expect(res.text).toBe("<h1>Inicio</h1>");
    expect(res.headers["cache-control"]).toBe("no-cache, no-store, must-revalidate");
    expect(res.headers.pragma).toBe("no-cache");
    expect(res.headers.expires).toBe("0");
    expect(res.headers.etag).toBeUndefined();
    expect(res.headers["last-modified"]).toBeUndefined();
    expect(res.headers["x-powered-by"]).toBeUndefined();
  });

  it("serves directory indexes and assets", async () => {
    const app = createPreviewApp(outDir);
    const page = await request(app).get("/contacto/");
    expect(page.status).toBe(200);
    expect(page.text).toBe("<h1>Contacto</h1>");

    const css = await request(app).get("/assets/styles.css");
    expect(css.status).toBe(200);
    expect(css.headers["content-type"]).toBe("text/css; charset=UTF-8");
  });

  it("redirects a directory without its trailing slash", async () => {
    const res = await request(createPreviewApp(outDir)).get("/contacto");
    expect(res.status).toBe(301);
    expect(res.headers.location).toBe("/contacto/");
  });

  it("answers unknown paths with 404", async () => {
    const res = await request(createPreviewApp(outDir)).get("/missing");
    expect(res.status).toBe(404);
    expect(res.text).toBe("Not found");
    expect(res.headers["cache-control"]).toBe("no-cache, no-store, must-revalidate");
  });

  it("uses a built 404 page when there is one", async () => {
    fs.writeFileSync(path.join(outDir, "404.html"), "<h1>No encontrado</h1>", "utf8");
    const res = await request(createPreviewApp(outDir)).get("/missing");
    expect(res.status).toBe(404);
    expect(res.text).toBe("<h1>No encontrado</h1>");
    expect(res.headers["cache-control"]).toBe("no-cache, no-store, must-revalidate");
  });
});

describe("startPreview", () => {
  const servers: http.Server[] = [];

  function close(server: http.Server) {
    return new Promise<void>((resolve) => server.close(() => resolve()));
  }

  afterEach(async () => {
    await Promise.all(servers.splice(0).map(close));
  });

  it("listens and serves the output directory", async () => {
    const server = await startPreview({ dir: outDir, port: 0, host: "127.0.0.1", logger: silentLogger });
    servers.push(server);
    const res = await request(server).get("/");
    expect(res.status).toBe(200);
    expect(res.text).toBe("<h1>Inicio</h1>");
  });

  it("tells the user to build first when the output directory is missing", async () => {
    const missing = path.join(outDir, "nope");
    await expect(startPreview({ dir: missing, port: 0, host: "127.0.0.1", logger: silentLogger })).rejects.toThrow(
      `dist_missing: ${missing} not found. Run \`npm run site:build\` first.`
    );
  });

  it("suggests the next port when the port is taken", async () => {
    const holder = http.createServer();
    servers.push(holder);
    await new Promise<void>((resolve) => holder.listen(0, "127.0.0.1", resolve));
    const address = holder.address();
    if (!address || typeof address === "string") throw new Error("holder has no port");
    const port = address.port;

    await expect(startPreview({ dir: outDir, port, host: "127.0.0.1", logger: silentLogger })).rejects.toThrow(
      `port_in_use: Port ${port} is already in use. Try a different port: --port ${port + 1}`
    );
  });
});

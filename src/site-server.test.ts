import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { once } from "events";
import { promises as fs } from "fs";
import net from "net";
import os from "os";
import path from "path";
import { gzipSync } from "zlib";
import { RuleParseError } from "./rule-errors";
import { SiteServer } from "./site-server";

const HEADERS = `/style.css
  Content-Type: text/plain
  Cache-Control: no-store
  X-Frame-Options: DENY
/{*any}
  X-Site: test
`;

const REDIRECTS = `# moved content
/old/{slug} /new/{slug} 301
/external https://example.com
`;

describe("SiteServer", () => {
  let rootDir: string;
  let server: SiteServer;
  let baseUrl: string;

  function get(requestPath: string, init: RequestInit = {}): Promise<Response> {
    return fetch(`${baseUrl}${requestPath}`, { redirect: "manual", ...init });
  }

  beforeAll(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), "site-server-"));
    await fs.writeFile(path.join(rootDir, "index.html"), "<h1>home</h1>");
    await fs.writeFile(path.join(rootDir, "style.css"), "body {}");
    await fs.writeFile(path.join(rootDir, "404.html"), "<h1>missing</h1>");
    await fs.writeFile(path.join(rootDir, "app.js"), "console.log(1);");
    await fs.writeFile(path.join(rootDir, "app.js.gz"), gzipSync("console.log(1);"));
    await fs.writeFile(path.join(rootDir, "_headers"), HEADERS);
    await fs.writeFile(path.join(rootDir, "_redirects"), REDIRECTS);

    server = new SiteServer({ rootDir, port: 0, host: "127.0.0.1" });
    await server.listen();
    baseUrl = `http://127.0.0.1:${server.port}`;
  });

  afterAll(async () => {
    await server.close();
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it("loads both rule files on listen", () => {
    expect(server.rules.rules.headers).toHaveLength(2);
    expect(server.rules.rules.redirects).toHaveLength(2);
  });

  it("serves files with header rules applied", async () => {
    const res = await get("/");
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/html");
    expect(res.headers.get("x-site")).toBe("test");
    expect(await res.text()).toBe("<h1>home</h1>");
  });

  it("lets header rules override static defaults", async () => {
    const res = await get("/style.css");
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/plain");
    expect(res.headers.get("cache-control")).toBe("no-store");
    expect(res.headers.get("x-frame-options")).toBe("DENY");
    expect(res.headers.get("x-site")).toBeNull();
    expect(await res.text()).toBe("body {}");
  });

  it("redirects with interpolated locations", async () => {
    const moved = await get("/old/hello");
    expect(moved.status).toBe(301);
    expect(moved.headers.get("location")).toBe("/new/hello");
    expect(moved.headers.get("x-site")).toBe("test");

    const external = await get("/external");
    expect(external.status).toBe(302);
    expect(external.headers.get("location")).toBe("https://example.com");
  });

  it("never serves the rule files", async () => {
    expect((await get("/_headers")).status).toBe(404);
    const res = await get("/_redirects");
    expect(res.status).toBe(404);
    expect(await res.text()).toBe("");
    expect((await get("/_redirects", { method: "POST" })).status).toBe(404);
  });

  it("redirects and sets header rules for every method", async () => {
    const moved = await get("/old/hello", { method: "POST" });
    expect(moved.status).toBe(301);
    expect(moved.headers.get("location")).toBe("/new/hello");

    const deleted = await get("/old/hello", { method: "DELETE" });
    expect(deleted.status).toBe(301);
  });

  it("answers 405 when another method would reach a file", async () => {
    const res = await get("/style.css", { method: "POST" });
    expect(res.status).toBe(405);
    expect(res.headers.get("allow")).toBe("GET, HEAD");
    expect(res.headers.get("x-frame-options")).toBe("DENY");
    expect(await res.text()).toBe("");

    expect((await get("/nowhere", { method: "PUT" })).status).toBe(405);
  });

  it("serves a precompressed copy the client accepts", async () => {
    const res = await get("/app.js", { headers: { "Accept-Encoding": "gzip" } });
    expect(res.status).toBe(200);
    expect(res.headers.get("content-encoding")).toBe("gzip");
    expect(res.headers.get("content-type")).toBe("application/javascript");
    expect(res.headers.get("vary")).toBe("Accept-Encoding");
    expect(res.headers.get("x-site")).toBe("test");
    expect(await res.text()).toBe("console.log(1);");
  });

  it("serves the plain file when no precompressed coding is accepted", async () => {
    const res = await get("/app.js", { headers: { "Accept-Encoding": "identity" } });
    expect(res.status).toBe(200);
    expect(res.headers.get("content-encoding")).toBeNull();
    expect(res.headers.get("vary")).toBe("Accept-Encoding");
    expect(await res.text()).toBe("console.log(1);");
  });

  it("answers unknown paths with the 404 page", async () => {
    const res = await get("/nowhere");
    expect(res.status).toBe(404);
    expect(res.headers.get("x-site")).toBe("test");
    expect(await res.text()).toBe("<h1>missing</h1>");
  });

  it("picks up new rules on reload", async () => {
    await fs.writeFile(path.join(rootDir, "_redirects"), "/old/{slug} /archive/{slug} 308\n");
    await server.reload();

    const res = await get("/old/hello");
    expect(res.status).toBe(308);
    expect(res.headers.get("location")).toBe("/archive/hello");
    expect((await get("/external")).status).toBe(404);
  });

  it("keeps the running rules when a reload fails", async () => {
    await fs.writeFile(path.join(rootDir, "_redirects"), "/old/{slug} /archive/{other}\n");
    await expect(server.reload()).rejects.toBeInstanceOf(RuleParseError);

    const res = await get("/old/hello");
    expect(res.status).toBe(308);
    expect(res.headers.get("location")).toBe("/archive/hello");
  });
});

describe("SiteServer.close", () => {
  it("drops connections still open after the timeout", async () => {
    const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), "site-close-"));
    const server = new SiteServer({ rootDir, port: 0, host: "127.0.0.1" });
    await server.listen();

    // a request whose headers never finish keeps the connection busy
    const socket = net.connect(server.port, "127.0.0.1");
    const socketErrors: Error[] = [];
    socket.on("error", (err) => socketErrors.push(err));
    const socketClosed = new Promise<void>((resolve) => socket.on("close", () => resolve()));
    await once(socket, "connect");
    socket.write("GET / HTTP/1.1\r\nHost: 127.0.0.1\r\n");
    await new Promise((resolve) => setTimeout(resolve, 50));

    const started = Date.now();
    await server.close(200);
    await socketClosed;

    expect(Date.now() - started).toBeGreaterThanOrEqual(150);
    expect(socket.destroyed).toBe(true);
    await fs.rm(rootDir, { recursive: true, force: true });
  });
});

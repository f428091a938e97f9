import express, { Express, NextFunction, Request, Response } from "express";
import path from "path";
import { lookup as lookupMime } from "mime-types";
import { RedirectParseOptions } from "./redirects-file";
import { EngineHandle, HEADERS_FILE, REDIRECTS_FILE, RuleEngine } from "./rule-engine";
import { HeaderPair } from "./rules";
import {
  findPrecompressed,
  isReservedPath,
  readConfigFile,
  resolveSiteFile,
} from "./site-paths";

const READ_METHODS = ["GET", "HEAD"];
export const SHUTDOWN_TIMEOUT_MS = 10_000;

export interface SiteServerOptions {
  rootDir: string;
  port?: number;
  host?: string;
  defaultStatus?: number;
}

function applyHeaders(res: Response, headers: HeaderPair[]): boolean {
  let contentTypeSet = false;
  // later duplicates win, same as setting them in file order
  for (const [name, value] of headers) {
    res.setHeader(name, value);
    if (name.toLowerCase() === "content-type") {
      contentTypeSet = true;
    }
  }
  return contentTypeSet;
}

function sendFile(res: Response, absPath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    res.sendFile(absPath, (err?: Error) => (err ? reject(err) : resolve()));
  });
}

export class SiteServer {
  public app: Express;
  public port: number;
  public host: string;
  public rootDir: string;
  private server: ReturnType<Express["listen"]> | null;
  private engine: EngineHandle;
  private parseOptions: RedirectParseOptions;

  constructor({ rootDir, port = 8080, host = "0.0.0.0", defaultStatus }: SiteServerOptions) {
    this.rootDir = path.resolve(rootDir);
    this.port = port;
    this.host = host;
    this.app = express();
    this.server = null;
    this.engine = new EngineHandle();
    this.parseOptions = { defaultStatus };
    this._setupRoutes();
  }

  get rules(): RuleEngine {
    return this.engine.current;
  }

  /**
   * Re-read `_headers` and `_redirects` and swap the engine in one step.
   * On a parse error the running rules stay in place and the error is thrown.
   */
  async reload(): Promise<RuleEngine> {
    const [headers, redirects] = await Promise.all([
      readConfigFile(this.rootDir, HEADERS_FILE),
      readConfigFile(this.rootDir, REDIRECTS_FILE),
    ]);
    const next = RuleEngine.fromConfig({ headers, redirects }, this.parseOptions);
    this.engine.swap(next);
    console.info(
      `reload: ${next.rules.headers.length} header rules, ${next.rules.redirects.length} redirects from ${this.rootDir}`
    );
    return next;
  }

  private async _sendStatic(
    req: Request,
    res: Response,
    absPath: string,
    contentType: string,
    contentTypeSet: boolean
  ) {
    // type always comes from the uncompressed name
    if (!contentTypeSet) {
      res.setHeader("Content-Type", contentType);
    }
    const variants = await findPrecompressed(absPath);
    if (variants.size > 0) {
      res.vary("Accept-Encoding");
      const encoding = req.acceptsEncodings([...variants.keys()]);
      const variantPath = encoding ? variants.get(encoding) : undefined;
      if (encoding && variantPath) {
        res.setHeader("Content-Encoding", encoding);
        await sendFile(res, variantPath);
        return;
      }
    }
    await sendFile(res, absPath);
  }

  private async _respond(req: Request, res: Response) {
    const requestPath = req.path;

    if (isReservedPath(requestPath)) {
      res.status(404).end();
      return;
    }

    // one snapshot per request, a concurrent reload cannot split it
    const rules = this.engine.current;
    const contentTypeSet = applyHeaders(res, rules.resolveHeaders(requestPath));

    const redirect = rules.resolveRedirect(requestPath);
    if (redirect) {
      res.status(redirect.status);
      res.setHeader("Location", redirect.location);
      res.end();
      return;
    }

    if (!READ_METHODS.includes(req.method)) {
      res.setHeader("Allow", READ_METHODS.join(", "));
      res.status(405).end();
      return;
    }

    const absPath = await resolveSiteFile(this.rootDir, requestPath);
    if (absPath) {
      const contentType = lookupMime(absPath) || "application/octet-stream";
      await this._sendStatic(req, res, absPath, contentType, contentTypeSet);
      return;
    }

    const notFoundPage = await resolveSiteFile(this.rootDir, "/404.html");
    res.status(404);
    if (notFoundPage) {
      await this._sendStatic(req, res, notFoundPage, "text/html; charset=utf-8", contentTypeSet);
    } else {
      res.end();
    }
  }

  private _setupRoutes() {
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      res.on("finish", () => {
        console.log(`${req.method} ${req.path} -> ${res.statusCode}`);
      });
      next();
    });

    this.app.all("*", (req: Request, res: Response, next: NextFunction) => {
      this._respond(req, res).catch(next);
    });
  }

  /**
   * Load the rule files, then start the server.
   */
  async listen(): Promise<void> {
    await this.reload();
    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        const address = server.address();
        if (address && typeof address === "object") {
          this.port = address.port;
        }
        resolve();
      });
      server.once("error", reject);
      this.server = server;
    });
  }

  /**
   * Stop the server. Connections still open after `timeoutMs` are dropped.
   */
  close(timeoutMs: number = SHUTDOWN_TIMEOUT_MS): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      this.server = null;
      const timer = setTimeout(() => {
        console.error(
          `close: waited ${timeoutMs} ms for graceful shutdown, dropping open connections`
        );
        server.closeAllConnections();
      }, timeoutMs);
      timer.unref();
      server.close((err?: Error) => {
        clearTimeout(timer);
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}

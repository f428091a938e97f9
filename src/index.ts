#!/usr/bin/env node
import { loadConfig } from "./config";
import { SiteServer } from "./site-server";

export { RuleEngine, EngineHandle } from "./rule-engine";
export { RuleParseError, isRuleParseError } from "./rule-errors";
export { parsePattern } from "./pattern";
export { parseHeaders } from "./headers-file";
export { parseRedirects, DEFAULT_REDIRECT_STATUS } from "./redirects-file";
export { SiteServer } from "./site-server";

async function main(): Promise<void> {
  const config = loadConfig();
  const server = new SiteServer(config);
  await server.listen();
  console.log(`Serving ${server.rootDir} at http://${server.host}:${server.port}`);

  process.on("SIGHUP", () => {
    server.reload().catch((err: unknown) => {
      console.error("Reload failed, keeping previous rules:", err);
    });
  });

  const shutdown = () => {
    console.info("Shutting down");
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Close failed:", err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error("Failed to start server:", err);
    process.exit(1);
  });
}

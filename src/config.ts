import path from "path";
import { DEFAULT_REDIRECT_STATUS } from "./redirects-file";

export type ServerConfig = {
  rootDir: string;
  port: number;
  host: string;
  defaultStatus: number;
};

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw == null || raw.trim() === "") {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`${key} must be a positive integer, got \`${raw}\``);
  }
  return parseInt(raw, 10);
}

/**
 * Site directory comes from the first CLI argument, then `SITE_DIR`,
 * then `./public`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv
): ServerConfig {
  const siteDir = argv[2] ?? env.SITE_DIR ?? "public";
  return {
    rootDir: path.resolve(siteDir),
    port: readInt(env, "PORT", 8080),
    host: env.HOST || "0.0.0.0",
    defaultStatus: readInt(env, "DEFAULT_REDIRECT_STATUS", DEFAULT_REDIRECT_STATUS),
  };
}

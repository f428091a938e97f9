import { promises as fs } from "fs";
import path from "path";
import { HEADERS_FILE, REDIRECTS_FILE } from "./rule-engine";

const RESERVED_PATHS = [`/${HEADERS_FILE}`, `/${REDIRECTS_FILE}`];

/**
 * The rule files live in the site root but are never served, nor is any
 * top-level name that starts with them (`/_headers.bak`).
 */
function isReservedPath(requestPath: string): boolean {
  return RESERVED_PATHS.some(
    (reserved) =>
      requestPath.startsWith(reserved) &&
      !requestPath.slice(reserved.length).includes("/")
  );
}

async function isFile(absPath: string): Promise<boolean> {
  try {
    return (await fs.stat(absPath)).isFile();
  } catch {
    return false;
  }
}

function isInside(rootDir: string, absPath: string): boolean {
  const rel = path.relative(rootDir, absPath);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Map a request path onto a file under `rootDir`. Directories resolve to
 * their `index.html`. Returns null when nothing servable exists.
 */
async function resolveSiteFile(
  rootDir: string,
  requestPath: string
): Promise<string | null> {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch {
    return null;
  }
  if (decoded.includes("\0")) {
    return null;
  }

  const absPath = path.join(rootDir, decoded);
  if (!isInside(rootDir, absPath)) {
    return null;
  }
  if (!decoded.endsWith("/") && (await isFile(absPath))) {
    return absPath;
  }
  const indexPath = path.join(absPath, "index.html");
  if (await isFile(indexPath)) {
    return indexPath;
  }
  return null;
}

/** Sibling file suffix for each encoding a site may ship precompressed. */
const PRECOMPRESSED_SUFFIXES: [encoding: string, suffix: string][] = [
  ["br", ".br"],
  ["zstd", ".zst"],
  ["gzip", ".gz"],
  ["deflate", ".zz"],
];

/**
 * Precompressed copies of `absPath` that exist on disk, keyed by
 * content coding, in server preference order.
 */
async function findPrecompressed(absPath: string): Promise<Map<string, string>> {
  const found = await Promise.all(
    PRECOMPRESSED_SUFFIXES.map(async ([encoding, suffix]) => {
      const candidate = absPath + suffix;
      return (await isFile(candidate)) ? ([encoding, candidate] as const) : null;
    })
  );
  const variants = new Map<string, string>();
  for (const entry of found) {
    if (entry) {
      variants.set(entry[0], entry[1]);
    }
  }
  return variants;
}

/**
 * Read a rule file from the site root. A missing file is an empty config;
 * any other read failure propagates.
 */
async function readConfigFile(rootDir: string, name: string): Promise<string> {
  try {
    return await fs.readFile(path.join(rootDir, name), "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return "";
    }
    throw err;
  }
}

export { isReservedPath, resolveSiteFile, findPrecompressed, readConfigFile };

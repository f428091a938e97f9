import { parseHeaders } from "./headers-file";
import { interpolate } from "./interpolate";
import { resolve } from "./matcher";
import { parseRedirects, RedirectParseOptions } from "./redirects-file";
import { isRuleParseError } from "./rule-errors";
import { HeaderPair, RedirectResolution, RuleSet } from "./rules";

export type RuleConfigText = {
  headers?: string;
  redirects?: string;
};

export const HEADERS_FILE = "_headers";
export const REDIRECTS_FILE = "_redirects";

function withFile<T>(file: string, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (isRuleParseError(err)) {
      throw err.inFile(file);
    }
    throw err;
  }
}

/**
 * Owns one immutable RuleSet and answers per-request lookups against it.
 * Lookups are synchronous and never throw for an unmatched path.
 */
export class RuleEngine {
  public readonly rules: RuleSet;

  constructor(rules: RuleSet) {
    this.rules = Object.freeze({
      headers: Object.freeze([...rules.headers]),
      redirects: Object.freeze([...rules.redirects]),
    });
  }

  static empty(): RuleEngine {
    return new RuleEngine({ headers: [], redirects: [] });
  }

  /**
   * Parse both config texts. Any parse error aborts the whole load, so a
   * returned engine is never partial.
   */
  static fromConfig(
    { headers = "", redirects = "" }: RuleConfigText,
    options: RedirectParseOptions = {}
  ): RuleEngine {
    return new RuleEngine({
      headers: withFile(HEADERS_FILE, () => parseHeaders(headers)),
      redirects: withFile(REDIRECTS_FILE, () => parseRedirects(redirects, options)),
    });
  }

  get isEmpty(): boolean {
    return this.rules.headers.length === 0 && this.rules.redirects.length === 0;
  }

  resolveHeaders(path: string): HeaderPair[] {
    const match = resolve(this.rules.headers, path);
    if (match == null) {
      return [];
    }
    return match.rule.headers.map(([name, value]): HeaderPair => [name, value]);
  }

  resolveRedirect(path: string): RedirectResolution | null {
    const match = resolve(this.rules.redirects, path);
    if (match == null) {
      return null;
    }
    return {
      location: interpolate(match.rule.target, match.bindings),
      status: match.rule.status,
    };
  }
}

/**
 * Swappable reference to the live engine. Read `current` once per request;
 * `swap` replaces it whole, so a request never sees half of a reload.
 */
export class EngineHandle {
  private engine: RuleEngine;

  constructor(engine: RuleEngine = RuleEngine.empty()) {
    this.engine = engine;
  }

  get current(): RuleEngine {
    return this.engine;
  }

  swap(next: RuleEngine): RuleEngine {
    const previous = this.engine;
    this.engine = next;
    return previous;
  }
}

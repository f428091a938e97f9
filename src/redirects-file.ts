import { validateHeaderValue } from "http";
import { captureNames, parseCaptureComponent, parsePattern } from "./pattern";
import { isRuleParseError, RuleParseError } from "./rule-errors";
import { RedirectRule, TargetPart, TargetTemplate } from "./rules";

export const DEFAULT_REDIRECT_STATUS = 302;

export type RedirectParseOptions = {
  /** Status used when a line has no third field. */
  defaultStatus?: number;
};

function checkLocationText(text: string): void {
  try {
    validateHeaderValue("Location", text);
  } catch {
    throw new RuleParseError(
      "InvalidRedirectTarget",
      `\`${text}\` holds characters not allowed in a Location header`
    );
  }
}

/**
 * Parse a redirect target. `known` holds the names the source pattern binds;
 * a reference to any other name is rejected.
 */
export function parseTarget(text: string, known: Set<string>): TargetTemplate {
  const parts = text.split("/").map((component): TargetPart => {
    const capture = parseCaptureComponent(component);
    if (capture == null) {
      checkLocationText(component);
      return { kind: "literal", text: component };
    }
    if (capture.wildcard) {
      throw new RuleParseError(
        "InvalidCaptureName",
        `targets reference wildcards as \`{${capture.name}}\`, not \`${component}\``
      );
    }
    if (!known.has(capture.name)) {
      throw new RuleParseError(
        "UnknownCaptureReference",
        `\`${component}\` is not captured by the source path`
      );
    }
    return { kind: "reference", name: capture.name };
  });
  return { source: text, parts };
}

/**
 * Any three-digit code is passed through, redirect or not; Node refuses to
 * write anything outside 100-999.
 */
function parseStatus(field: string): number {
  const status = Number(field);
  if (!/^\d+$/.test(field) || status < 100 || status > 999) {
    throw new RuleParseError(
      "InvalidStatusCode",
      `\`${field}\` could not be converted to a status`
    );
  }
  return status;
}

/**
 * Parse a `_redirects` file. Each line is `source target [status]`:
 *
 * ```
 * /blog/{slug}   /posts/{slug}  301
 * /docs/{*page}  https://docs.example.com/{page}
 * ```
 */
export function parseRedirects(
  text: string,
  { defaultStatus = DEFAULT_REDIRECT_STATUS }: RedirectParseOptions = {}
): RedirectRule[] {
  const rules: RedirectRule[] = [];

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const trimmed = lines[i].trim();
    if (trimmed.length === 0 || trimmed.startsWith("#")) {
      continue;
    }

    try {
      const fields = trimmed.split(/\s+/);
      if (fields.length < 2 || fields.length > 3) {
        throw new RuleParseError(
          "MalformedRedirectLine",
          `found ${fields.length} fields, expected 2 or 3`
        );
      }
      const [source, target] = fields;
      const pattern = parsePattern(source);
      rules.push({
        pattern,
        target: parseTarget(target, captureNames(pattern)),
        status: fields.length === 3 ? parseStatus(fields[2]) : defaultStatus,
        line: lineNumber,
      });
    } catch (err) {
      if (isRuleParseError(err)) {
        throw err.atLine(lineNumber);
      }
      throw err;
    }
  }

  return rules;
}

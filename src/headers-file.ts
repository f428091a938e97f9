import { validateHeaderName, validateHeaderValue } from "http";
import { parsePattern } from "./pattern";
import { isRuleParseError, RuleParseError } from "./rule-errors";
import { HeaderRule } from "./rules";

function isIndented(line: string): boolean {
  return line.startsWith(" ") || line.startsWith("\t");
}

function checkHeader(name: string, value: string): void {
  try {
    validateHeaderName(name);
  } catch {
    throw new RuleParseError(
      "InvalidHeaderName",
      `\`${name}\` is not a valid header name`
    );
  }
  try {
    validateHeaderValue(name, value);
  } catch {
    throw new RuleParseError(
      "InvalidHeaderValue",
      `the value of \`${name}\` holds characters not allowed in a header`
    );
  }
}

/**
 * Parse a `_headers` file:
 *
 * ```
 * /assets/{*file}
 *   Cache-Control: public, max-age=31536000
 * ```
 *
 * An unindented line starts a rule, indented `name: value` lines belong to it.
 */
export function parseHeaders(text: string): HeaderRule[] {
  const rules: HeaderRule[] = [];
  let current: HeaderRule | null = null;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNumber = i + 1;
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith("#")) {
      continue;
    }

    try {
      if (isIndented(line)) {
        if (current == null) {
          throw new RuleParseError(
            "OrphanedHeaderLine",
            "an unindented path must come before any header line"
          );
        }
        const colonIndex = trimmed.indexOf(":");
        if (colonIndex === -1) {
          throw new RuleParseError(
            "MissingHeaderColon",
            `expected \`name: value\`, got \`${trimmed}\``
          );
        }
        const name = trimmed.substring(0, colonIndex).trim();
        const value = trimmed.substring(colonIndex + 1).trim();
        checkHeader(name, value);
        current.headers.push([name, value]);
      } else {
        current = { pattern: parsePattern(trimmed), headers: [], line: lineNumber };
        rules.push(current);
      }
    } catch (err) {
      if (isRuleParseError(err)) {
        throw err.atLine(lineNumber);
      }
      throw err;
    }
  }

  return rules;
}

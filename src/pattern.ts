import { RuleParseError } from "./rule-errors";

export type Segment =
  | { kind: "literal"; text: string }
  | { kind: "capture"; name: string }
  | { kind: "wildcard"; name: string };

export type Pattern = {
  /** Source text, kept for log lines only. */
  source: string;
  segments: Segment[];
};

/**
 * Lower is more specific: literal-only patterns beat patterns with a capture,
 * which beat patterns ending in a wildcard.
 */
export enum SpecificityTier {
  Literal = 0,
  Capture = 1,
  Wildcard = 2,
}

const CAPTURE_NAME = /^[A-Za-z0-9_]+$/;

export function splitPath(path: string): string[] {
  return path.split("/").filter((part) => part.length > 0);
}

/**
 * Parse the body of a `{...}` component. Returns null when the component is
 * not capture syntax at all.
 */
export function parseCaptureComponent(
  component: string
): { name: string; wildcard: boolean } | null {
  if (!component.startsWith("{") || !component.endsWith("}")) {
    return null;
  }
  let name = component.slice(1, -1);
  const wildcard = name.startsWith("*");
  if (wildcard) {
    name = name.slice(1);
  }
  if (!CAPTURE_NAME.test(name)) {
    throw new RuleParseError(
      "InvalidCaptureName",
      `\`${component}\` does not hold a valid capture name`
    );
  }
  return { name, wildcard };
}

export function parsePattern(text: string): Pattern {
  const components = splitPath(text);
  const segments: Segment[] = [];
  const seen = new Set<string>();

  components.forEach((component, index) => {
    const capture = parseCaptureComponent(component);
    if (capture == null) {
      segments.push({ kind: "literal", text: component });
      return;
    }
    if (seen.has(capture.name)) {
      throw new RuleParseError(
        "DuplicateCaptureName",
        `capture \`${capture.name}\` appears more than once in \`${text}\``
      );
    }
    seen.add(capture.name);
    if (capture.wildcard) {
      if (index !== components.length - 1) {
        throw new RuleParseError(
          "WildcardNotTerminal",
          `wildcard \`{*${capture.name}}\` must be the last segment of \`${text}\``
        );
      }
      segments.push({ kind: "wildcard", name: capture.name });
    } else {
      segments.push({ kind: "capture", name: capture.name });
    }
  });

  return { source: text, segments };
}

export function specificityTier(pattern: Pattern): SpecificityTier {
  let tier = SpecificityTier.Literal;
  for (const segment of pattern.segments) {
    if (segment.kind === "wildcard") {
      return SpecificityTier.Wildcard;
    }
    if (segment.kind === "capture") {
      tier = SpecificityTier.Capture;
    }
  }
  return tier;
}

export function captureNames(pattern: Pattern): Set<string> {
  const names = new Set<string>();
  for (const segment of pattern.segments) {
    if (segment.kind !== "literal") {
      names.add(segment.name);
    }
  }
  return names;
}

function segmentsEqual(a: Segment, b: Segment): boolean {
  switch (a.kind) {
    case "literal":
      return b.kind === "literal" && a.text === b.text;
    case "capture":
      return b.kind === "capture" && a.name === b.name;
    case "wildcard":
      return b.kind === "wildcard" && a.name === b.name;
  }
}

export function patternsEqual(a: Pattern, b: Pattern): boolean {
  return (
    a.segments.length === b.segments.length &&
    a.segments.every((segment, i) => segmentsEqual(segment, b.segments[i]))
  );
}

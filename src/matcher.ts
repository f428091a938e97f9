import { Pattern, specificityTier, splitPath } from "./pattern";
import { Bindings } from "./rules";

export type RuleMatch<R> = {
  index: number;
  rule: R;
  bindings: Bindings;
};

/**
 * Structural match of one pattern against already split request segments.
 * Returns the bindings, or null when the pattern does not fit.
 */
export function matchPattern(
  pattern: Pattern,
  requestSegments: string[]
): Bindings | null {
  const bindings: Bindings = new Map();
  const { segments } = pattern;

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    switch (segment.kind) {
      case "wildcard":
        // always last, takes whatever is left (possibly nothing)
        bindings.set(segment.name, requestSegments.slice(i).join("/"));
        return bindings;
      case "capture":
        if (i >= requestSegments.length) {
          return null;
        }
        bindings.set(segment.name, requestSegments[i]);
        break;
      case "literal":
        if (requestSegments[i] !== segment.text) {
          return null;
        }
        break;
    }
  }

  return segments.length === requestSegments.length ? bindings : null;
}

/**
 * Find the rule that applies to `path`. The most specific tier wins; within a
 * tier the rule declared first wins. Rules are never merged.
 */
export function resolve<R extends { pattern: Pattern }>(
  rules: readonly R[],
  path: string
): RuleMatch<R> | null {
  const requestSegments = splitPath(path);
  let best: RuleMatch<R> | null = null;
  let bestTier = Infinity;

  for (let index = 0; index < rules.length; index++) {
    const rule = rules[index];
    const tier = specificityTier(rule.pattern);
    if (tier >= bestTier) {
      continue;
    }
    const bindings = matchPattern(rule.pattern, requestSegments);
    if (bindings != null) {
      best = { index, rule, bindings };
      bestTier = tier;
    }
  }

  return best;
}

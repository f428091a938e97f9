import { Pattern } from "./pattern";

export type HeaderPair = [name: string, value: string];

export type HeaderRule = {
  pattern: Pattern;
  /** In file order. A later duplicate name overrides an earlier one. */
  headers: HeaderPair[];
  line: number;
};

export type TargetPart =
  | { kind: "literal"; text: string }
  | { kind: "reference"; name: string };

/**
 * Redirect target split on `/`. Parts are rejoined with `/`, so empty parts
 * are kept and a full URL survives unchanged.
 */
export type TargetTemplate = {
  source: string;
  parts: TargetPart[];
};

export type RedirectRule = {
  pattern: Pattern;
  target: TargetTemplate;
  status: number;
  line: number;
};

export type RuleSet = {
  readonly headers: readonly HeaderRule[];
  readonly redirects: readonly RedirectRule[];
};

/** Capture and wildcard values for one resolved request. */
export type Bindings = Map<string, string>;

export type RedirectResolution = {
  location: string;
  status: number;
};

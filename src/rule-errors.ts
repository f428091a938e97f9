export type RuleParseErrorKind =
  | "InvalidCaptureName"
  | "WildcardNotTerminal"
  | "DuplicateCaptureName"
  | "OrphanedHeaderLine"
  | "MissingHeaderColon"
  | "InvalidHeaderName"
  | "InvalidHeaderValue"
  | "MalformedRedirectLine"
  | "UnknownCaptureReference"
  | "InvalidRedirectTarget"
  | "InvalidStatusCode";

/**
 * Raised while loading `_headers` or `_redirects`. Never raised while
 * resolving a request.
 */
export class RuleParseError extends Error {
  public kind: RuleParseErrorKind;
  public detail: string;
  public line?: number;
  public file?: string;

  constructor(kind: RuleParseErrorKind, detail: string, line?: number) {
    super(detail);
    this.name = "RuleParseError";
    this.kind = kind;
    this.detail = detail;
    this.line = line;
    this.message = this.describe();
  }

  /** Attach the 1-based line the error came from, keeping any earlier one. */
  atLine(line: number): this {
    this.line = this.line ?? line;
    this.message = this.describe();
    return this;
  }

  inFile(file: string): this {
    this.file = file;
    this.message = this.describe();
    return this;
  }

  private describe(): string {
    const where = [
      this.file,
      this.line != null ? `line ${this.line}` : undefined,
    ].filter((part): part is string => part != null);
    const prefix = where.length > 0 ? `${where.join(" ")}: ` : "";
    return `${prefix}${this.kind}: ${this.detail}`;
  }
}

export function isRuleParseError(error: unknown): error is RuleParseError {
  return error instanceof RuleParseError;
}

/**
 * Error classes for the HTL parser
 */

export type HtlParseErrorKind = "structural" | "depth-exceeded";

export type HtlParseErrorDetails = {
  /** Short diagnostic, e.g. "unexpected closing paren" */
  reason: string;
  line: number;
  column: number;
  /** Offending character; absent when the input ended early */
  character?: string;
  /** Number of closing parens missing at end of input */
  missingParens?: number;
};

function formatLocation(details: HtlParseErrorDetails): string {
  const location = `at line ${details.line}, column ${details.column}`;
  if (details.character === undefined) {
    return location;
  }
  return `${location} (character ${JSON.stringify(details.character)})`;
}

export class HtlParseError extends Error {
  readonly kind: HtlParseErrorKind = "structural";
  readonly reason: string;
  readonly line: number;
  readonly column: number;
  readonly character?: string;
  readonly missingParens?: number;

  constructor(details: HtlParseErrorDetails) {
    super(`${details.reason} ${formatLocation(details)}`);
    this.name = "HtlParseError";
    this.reason = details.reason;
    this.line = details.line;
    this.column = details.column;
    this.character = details.character;
    this.missingParens = details.missingParens;
  }
}

export class HtlDepthExceededError extends HtlParseError {
  override readonly kind: HtlParseErrorKind = "depth-exceeded";

  constructor(details: HtlParseErrorDetails) {
    super(details);
    this.name = "HtlDepthExceededError";
  }
}

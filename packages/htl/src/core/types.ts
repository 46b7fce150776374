/**
 * Core types for the HTL parser and renderer
 */

import type { HtlParseError } from "../errors/types.js";

/**
 * Element node: a tag with attributes and ordered children.
 * An empty tag marks an anonymous group (the synthetic document root).
 */
export type HtlElement = {
  kind: "element";
  tag: string;
  attributes: Map<string, string>;
  children: HtlNode[];
};

/**
 * Text node: a leaf holding literal text
 */
export type HtlText = {
  kind: "text";
  text: string;
};

export type HtlNode = HtlElement | HtlText;

/**
 * Lexical contexts of the parser
 */
export const ParseContext = {
  DEFAULT: "default",
  TAG: "tag",
  AFTER_TAG: "after-tag",
  ATTR_KEY: "attr-key",
  AFTER_ATTR_KEY: "after-attr-key",
  ATTR_VALUE: "attr-value",
  CONTENT: "content",
} as const;

export type ParseContext = (typeof ParseContext)[keyof typeof ParseContext];

/**
 * Eat behaviors of the tokenizer. `FAILED` is terminal.
 */
export const EatState = {
  IDLE: "idle",
  SYMBOL: "symbol",
  STRING: "string",
  COMMENT: "comment",
  FAILED: "failed",
} as const;

export type EatState = (typeof EatState)[keyof typeof EatState];

/**
 * Characters with a meaning to the tokenizer
 */
export const Chars = {
  OPEN_PAREN: "(",
  CLOSE_PAREN: ")",
  QUOTE: '"',
  BACKSLASH: "\\",
  KEYWORD_START: ":",
  COMMENT_START: ";",
  NEWLINE: "\n",
  NBSP_PLACEHOLDER: "_",
} as const;

/** Maximum number of frames on the parse stack, synthetic root included */
export const MAX_STACK_DEPTH = 256;

/**
 * Tags rendered as `<tag/>` when they have no children
 */
export const VOID_TAGS: ReadonlySet<string> = new Set([
  "br",
  "hr",
  "link",
  "img",
  "meta",
]);

/**
 * Result of a parse: exactly one field is set, except for empty input
 * where both are undefined.
 */
export type ParseResult = {
  tree: HtlElement | undefined;
  error: HtlParseError | undefined;
};

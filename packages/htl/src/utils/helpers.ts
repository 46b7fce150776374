/**
 * Character helpers for the HTL tokenizer
 */

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  "<": "&lt;",
  ">": "&gt;",
  "&": "&amp;",
  "'": "&apos;",
  '"': "&quot;",
};

const BACKSLASH_ESCAPES: Readonly<Record<string, string>> = {
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v",
};

// Unicode White_Space
const WHITESPACE_REGEX =
  /^[\t\n\v\f\r \u0085\u00a0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]$/u;

/**
 * Escape a single character for HTML text or attribute values
 */
export function escapeHtmlChar(ch: string): string {
  return Object.hasOwn(HTML_ESCAPES, ch) ? HTML_ESCAPES[ch] : ch;
}

/**
 * Resolve the character following a backslash inside a quoted string.
 * Anything outside the control-character table (the backslash and the
 * double quote included) goes through {@link escapeHtmlChar}.
 */
export function unescapeChar(ch: string): string {
  return Object.hasOwn(BACKSLASH_ESCAPES, ch)
    ? BACKSLASH_ESCAPES[ch]
    : escapeHtmlChar(ch);
}

/**
 * Check if a character (one code point) is whitespace
 */
export function isWhitespace(ch: string): boolean {
  return WHITESPACE_REGEX.test(ch);
}

/**
 * HTL parser entry points
 */

import { HtlParseError } from "../errors/types.js";
import { HtlTokenizer } from "./tokenizer.js";
import type { HtlElement, ParseResult } from "./types.js";
import { Chars, EatState } from "./types.js";

function failed(error: HtlParseError): ParseResult {
  return { tree: undefined, error };
}

/**
 * Parse HTL source into a tree rooted at an anonymous element.
 *
 * Empty input yields neither a tree nor an error. Any failure aborts the
 * whole parse; no partial tree is returned.
 */
export function parse(input: string): ParseResult {
  if (input === "") {
    return { tree: undefined, error: undefined };
  }

  const tokenizer = new HtlTokenizer();
  let line = 1;
  let column = 0;

  for (const ch of input) {
    const state = tokenizer.feed(ch);
    if (ch === Chars.NEWLINE) {
      line++;
      column = 0;
    } else {
      column++;
    }
    if (state === EatState.FAILED) {
      return failed(tokenizer.createError({ line, column, character: ch }));
    }
  }

  if (tokenizer.currentState === EatState.STRING) {
    return failed(
      new HtlParseError({ reason: "unterminated string", line, column })
    );
  }

  const missingParens = tokenizer.depth - 1;
  if (missingParens > 0) {
    return failed(
      new HtlParseError({
        reason: `missing ${missingParens} closing paren${missingParens === 1 ? "" : "s"}`,
        line,
        column,
        missingParens,
      })
    );
  }

  return { tree: tokenizer.root, error: undefined };
}

/**
 * Like {@link parse}, but throws the parse error
 */
export function parseOrThrow(input: string): HtlElement | undefined {
  const { tree, error } = parse(input);
  if (error) {
    throw error;
  }
  return tree;
}

/**
 * HTL tokenizer: a character-driven state machine that builds the node
 * tree while it reads. The current eat behavior is part of the state;
 * `feed` dispatches on it and stores the behavior for the next character.
 */

import {
  HtlDepthExceededError,
  HtlParseError,
  type HtlParseErrorDetails,
  type HtlParseErrorKind,
} from "../errors/types.js";
import { escapeHtmlChar, isWhitespace, unescapeChar } from "../utils/helpers.js";
import { appendChild, createElement, createText } from "./node.js";
import type { HtlElement } from "./types.js";
import { Chars, EatState, MAX_STACK_DEPTH, ParseContext } from "./types.js";

type Failure = {
  reason: string;
  kind: HtlParseErrorKind;
};

export class HtlTokenizer {
  readonly root: HtlElement = createElement();

  private context: ParseContext = ParseContext.DEFAULT;
  private state: EatState = EatState.IDLE;
  private token = "";
  private key = "";
  private escaping = false;
  private failure: Failure | undefined;
  private readonly stack: HtlElement[] = [this.root];

  /**
   * Feed one character (a full code point) to the machine
   */
  feed(ch: string): EatState {
    switch (this.state) {
      case EatState.IDLE:
        this.state = this.eatIdle(ch);
        break;
      case EatState.SYMBOL:
        this.state = this.eatSymbol(ch);
        break;
      case EatState.STRING:
        this.state = this.eatString(ch);
        break;
      case EatState.COMMENT:
        this.state = this.eatComment(ch);
        break;
      case EatState.FAILED:
        break;
    }
    return this.state;
  }

  /**
   * Number of frames on the stack, synthetic root included
   */
  get depth(): number {
    return this.stack.length;
  }

  get currentState(): EatState {
    return this.state;
  }

  get currentContext(): ParseContext {
    return this.context;
  }

  /**
   * Build the error for the failure staged by the last `feed` call.
   * Throws when the machine has not failed.
   */
  createError(position: Omit<HtlParseErrorDetails, "reason">): HtlParseError {
    if (!this.failure) {
      throw new Error("createError called before the tokenizer failed");
    }
    const details = { ...position, reason: this.failure.reason };
    return this.failure.kind === "depth-exceeded"
      ? new HtlDepthExceededError(details)
      : new HtlParseError(details);
  }

  private fail(
    reason: string,
    kind: HtlParseErrorKind = "structural"
  ): EatState {
    this.failure = { reason, kind };
    return EatState.FAILED;
  }

  private currentNode(): HtlElement {
    return this.stack[this.stack.length - 1];
  }

  private flushToken(): string {
    const token = this.token;
    this.token = "";
    return token;
  }

  /**
   * Move the pending token into the tree, according to the context the
   * token was started in
   */
  private commit(): void {
    switch (this.context) {
      case ParseContext.TAG:
        this.currentNode().tag = this.flushToken();
        break;
      case ParseContext.ATTR_KEY:
        this.key = this.flushToken();
        break;
      case ParseContext.ATTR_VALUE: {
        const key = this.key;
        this.key = "";
        this.currentNode().attributes.set(key, this.flushToken());
        break;
      }
      case ParseContext.CONTENT:
        appendChild(this.currentNode(), createText(this.flushToken()));
        break;
      default:
        break;
    }
  }

  private push(): EatState {
    if (this.stack.length >= MAX_STACK_DEPTH) {
      return this.fail("tree too deep", "depth-exceeded");
    }
    const node = createElement();
    appendChild(this.currentNode(), node);
    this.stack.push(node);
    this.context = ParseContext.TAG;
    return EatState.SYMBOL;
  }

  private pop(): EatState {
    if (this.stack.length <= 1) {
      return this.fail("unexpected closing paren");
    }
    this.stack.pop();
    this.context = ParseContext.DEFAULT;
    return EatState.IDLE;
  }

  /**
   * Between tokens
   */
  private eatIdle(ch: string): EatState {
    switch (ch) {
      case Chars.OPEN_PAREN:
        if (this.context === ParseContext.AFTER_ATTR_KEY) {
          return this.fail("unexpected open paren");
        }
        return this.push();

      case Chars.CLOSE_PAREN:
        if (this.context === ParseContext.AFTER_ATTR_KEY) {
          return this.fail("unexpected close paren");
        }
        return this.pop();

      case Chars.QUOTE:
        this.context =
          this.context === ParseContext.AFTER_ATTR_KEY
            ? ParseContext.ATTR_VALUE
            : ParseContext.CONTENT;
        return EatState.STRING;

      case Chars.COMMENT_START:
        return EatState.COMMENT;

      case Chars.KEYWORD_START:
        if (this.context === ParseContext.AFTER_TAG) {
          this.context = ParseContext.ATTR_KEY;
          return EatState.SYMBOL;
        }
        return this.fail("unexpected character");

      case Chars.BACKSLASH:
        return this.fail("backslash-escaping is not allowed here");

      default:
        break;
    }

    if (isWhitespace(ch)) {
      return EatState.IDLE;
    }

    this.token += ch;
    this.context =
      this.context === ParseContext.AFTER_ATTR_KEY
        ? ParseContext.ATTR_VALUE
        : ParseContext.CONTENT;
    return EatState.SYMBOL;
  }

  /**
   * Inside an unquoted token. No escaping applies here.
   */
  private eatSymbol(ch: string): EatState {
    switch (ch) {
      case Chars.OPEN_PAREN:
        if (this.context === ParseContext.ATTR_KEY) {
          return this.fail("unexpected open paren");
        }
        this.commit();
        return this.push();

      case Chars.CLOSE_PAREN:
        if (this.context === ParseContext.ATTR_KEY) {
          return this.fail("unexpected close paren");
        }
        this.commit();
        return this.pop();

      case Chars.QUOTE:
        this.commit();
        this.context =
          this.context === ParseContext.ATTR_KEY
            ? ParseContext.ATTR_VALUE
            : ParseContext.CONTENT;
        return EatState.STRING;

      case Chars.BACKSLASH:
        return this.fail("backslash-escaping is not allowed here");

      default:
        break;
    }

    if (isWhitespace(ch)) {
      this.commit();
      this.context =
        this.context === ParseContext.ATTR_KEY
          ? ParseContext.AFTER_ATTR_KEY
          : ParseContext.AFTER_TAG;
      return EatState.IDLE;
    }

    this.token += ch;
    return EatState.SYMBOL;
  }

  /**
   * Inside a double-quoted literal. Output is HTML-escaped.
   */
  private eatString(ch: string): EatState {
    if (this.escaping) {
      this.escaping = false;
      this.token += unescapeChar(ch);
      return EatState.STRING;
    }

    if (ch === Chars.QUOTE) {
      this.commit();
      this.context =
        this.context === ParseContext.ATTR_VALUE
          ? ParseContext.AFTER_TAG
          : ParseContext.DEFAULT;
      return EatState.IDLE;
    }

    if (ch === Chars.BACKSLASH) {
      this.escaping = true;
      return EatState.STRING;
    }

    this.token += escapeHtmlChar(ch);
    return EatState.STRING;
  }

  /**
   * Skip to the end of the line; the lexical context is left as it was
   */
  private eatComment(ch: string): EatState {
    return ch === Chars.NEWLINE ? EatState.IDLE : EatState.COMMENT;
  }
}

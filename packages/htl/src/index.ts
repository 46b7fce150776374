// Tree model
export {
  appendChild,
  createElement,
  createText,
  isElement,
  isText,
} from "./core/node.js";
// Parsing
export { parse, parseOrThrow } from "./core/parser.js";
export { HtlTokenizer } from "./core/tokenizer.js";
// Types
export type {
  HtlElement,
  HtlNode,
  HtlText,
  ParseResult,
} from "./core/types.js";
export {
  EatState,
  MAX_STACK_DEPTH,
  ParseContext,
  VOID_TAGS,
} from "./core/types.js";
// Rendering
export { render } from "./builders/render.js";
// Errors
export type {
  HtlParseErrorDetails,
  HtlParseErrorKind,
} from "./errors/types.js";
export { HtlDepthExceededError, HtlParseError } from "./errors/types.js";
// Utils
export { escapeHtmlChar, isWhitespace, unescapeChar } from "./utils/helpers.js";
export { getDebugLevel, logParseFailure } from "./utils/debug.js";

/**
 * Tree model helpers
 */

import type { HtlElement, HtlNode, HtlText } from "./types.js";

export function createElement(tag = ""): HtlElement {
  return { kind: "element", tag, attributes: new Map(), children: [] };
}

export function createText(text: string): HtlText {
  return { kind: "text", text };
}

export function isElement(node: HtlNode | undefined): node is HtlElement {
  return node?.kind === "element";
}

export function isText(node: HtlNode | undefined): node is HtlText {
  return node?.kind === "text";
}

/**
 * Append a child as the last child of `parent`
 */
export function appendChild(parent: HtlElement, child: HtlNode): void {
  parent.children.push(child);
}

/**
 * Render HTL trees to HTML
 */

import type { HtlElement, HtlNode } from "../core/types.js";
import { Chars, VOID_TAGS } from "../core/types.js";

const NBSP = "&nbsp;";

/**
 * Render a tree to HTML. An absent tree renders as the empty string.
 *
 * Text and attribute values are written as stored: quoted literals were
 * escaped by the parser, bare tokens are raw.
 */
export function render(node: HtlNode | undefined): string {
  if (!node) {
    return "";
  }
  const parts: string[] = [];
  renderNode(node, parts);
  return parts.join("");
}

function renderNode(node: HtlNode, parts: string[]): void {
  if (node.kind === "text") {
    parts.push(node.text === Chars.NBSP_PLACEHOLDER ? NBSP : node.text);
    return;
  }

  if (node.tag === "") {
    renderChildren(node, parts);
    return;
  }

  parts.push("<", node.tag);
  renderAttributes(node, parts);

  if (node.children.length === 0) {
    if (VOID_TAGS.has(node.tag)) {
      parts.push("/>");
    } else {
      parts.push("></", node.tag, ">");
    }
    return;
  }

  parts.push(">");
  renderChildren(node, parts);
  parts.push("</", node.tag, ">");
}

function renderChildren(node: HtlElement, parts: string[]): void {
  for (const child of node.children) {
    renderNode(child, parts);
  }
}

/**
 * Attributes are emitted in ascending key order
 */
function renderAttributes(node: HtlElement, parts: string[]): void {
  const keys = [...node.attributes.keys()].sort();
  for (const key of keys) {
    parts.push(" ", key, '="', node.attributes.get(key) ?? "", '"');
  }
}

/**
 * packages/core/src/document/types.ts — Document tree consumed by layout.
 *
 * Why: Layout needs a node tree, not a DOM. Each element carries its own style
 * declaration so no lookup keyed by node identity is needed.
 */

import type { StyleDeclaration } from "../style/types.js";

export type TextNode = Readonly<{
  kind: "text";
  text: string;
}>;

export type ElementNode = Readonly<{
  kind: "element";
  /** Lower-case tag name. `br` and `img` have layout meaning; other names are labels. */
  tag: string;
  style: StyleDeclaration;
  attrs: Readonly<Record<string, string>>;
  children: readonly DocNode[];
  /** Declaration applied to the first letter of the element's first text run. */
  firstLetter?: StyleDeclaration | undefined;
}>;

export type DocNode = ElementNode | TextNode;

export function isElement(node: DocNode): node is ElementNode {
  return node.kind === "element";
}

export function isText(node: DocNode): node is TextNode {
  return node.kind === "text";
}

/** Human-readable label for warnings: `div#id` or `span`. */
export function describeNode(node: DocNode | null): string {
  if (node === null) return "(anonymous)";
  if (node.kind === "text") return "#text";
  const id = node.attrs["id"];
  return id !== undefined && id.length > 0 ? `${node.tag}#${id}` : node.tag;
}

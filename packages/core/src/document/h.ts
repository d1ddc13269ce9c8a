/**
 * packages/core/src/document/h.ts — Document tree builders.
 *
 * Why: Building `ElementNode` records by hand is noisy in tests and embedders.
 * Builders apply tag defaults, convert strings to text nodes and drop
 * `false`/`null`/`undefined` children so conditional markup reads naturally.
 *
 * @example
 * ```ts
 * h.div({ width: 100, margin: 20 }, [h.span({}, ["hello"])]);
 * ```
 */

import type { StyleDeclaration } from "../style/types.js";
import type { DocNode, ElementNode, TextNode } from "./types.js";
import { withTagDefaults } from "./userAgent.js";

export type Child = DocNode | string | false | null | undefined | readonly Child[];

export type ElementOptions = Readonly<{
  attrs?: Readonly<Record<string, string>>;
  firstLetter?: StyleDeclaration;
}>;

function isChildList(value: Child): value is readonly Child[] {
  return Array.isArray(value);
}

function normalizeChildren(children: readonly Child[]): readonly DocNode[] {
  const out: DocNode[] = [];
  for (const child of children) {
    if (child === false || child === null || child === undefined) continue;
    if (isChildList(child)) {
      out.push(...normalizeChildren(child));
      continue;
    }
    out.push(typeof child === "string" ? text(child) : child);
  }
  return Object.freeze(out);
}

function text(content: string): TextNode {
  return { kind: "text", text: content };
}

function el(
  tag: string,
  style: StyleDeclaration = {},
  children: readonly Child[] = [],
  opts: ElementOptions = {},
): ElementNode {
  const lower = tag.toLowerCase();
  return {
    kind: "element",
    tag: lower,
    style: withTagDefaults(lower, style),
    attrs: opts.attrs ?? {},
    children: normalizeChildren(children),
    ...(opts.firstLetter === undefined ? {} : { firstLetter: opts.firstLetter }),
  };
}

function tagBuilder(tag: string) {
  return (style: StyleDeclaration = {}, children: readonly Child[] = [], opts?: ElementOptions) =>
    el(tag, style, children, opts);
}

function img(attrs: Readonly<Record<string, string>> = {}, style: StyleDeclaration = {}): ElementNode {
  return el("img", style, [], { attrs });
}

function br(): ElementNode {
  return el("br");
}

export const h = {
  text,
  el,
  div: tagBuilder("div"),
  p: tagBuilder("p"),
  section: tagBuilder("section"),
  span: tagBuilder("span"),
  b: tagBuilder("b"),
  em: tagBuilder("em"),
  a: tagBuilder("a"),
  li: tagBuilder("li"),
  ul: tagBuilder("ul"),
  img,
  br,
} as const;

/**
 * packages/html/src/fromHtml.ts — HTML markup → document nodes.
 *
 * Why: Layout fixtures read better as markup than as builder calls. Parsing is
 * delegated to html5parser; this module only maps its tags and texts onto core
 * nodes, applying the user-agent tag defaults under each inline `style`.
 * Comments and doctypes are dropped. A `data-first-letter` attribute carries
 * the element's `::first-letter` declaration.
 */

import { BoxflowError, type DocNode, type ElementNode, h } from "@boxflow/core";
import { parse } from "html5parser";
import type { INode, ITag } from "html5parser";
import { parseInlineStyle } from "./inlineStyle.js";

const ENTITIES: Readonly<Record<string, string>> = Object.freeze({
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
});

const ENTITY_RE = /&(#x[0-9a-f]+|#\d+|[a-z]+);/gi;

export function decodeEntities(text: string): string {
  return text.replace(ENTITY_RE, (match, body: string) => {
    if (body.startsWith("#x") || body.startsWith("#X")) {
      const code = Number.parseInt(body.slice(2), 16);
      return Number.isFinite(code) ? String.fromCodePoint(code) : match;
    }
    if (body.startsWith("#")) {
      const code = Number.parseInt(body.slice(1), 10);
      return Number.isFinite(code) ? String.fromCodePoint(code) : match;
    }
    return ENTITIES[body.toLowerCase()] ?? match;
  });
}

function attributesOf(tag: ITag): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const attr of tag.attributes) {
    attrs[attr.name.value.toLowerCase()] = decodeEntities(attr.value?.value ?? "");
  }
  return attrs;
}

function convertTag(tag: ITag): ElementNode | null {
  const name = tag.name.toLowerCase();
  if (name.startsWith("!")) return null;
  const attrs = attributesOf(tag);
  const style = attrs["style"] === undefined ? {} : parseInlineStyle(attrs["style"]);
  const firstLetter = attrs["data-first-letter"];
  return h.el(name, style, convertNodes(tag.body ?? []), {
    attrs,
    ...(firstLetter === undefined ? {} : { firstLetter: parseInlineStyle(firstLetter) }),
  });
}

function convertNodes(nodes: readonly INode[]): DocNode[] {
  const out: DocNode[] = [];
  for (const node of nodes) {
    if ("attributes" in node) {
      const element = convertTag(node);
      if (element) out.push(element);
    } else if (node.value.length > 0) {
      out.push(h.text(decodeEntities(node.value)));
    }
  }
  return out;
}

/** Parse markup into top-level document nodes. */
export function parseHtml(markup: string): readonly DocNode[] {
  return Object.freeze(convertNodes(parse(markup)));
}

/** Parse markup and return its first top-level element. */
export function fromHtml(markup: string): ElementNode {
  for (const node of parseHtml(markup)) {
    if (node.kind === "element") return node;
  }
  throw new BoxflowError("BOXFLOW_INVALID_ARGUMENT", "fromHtml: markup contains no element");
}

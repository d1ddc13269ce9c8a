/**
 * packages/core/src/document/userAgent.ts — Tag defaults.
 *
 * Minimal user-agent sheet: display per tag plus the few tags that change text
 * weight. Builders and the HTML front end merge these under an element's own
 * declaration.
 */

import type { Display, StyleDeclaration } from "../style/types.js";

const BLOCK_TAGS: ReadonlySet<string> = new Set([
  "address",
  "article",
  "aside",
  "blockquote",
  "body",
  "div",
  "dl",
  "dd",
  "dt",
  "fieldset",
  "figure",
  "footer",
  "form",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "header",
  "hr",
  "html",
  "main",
  "nav",
  "ol",
  "p",
  "pre",
  "section",
  "ul",
]);

const HIDDEN_TAGS: ReadonlySet<string> = new Set(["head", "script", "style", "template", "title"]);

const BOLD_TAGS: ReadonlySet<string> = new Set(["b", "strong", "th"]);

export function defaultDisplay(tag: string): Display {
  if (BLOCK_TAGS.has(tag)) return "block";
  if (HIDDEN_TAGS.has(tag)) return "none";
  if (tag === "li") return "list-item";
  if (tag === "table") return "table";
  return "inline";
}

/** User-agent declaration for a tag, overridden by the element's own declaration. */
export function withTagDefaults(tag: string, style: StyleDeclaration): StyleDeclaration {
  return {
    display: defaultDisplay(tag),
    ...(BOLD_TAGS.has(tag) ? { fontWeight: "bold" as const } : {}),
    ...style,
  };
}

export function isReplacedTag(tag: string): boolean {
  return tag === "img";
}

export function isLineBreakTag(tag: string): boolean {
  return tag === "br";
}

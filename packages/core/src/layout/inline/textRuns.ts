/**
 * packages/core/src/layout/inline/textRuns.ts — Whitespace collapsing and word splitting.
 *
 * `white-space: normal` collapses every whitespace run to one space; a space
 * directly after another collapsed space (possibly in a previous text node) is
 * dropped. Words keep their trailing space so line breaking can let it hang.
 */

const WHITESPACE_RUN = /[\t\n\f\r ]+/g;
const SEGMENT = / |[^ ]+ ?/g;

export function collapseWhitespace(text: string): string {
  return text.replace(WHITESPACE_RUN, " ");
}

export function isWhitespaceOnly(text: string): boolean {
  return text.replace(WHITESPACE_RUN, "").length === 0;
}

/**
 * Collapse `text`, dropping its leading space when the preceding content
 * already ended in one.
 */
export function collapseAfter(text: string, precededBySpace: boolean): string {
  const collapsed = collapseWhitespace(text);
  return precededBySpace && collapsed.startsWith(" ") ? collapsed.slice(1) : collapsed;
}

/** Split collapsed text into break units: `"a b "` → `["a ", "b "]`, `" a"` → `[" ", "a"]`. */
export function splitWords(collapsed: string): string[] {
  return collapsed.match(SEGMENT) ?? [];
}

const FIRST_LETTER = /^[\p{P}\p{S}]*[^\s\p{P}\p{S}]?[\p{P}]*/u;

/**
 * Split off the `::first-letter` run: leading punctuation, the first letter,
 * and punctuation directly after it. Returns `null` when there is no letter.
 */
export function splitFirstLetter(text: string): readonly [string, string] | null {
  const match = FIRST_LETTER.exec(text);
  const head = match?.[0] ?? "";
  if (head.length === 0 || head.trim().length === 0) return null;
  return [head, text.slice(head.length)];
}

/**
 * packages/core/src/layout/inline/collect.ts — Phase 1: inline item collection.
 *
 * Why: Flattening the inline subtree up front lets line breaking and fragment
 * construction run as plain loops over an array, and lets a retry re-run them
 * without touching layout state. Collection is pure: it places no floats and
 * builds no output boxes. Atomic and float items are measured through the
 * injected `measureAtomic`, which must not leave state behind.
 */

import type { DocNode, ElementNode, TextNode } from "../../document/types.js";
import type { ComputedStyle, StyleDeclaration } from "../../style/types.js";
import type { Box } from "../box.js";
import { marginBoxRect } from "../box.js";
import {
  isBlockLevel,
  isFloated,
  isLineBreak,
  isOutOfFlow,
  isReplaced,
  lineHeightOf,
  resolveDisplay,
  resolveEdges,
} from "../boxModel.js";
import type { ConstraintSpace } from "../constraintSpace.js";
import type { TextMeasurer } from "../textMeasure.js";
import type { InlineItem, TextItem } from "./items.js";
import { collapseAfter, collapseWhitespace, isWhitespaceOnly, splitFirstLetter, splitWords } from "./textRuns.js";

export type CollectEnv = Readonly<{
  styleOf: (node: ElementNode, parent: ComputedStyle) => ComputedStyle;
  pseudoStyleOf: (decl: StyleDeclaration, parent: ComputedStyle) => ComputedStyle;
  measureText: TextMeasurer;
  lineHeightRatio: number;
  /** Lay out an atomic or floated element in isolation, margin box at (0, 0). */
  measureAtomic: (node: ElementNode, style: ComputedStyle, constraint: ConstraintSpace) => Box;
}>;

export type CollectOptions = Readonly<{
  /** `::first-letter` declaration of the block container. */
  firstLetter?: StyleDeclaration | undefined;
}>;

type CollectState = {
  readonly out: InlineItem[];
  precededBySpace: boolean;
  firstLetterPending: StyleDeclaration | null;
};

function textItem(
  env: CollectEnv,
  node: TextNode,
  style: ComputedStyle,
  text: string,
): TextItem {
  const font = { fontSize: style.fontSize, fontWeight: style.fontWeight };
  const measured = env.measureText(text, font);
  const hangingWidth = text.endsWith(" ") ? env.measureText(" ", font).width : 0;
  return {
    kind: "text",
    node,
    style,
    text,
    width: measured.width,
    height: style.lineHeight === "normal" ? measured.height : style.lineHeight,
    hangingWidth,
    whitespaceOnly: text.trim().length === 0,
    noBreakAfter: false,
  };
}

function collectText(
  env: CollectEnv,
  state: CollectState,
  node: TextNode,
  style: ComputedStyle,
): void {
  if (isWhitespaceOnly(node.text) && state.precededBySpace) return;
  let text = collapseAfter(node.text, state.precededBySpace);
  if (text.length === 0) return;
  state.precededBySpace = text.endsWith(" ");

  if (state.firstLetterPending !== null && text.trim().length > 0) {
    const decl = state.firstLetterPending;
    state.firstLetterPending = null;
    const split = splitFirstLetter(text);
    if (split !== null) {
      state.out.push(textItem(env, node, env.pseudoStyleOf(decl, style), split[0]));
      text = split[1];
      if (text.length === 0) return;
    }
  }

  if (style.whiteSpace === "nowrap") {
    state.out.push(textItem(env, node, style, text));
    return;
  }
  for (const word of splitWords(text)) {
    state.out.push(textItem(env, node, style, word));
  }
}

function hasOnlyBlockChildren(env: CollectEnv, node: ElementNode, style: ComputedStyle): boolean {
  let blocks = 0;
  for (const child of node.children) {
    if (child.kind === "text") {
      if (collapseWhitespace(child.text).trim().length > 0) return false;
      continue;
    }
    const childStyle = env.styleOf(child, style);
    const display = resolveDisplay(childStyle);
    if (display === "none") continue;
    if (!isBlockLevel(display) || isFloated(childStyle) || isOutOfFlow(childStyle)) return false;
    blocks++;
  }
  return blocks > 0;
}

function collectElement(
  env: CollectEnv,
  state: CollectState,
  constraint: ConstraintSpace,
  node: ElementNode,
  parentStyle: ComputedStyle,
): void {
  const style = env.styleOf(node, parentStyle);
  const display = resolveDisplay(style);
  if (display === "none") return;

  if (isOutOfFlow(style)) {
    state.out.push({ kind: "out-of-flow", node, style, width: 0, height: 0 });
    return;
  }

  if (isFloated(style)) {
    const box = env.measureAtomic(node, style, constraint);
    const rect = marginBoxRect(box);
    state.out.push({
      kind: "float",
      node,
      style,
      side: style.float === "right" ? "right" : "left",
      box,
      width: Math.max(0, rect.width),
      height: Math.max(0, rect.height),
    });
    return;
  }

  if (isBlockLevel(display)) {
    state.out.push({ kind: "block-child", node, style, width: 0, height: 0 });
    state.precededBySpace = true;
    return;
  }

  if (isLineBreak(node)) {
    state.out.push({
      kind: "control",
      node,
      style,
      width: 0,
      height: lineHeightOf(style, env.lineHeightRatio),
    });
    state.precededBySpace = true;
    return;
  }

  if (display === "inline-block" || isReplaced(node)) {
    const box = env.measureAtomic(node, style, constraint);
    const rect = marginBoxRect(box);
    state.out.push({
      kind: "atomic",
      node,
      style,
      box,
      width: Math.max(0, rect.width),
      height: Math.max(0, rect.height),
    });
    state.precededBySpace = false;
    return;
  }

  if (hasOnlyBlockChildren(env, node, style)) {
    collectChildren(env, state, constraint, node.children, style);
    return;
  }

  const resolved = resolveEdges(style, constraint.availableWidth);
  state.out.push({
    kind: "open-tag",
    node,
    style,
    margin: resolved.margin,
    border: resolved.border,
    padding: resolved.padding,
    width: resolved.margin.left + resolved.border.left + resolved.padding.left,
    height: 0,
  });
  collectChildren(env, state, constraint, node.children, style);
  state.out.push({
    kind: "close-tag",
    node,
    style,
    width: resolved.margin.right + resolved.border.right + resolved.padding.right,
    height: 0,
  });
}

function collectChildren(
  env: CollectEnv,
  state: CollectState,
  constraint: ConstraintSpace,
  children: readonly DocNode[],
  parentStyle: ComputedStyle,
): void {
  for (const child of children) {
    if (child.kind === "text") collectText(env, state, child, parentStyle);
    else collectElement(env, state, constraint, child, parentStyle);
  }
}

/**
 * Mark text items that continue a word in the next text item (split only by
 * inline markers or a first-letter run), so the breaker keeps them together.
 */
function markWordJoins(items: InlineItem[]): void {
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (!item || item.kind !== "text" || item.whitespaceOnly || item.text.endsWith(" ")) continue;
    let j = i + 1;
    while (j < items.length) {
      const next = items[j];
      if (next?.kind !== "open-tag" && next?.kind !== "close-tag") break;
      j++;
    }
    const next = items[j];
    if (next?.kind === "text" && !next.text.startsWith(" ")) {
      items[i] = { ...item, noBreakAfter: true };
    }
  }
}

/** Flatten the children of an inline formatting context into items. */
export function collectInlineItems(
  children: readonly DocNode[],
  containerStyle: ComputedStyle,
  constraint: ConstraintSpace,
  env: CollectEnv,
  opts: CollectOptions = {},
): readonly InlineItem[] {
  const state: CollectState = {
    out: [],
    precededBySpace: true,
    firstLetterPending: opts.firstLetter ?? null,
  };
  collectChildren(env, state, constraint, children, containerStyle);
  markWordJoins(state.out);
  return Object.freeze(state.out);
}

/**
 * packages/core/src/layout/marginChain.ts — Structural margin-collapsing queries.
 *
 * Why: A block's border-box Y depends on margins that live further down the
 * tree (a first child's top margin collapses through an unbordered parent).
 * These queries answer that from styles alone, before anything is laid out,
 * so the flow builder can place each box once at its final position.
 */

import type { DocNode, ElementNode } from "../document/types.js";
import type { ComputedStyle } from "../style/types.js";
import {
  establishesFormattingContext,
  isFloated,
  isOutOfFlow,
  isReplaced,
  resolveDisplay,
  resolveLength,
  resolveLengthAuto,
} from "./boxModel.js";
import type { StyleResolver } from "./context.js";
import { collapseWhitespace } from "./inline/textRuns.js";
import { shouldCollapseMargins } from "./margins.js";

function isZeroLength(value: number | string): boolean {
  return typeof value === "number" ? value === 0 : Number.parseFloat(value) === 0;
}

/**
 * Whether a block container's children form an inline formatting context:
 * any non-blank text or any in-flow inline-level element.
 */
export function hasInlineContent(
  styleOf: StyleResolver,
  children: readonly DocNode[],
  parentStyle: ComputedStyle,
): boolean {
  for (const child of children) {
    if (child.kind === "text") {
      if (collapseWhitespace(child.text).trim().length > 0) return true;
      continue;
    }
    const style = styleOf(child, parentStyle);
    const display = resolveDisplay(style);
    if (display === "none" || isOutOfFlow(style) || isFloated(style)) continue;
    if (display === "inline" || display === "inline-block") return true;
  }
  return false;
}

function collapsibleBlock(node: ElementNode, style: ComputedStyle): boolean {
  const display = resolveDisplay(style);
  return (
    shouldCollapseMargins(style, display) &&
    !establishesFormattingContext(style, display) &&
    !isReplaced(node)
  );
}

/**
 * Margins adjoin those of the previous and next in-flow siblings. Boxes with
 * clipped overflow keep their own margins whole.
 */
export function collapsesWithSiblings(style: ComputedStyle): boolean {
  return shouldCollapseMargins(style, resolveDisplay(style));
}

/** Top margin adjoins the first in-flow child's top margin. */
export function collapsesWithFirstChild(node: ElementNode, style: ComputedStyle): boolean {
  return (
    collapsibleBlock(node, style) && style.borderTopWidth === 0 && isZeroLength(style.paddingTop)
  );
}

/**
 * Bottom margin adjoins the last in-flow child's bottom margin. `height`
 * must be auto and `min-height` zero.
 */
export function collapsesWithLastChild(node: ElementNode, style: ComputedStyle): boolean {
  return (
    collapsibleBlock(node, style) &&
    style.borderBottomWidth === 0 &&
    isZeroLength(style.paddingBottom) &&
    style.height === "auto" &&
    isZeroLength(style.minHeight)
  );
}

/**
 * A box whose top and bottom margins adjoin each other: no border or padding
 * in the block axis, zero or auto height, and nothing but collapsing-through
 * blocks (or out-of-flow boxes) inside.
 */
export function collapsesThrough(
  styleOf: StyleResolver,
  node: ElementNode,
  style: ComputedStyle,
): boolean {
  if (!collapsibleBlock(node, style)) return false;
  if (style.borderTopWidth !== 0 || style.borderBottomWidth !== 0) return false;
  if (!isZeroLength(style.paddingTop) || !isZeroLength(style.paddingBottom)) return false;
  if (style.height !== "auto" && !isZeroLength(style.height)) return false;
  if (!isZeroLength(style.minHeight)) return false;
  if (hasInlineContent(styleOf, node.children, style)) return false;
  for (const child of node.children) {
    if (child.kind === "text") continue;
    const childStyle = styleOf(child, style);
    if (resolveDisplay(childStyle) === "none") continue;
    if (isOutOfFlow(childStyle) || isFloated(childStyle)) continue;
    if (!collapsesThrough(styleOf, child, childStyle)) return false;
  }
  return true;
}

function contentWidthEstimate(style: ComputedStyle, cbWidth: number): number {
  const specified = resolveLengthAuto(style.width, cbWidth);
  if (specified !== null) return specified;
  const margins =
    (resolveLengthAuto(style.marginLeft, cbWidth) ?? 0) +
    (resolveLengthAuto(style.marginRight, cbWidth) ?? 0);
  const edges =
    style.borderLeftWidth +
    style.borderRightWidth +
    resolveLength(style.paddingLeft, cbWidth) +
    resolveLength(style.paddingRight, cbWidth);
  return Math.max(0, cbWidth - margins - edges);
}

/**
 * Every margin that collapses into `node`'s top margin: its own, then the
 * first in-flow child's chain while the box lets it through, plus the margins
 * of leading children that collapse through. The collapsed value is
 * `collapseMarginList` of the result.
 */
export function effectiveTopMargins(
  styleOf: StyleResolver,
  node: ElementNode,
  style: ComputedStyle,
  cbWidth: number,
): number[] {
  const out = [resolveLengthAuto(style.marginTop, cbWidth) ?? 0];
  if (!collapsesWithFirstChild(node, style)) return out;
  if (hasInlineContent(styleOf, node.children, style)) return out;

  const childCbWidth = contentWidthEstimate(style, cbWidth);
  for (const child of node.children) {
    if (child.kind === "text") continue;
    const childStyle = styleOf(child, style);
    if (resolveDisplay(childStyle) === "none") continue;
    if (isOutOfFlow(childStyle) || isFloated(childStyle)) continue;
    if (childStyle.clear !== "none" || !collapsesWithSiblings(childStyle)) break;
    out.push(...effectiveTopMargins(styleOf, child, childStyle, childCbWidth));
    if (!collapsesThrough(styleOf, child, childStyle)) break;
    out.push(resolveLengthAuto(childStyle.marginBottom, childCbWidth) ?? 0);
  }
  return out;
}

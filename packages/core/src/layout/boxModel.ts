/**
 * packages/core/src/layout/boxModel.ts — Box-model resolution helpers.
 *
 * Pure functions from computed style + containing block to used values:
 * display blockification, formatting-context roots, edge widths, width and
 * height resolution and relative offsets. The flow builder composes these.
 */

import type { ElementNode } from "../document/types.js";
import { isLineBreakTag, isReplacedTag } from "../document/userAgent.js";
import type {
  ComputedStyle,
  Display,
  LengthPercentage,
  LengthPercentageAuto,
  MaxSize,
} from "../style/types.js";
import { type BoxEdges, type Position, clampMinMax, clampNonNegative, edges } from "./geometry.js";

/** Resolve a length or percentage against `base`. */
export function resolveLength(value: LengthPercentage, base: number): number {
  if (typeof value === "number") return value;
  const pct = Number.parseFloat(value);
  return Number.isFinite(pct) && Number.isFinite(base) ? (base * pct) / 100 : 0;
}

/** `auto` resolves to `null`. */
export function resolveLengthAuto(value: LengthPercentageAuto, base: number): number | null {
  return value === "auto" ? null : resolveLength(value, base);
}

/** Percentages against an indefinite base resolve to `null`. */
export function resolveLengthAgainst(
  value: LengthPercentageAuto,
  base: number | null,
): number | null {
  if (value === "auto") return null;
  if (typeof value === "number") return value;
  return base === null ? null : resolveLength(value, base);
}

function resolveMax(value: MaxSize, base: number | null): number {
  if (value === "none") return Number.POSITIVE_INFINITY;
  if (typeof value === "number") return value;
  return base === null ? Number.POSITIVE_INFINITY : resolveLength(value, base);
}

function resolveMin(value: LengthPercentage, base: number | null): number {
  if (typeof value === "number") return value;
  return base === null ? 0 : resolveLength(value, base);
}

/**
 * Used display (CSS 2.1 §9.7): floated and absolutely positioned boxes are
 * block-level.
 */
export function resolveDisplay(style: ComputedStyle): Display {
  const d = style.display;
  if (d === "none") return d;
  const blockify =
    style.float !== "none" || style.position === "absolute" || style.position === "fixed";
  if (!blockify) return d;
  return d === "inline" || d === "inline-block" ? "block" : d;
}

export function isOutOfFlow(style: ComputedStyle): boolean {
  return style.position === "absolute" || style.position === "fixed";
}

export function isFloated(style: ComputedStyle): boolean {
  return style.float !== "none" && !isOutOfFlow(style);
}

/** Block-level displays that become block children of a flow container. */
export function isBlockLevel(display: Display): boolean {
  return (
    display === "block" ||
    display === "list-item" ||
    display === "table" ||
    display === "flex" ||
    display === "grid"
  );
}

export function isReplaced(node: ElementNode): boolean {
  return isReplacedTag(node.tag);
}

export function isLineBreak(node: ElementNode): boolean {
  return isLineBreakTag(node.tag);
}

/** Roots of a new block formatting context. */
export function establishesFormattingContext(style: ComputedStyle, display: Display): boolean {
  return (
    style.overflow !== "visible" ||
    style.float !== "none" ||
    style.position === "absolute" ||
    style.position === "fixed" ||
    display === "inline-block" ||
    display === "table" ||
    display === "flex" ||
    display === "grid"
  );
}

/** Boxes sized to their content when `width: auto`. */
export function isShrinkToFit(style: ComputedStyle, display: Display): boolean {
  return (
    style.float !== "none" ||
    style.position === "absolute" ||
    style.position === "fixed" ||
    display === "inline-block" ||
    display === "inline" ||
    display === "table"
  );
}

export type ResolvedEdges = Readonly<{
  margin: BoxEdges;
  border: BoxEdges;
  padding: BoxEdges;
  autoMarginLeft: boolean;
  autoMarginRight: boolean;
}>;

/** Margins, borders and padding; percentages resolve against the containing block width. */
export function resolveEdges(style: ComputedStyle, cbWidth: number): ResolvedEdges {
  return {
    margin: edges(
      resolveLengthAuto(style.marginTop, cbWidth) ?? 0,
      resolveLengthAuto(style.marginRight, cbWidth) ?? 0,
      resolveLengthAuto(style.marginBottom, cbWidth) ?? 0,
      resolveLengthAuto(style.marginLeft, cbWidth) ?? 0,
    ),
    border: edges(
      style.borderTopWidth,
      style.borderRightWidth,
      style.borderBottomWidth,
      style.borderLeftWidth,
    ),
    padding: edges(
      clampNonNegative(resolveLength(style.paddingTop, cbWidth)),
      clampNonNegative(resolveLength(style.paddingRight, cbWidth)),
      clampNonNegative(resolveLength(style.paddingBottom, cbWidth)),
      clampNonNegative(resolveLength(style.paddingLeft, cbWidth)),
    ),
    autoMarginLeft: style.marginLeft === "auto",
    autoMarginRight: style.marginRight === "auto",
  };
}

/** Clamp a content width by min/max-width. Min wins; the result is non-negative. */
export function clampWidth(width: number, style: ComputedStyle, base: number): number {
  const min = resolveMin(style.minWidth, base);
  const max = resolveMax(style.maxWidth, base);
  return clampNonNegative(clampMinMax(width, min, max));
}

/**
 * Specified content height, or `null` for auto. Percentages need a definite
 * containing block height.
 */
export function resolveSpecifiedHeight(style: ComputedStyle, cbHeight: number | null): number | null {
  const h = resolveLengthAgainst(style.height, cbHeight);
  return h === null ? null : clampNonNegative(h);
}

/** Clamp a content height by min/max-height (CSS 2.1 §10.7: min wins). */
export function clampHeight(height: number, style: ComputedStyle, cbHeight: number | null): number {
  const min = resolveMin(style.minHeight, cbHeight);
  const max = resolveMax(style.maxHeight, cbHeight);
  return clampNonNegative(clampMinMax(height, min, max));
}

/**
 * Offset of a relatively positioned box. `left` wins over `right`, `top`
 * over `bottom`.
 */
export function relativeOffset(
  style: ComputedStyle,
  cbWidth: number,
  cbHeight: number | null,
): Position {
  if (style.position !== "relative") return { x: 0, y: 0 };
  const left = resolveLengthAuto(style.left, cbWidth);
  const right = resolveLengthAuto(style.right, cbWidth);
  const top = resolveLengthAgainst(style.top, cbHeight);
  const bottom = resolveLengthAgainst(style.bottom, cbHeight);
  return {
    x: left !== null ? left : right !== null ? -right : 0,
    y: top !== null ? top : bottom !== null ? -bottom : 0,
  };
}

/** Used `line-height` in pixels. */
export function lineHeightOf(style: ComputedStyle, ratio: number): number {
  return style.lineHeight === "normal" ? style.fontSize * ratio : style.lineHeight;
}

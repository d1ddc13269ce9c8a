/**
 * packages/core/src/layout/intrinsic.ts — Min-content / max-content inline sizes.
 *
 * Why: Shrink-to-fit widths (floats, inline-blocks, absolutes) and external
 * table/flex column sizing need preferred widths without running layout. This
 * walk reads only styles and text measurements; it never touches float state.
 *
 * Percentages have no base here and contribute 0 (lengths) or nothing (limits).
 */

import type { DocNode, ElementNode } from "../document/types.js";
import type { ComputedStyle } from "../style/types.js";
import { isBlockLevel, isFloated, isLineBreak, isOutOfFlow, isReplaced, resolveDisplay } from "./boxModel.js";
import type { IntrinsicSizes, Size } from "./geometry.js";
import { collapseAfter, splitWords } from "./inline/textRuns.js";
import type { TextMeasurer } from "./textMeasure.js";

export type IntrinsicEnv = Readonly<{
  styleOf: (node: ElementNode, parent: ComputedStyle) => ComputedStyle;
  measureText: TextMeasurer;
  naturalImageSize: (node: ElementNode) => Size;
}>;

const NONE: IntrinsicSizes = Object.freeze({ minContent: 0, maxContent: 0 });

function px(value: number | string): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function horizontalEdges(style: ComputedStyle): number {
  return (
    px(style.paddingLeft) + px(style.paddingRight) + style.borderLeftWidth + style.borderRightWidth
  );
}

function horizontalMargins(style: ComputedStyle): number {
  return px(style.marginLeft) + px(style.marginRight);
}

/**
 * One line's worth of inline content as the line breaker sees it. Whitespace
 * collapses across text nodes, a leading space is dropped and a trailing one
 * hangs, so it never reaches `max`.
 */
type Run = {
  min: number;
  max: number;
  /** Width of the unbreakable unit still growing at the end of the run. */
  word: number;
  /** Hanging space, counted once more content follows it. */
  space: number;
  precededBySpace: boolean;
};

function newRun(): Run {
  return { min: 0, max: 0, word: 0, space: 0, precededBySpace: true };
}

/** Content that joins the current unit. */
function extend(run: Run, width: number): void {
  run.max += run.space + width;
  run.space = 0;
  run.word += width;
}

function breakOpportunity(run: Run): void {
  run.min = Math.max(run.min, run.word);
  run.word = 0;
}

function endRun(run: Run): IntrinsicSizes {
  breakOpportunity(run);
  return { minContent: run.min, maxContent: run.max };
}

function addText(env: IntrinsicEnv, run: Run, text: string, style: ComputedStyle): void {
  const collapsed = collapseAfter(text, run.precededBySpace);
  if (collapsed.length === 0) return;
  run.precededBySpace = collapsed.endsWith(" ");
  const font = { fontSize: style.fontSize, fontWeight: style.fontWeight };
  const spaceWidth = env.measureText(" ", font).width;

  if (style.whiteSpace === "nowrap") {
    const body = run.precededBySpace ? collapsed.slice(0, -1) : collapsed;
    if (body.length > 0) extend(run, env.measureText(body, font).width);
    if (run.precededBySpace) run.space += spaceWidth;
    return;
  }
  for (const segment of splitWords(collapsed)) {
    const word = segment.trimEnd();
    if (word.length > 0) extend(run, env.measureText(word, font).width);
    if (segment.endsWith(" ")) {
      breakOpportunity(run);
      run.space += spaceWidth;
    }
  }
}

function clampToLimits(sizes: IntrinsicSizes, style: ComputedStyle): IntrinsicSizes {
  const min = typeof style.minWidth === "number" ? style.minWidth : 0;
  const max = typeof style.maxWidth === "number" ? style.maxWidth : Number.POSITIVE_INFINITY;
  const clamp = (v: number) => Math.max(min, Math.min(max, v));
  return { minContent: clamp(sizes.minContent), maxContent: clamp(sizes.maxContent) };
}

/** Content-box intrinsic sizes of an element. */
export function intrinsicContentSizes(
  env: IntrinsicEnv,
  node: ElementNode,
  style: ComputedStyle,
): IntrinsicSizes {
  if (isReplaced(node)) {
    const w = typeof style.width === "number" ? style.width : env.naturalImageSize(node).width;
    return clampToLimits({ minContent: w, maxContent: w }, style);
  }
  if (typeof style.width === "number") {
    return clampToLimits({ minContent: style.width, maxContent: style.width }, style);
  }

  let blockMin = 0;
  let blockMax = 0;
  let run = newRun();
  const flushRun = () => {
    const sizes = endRun(run);
    blockMin = Math.max(blockMin, sizes.minContent);
    blockMax = Math.max(blockMax, sizes.maxContent);
    run = newRun();
  };
  const walk = (children: readonly DocNode[], parentStyle: ComputedStyle) => {
    for (const child of children) {
      if (child.kind === "text") {
        addText(env, run, child.text, parentStyle);
        continue;
      }
      const childStyle = env.styleOf(child, parentStyle);
      const display = resolveDisplay(childStyle);
      if (display === "none" || isOutOfFlow(childStyle)) continue;
      if (isLineBreak(child)) {
        flushRun();
        continue;
      }
      const outer = horizontalEdges(childStyle) + horizontalMargins(childStyle);
      if (isFloated(childStyle) || isBlockLevel(display)) {
        flushRun();
        const c = intrinsicContentSizes(env, child, childStyle);
        blockMin = Math.max(blockMin, c.minContent + outer);
        blockMax = Math.max(blockMax, c.maxContent + outer);
        continue;
      }
      if (display === "inline-block" || isReplaced(child)) {
        const c = intrinsicContentSizes(env, child, childStyle);
        breakOpportunity(run);
        extend(run, c.maxContent + outer);
        run.min = Math.max(run.min, c.minContent + outer);
        run.word = 0;
        run.precededBySpace = false;
        continue;
      }
      const start = px(childStyle.marginLeft) + childStyle.borderLeftWidth + px(childStyle.paddingLeft);
      const end = px(childStyle.marginRight) + childStyle.borderRightWidth + px(childStyle.paddingRight);
      if (start > 0) extend(run, start);
      walk(child.children, childStyle);
      if (end > 0) extend(run, end);
    }
  };
  walk(node.children, style);
  flushRun();

  return clampToLimits({ minContent: blockMin, maxContent: blockMax }, style);
}

/**
 * Border-box min/max-content contribution of `node` (margins excluded).
 * Text nodes are measured in `parentStyle`.
 */
export function intrinsicSizes(
  env: IntrinsicEnv,
  node: DocNode,
  parentStyle: ComputedStyle,
): IntrinsicSizes {
  if (node.kind === "text") {
    const run = newRun();
    addText(env, run, node.text, parentStyle);
    return endRun(run);
  }
  const style = env.styleOf(node, parentStyle);
  if (resolveDisplay(style) === "none") return NONE;
  const content = intrinsicContentSizes(env, node, style);
  const edges = horizontalEdges(style);
  return { minContent: content.minContent + edges, maxContent: content.maxContent + edges };
}

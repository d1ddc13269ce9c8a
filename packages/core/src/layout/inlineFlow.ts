/**
 * packages/core/src/layout/inlineFlow.ts — Inline formatting context → boxes.
 *
 * Why: The inline pipeline yields flat, positioned fragments. This module turns
 * them back into a box tree: text runs, atomic boxes, floats (registered with
 * the float manager as they are consumed) and one inline box per element,
 * split into fragments when the element spans lines or a block child.
 *
 * A block-level child inside inline content ends the current pipeline run: it
 * is laid out one level up at the current cursor, and inline layout resumes
 * with the item after it against the updated float state.
 */

import { warnLayoutIssue } from "../diagnostics.js";
import { type ElementNode, describeNode } from "../document/types.js";
import { type Box, type BoxFragment, type LineBox, borderBoxHeight, textBox, translateBox } from "./box.js";
import { lineHeightOf, relativeOffset, resolveLengthAuto } from "./boxModel.js";
import { ConstraintSpace } from "./constraintSpace.js";
import type { LayoutContext } from "./context.js";
import type { ContentInput, ContentResult, FlowOps } from "./flowTypes.js";
import { type Rect, horizontal, unionRect, vertical } from "./geometry.js";
import { type CollectEnv, collectInlineItems } from "./inline/collect.js";
import type { BlockChildItem, Fragment, LineGeometry, OpenTagItem } from "./inline/items.js";
import { type InlineLayoutResult, runInlinePipeline } from "./inline/pipeline.js";
import { collapseMarginList } from "./margins.js";
import { collapsesWithSiblings, effectiveTopMargins } from "./marginChain.js";

/** Horizontal extent of one inline box on one line (or line segment). */
type Region = {
  startX: number;
  endX: number;
  lineIndex: number;
  y: number;
  height: number;
  hasLeft: boolean;
  hasRight: boolean;
};

type InlineFrame = {
  readonly item: OpenTagItem;
  readonly children: Box[];
  readonly regions: Region[];
  current: Region | null;
};

type LineBand = Readonly<{ y: number; height: number }>;

type BlockChildFragment = Fragment & Readonly<{ item: BlockChildItem }>;

function isBlockChildFragment(fragment: Fragment): fragment is BlockChildFragment {
  return fragment.item.kind === "block-child";
}

function bandOf(result: InlineLayoutResult, fragment: Fragment): LineBand {
  const line: LineGeometry | undefined = result.lineGeometry[fragment.lineIndex];
  return line ?? { y: fragment.y, height: fragment.height };
}

function closeRegion(frame: InlineFrame): void {
  if (frame.current) frame.regions.push(frame.current);
  frame.current = null;
}

function extendFrame(frame: InlineFrame, fragment: Fragment, band: LineBand): void {
  if (frame.current && frame.current.lineIndex !== fragment.lineIndex) closeRegion(frame);
  if (!frame.current) {
    frame.current = {
      startX: fragment.x,
      endX: fragment.x,
      lineIndex: fragment.lineIndex,
      y: band.y,
      height: band.height,
      hasLeft: false,
      hasRight: false,
    };
  }
  frame.current.endX = Math.max(frame.current.endX, fragment.x + fragment.width);
}

function inlineBoxOf(frame: InlineFrame, cbWidth: number, cbHeight: number | null): Box {
  const { item } = frame;
  const { margin, border, padding } = item;
  const pieces: BoxFragment[] = frame.regions.map((r) => {
    const x = r.startX + (r.hasLeft ? margin.left : 0);
    const right = r.endX - (r.hasRight ? margin.right : 0);
    const rect: Rect = {
      x,
      y: r.y - padding.top - border.top,
      width: Math.max(0, right - x),
      height: r.height + vertical(padding) + vertical(border),
    };
    return { rect, edges: { left: r.hasLeft, right: r.hasRight } };
  });
  let bounds: Rect | null = null;
  for (const piece of pieces) bounds = bounds === null ? piece.rect : unionRect(bounds, piece.rect);
  const rect = bounds ?? { x: 0, y: 0, width: 0, height: 0 };

  const box: Box = {
    node: item.node,
    style: item.style,
    kind: "inline",
    x: rect.x,
    y: rect.y,
    width: Math.max(0, rect.width - horizontal(padding) - horizontal(border)),
    height: Math.max(0, rect.height - vertical(padding) - vertical(border)),
    margin,
    border,
    padding,
    position: item.style.position,
    float: "none",
    zIndex: item.style.zIndex,
    children: Object.freeze(frame.children),
    ...(pieces.length > 1 ? { fragments: Object.freeze(pieces) } : {}),
  };
  const rel = relativeOffset(item.style, cbWidth, cbHeight);
  return translateBox(box, rel.x, rel.y);
}

function reportPipeline(ctx: LayoutContext, node: ElementNode, result: InlineLayoutResult): void {
  const label = describeNode(node);
  if (!result.converged) {
    warnLayoutIssue(
      ctx.diagnostics,
      `inline-retry:${label}`,
      `inline content of <${label}> did not settle after ${result.attempts} attempts; keeping the last pass`,
    );
  }
  if (result.abandonedFloatDrops > 0) {
    warnLayoutIssue(
      ctx.diagnostics,
      `float-drop:${label}`,
      `float drop search gave up inside <${label}>; float left at its line`,
    );
  }
}

export function layoutInlineContent(
  ctx: LayoutContext,
  input: ContentInput,
  ops: FlowOps,
): ContentResult {
  const { node, style, content } = input;
  const container = { left: content.x, width: content.width };
  const cb = { x: content.x, y: content.y, width: content.width, height: input.cbHeight };
  const base = new ConstraintSpace({
    availableWidth: content.width,
    availableHeight: input.cbHeight,
    textAlign: style.textAlign,
    noWrap: style.whiteSpace === "nowrap",
  });

  // One detached layout per element: the box measured is the box placed.
  const measured = new Map<ElementNode, Box>();
  const env: CollectEnv = {
    styleOf: ctx.styleOf,
    pseudoStyleOf: ctx.pseudoStyleOf,
    measureText: ctx.config.measureText,
    lineHeightRatio: ctx.config.lineHeightRatio,
    measureAtomic: (child, childStyle, constraint) => {
      const hit = measured.get(child);
      if (hit) return hit;
      const box = ops.layoutDetached(ctx, child, childStyle, {
        x: 0,
        y: 0,
        width: constraint.availableWidth,
        height: constraint.availableHeight,
      });
      measured.set(child, box);
      return box;
    },
  };
  const collect = () =>
    collectInlineItems(node.children, style, base, env, { firstLetter: node.firstLetter });
  const strut = lineHeightOf(style, ctx.config.lineHeightRatio);
  const floatDrop = {
    maxIterations: ctx.config.floatDropMaxIterations,
    maxDescent: ctx.config.floatDropMaxDescent,
  };

  const rootChildren: Box[] = [];
  const frames: InlineFrame[] = [];
  const lineBoxes: LineBox[] = [];
  const target = (): Box[] => frames[frames.length - 1]?.children ?? rootChildren;
  const extendAll = (fragment: Fragment, band: LineBand) => {
    for (const frame of frames) extendFrame(frame, fragment, band);
  };

  let cursor = content.y;
  let pending: number[] = [];
  let offset = 0;

  for (;;) {
    const start = offset;
    const result = runInlinePipeline({
      collect: () => collect().slice(start),
      constraint: base.withExclusionSpace(ctx.floats.exclusionSpaceFor(container)),
      startY: cursor + collapseMarginList(pending),
      originX: content.x,
      strut,
      maxAttempts: ctx.config.maxInlineAttempts,
      floatDrop,
    });
    reportPipeline(ctx, node, result);

    const block = result.fragments.find(isBlockChildFragment);
    const stopLine = block === undefined ? result.lineGeometry.length : block.lineIndex;
    const consumed = result.fragments
      .filter((f) => f.lineIndex < stopLine)
      .sort((a, b) => a.itemIndex - b.itemIndex);

    for (const fragment of consumed) {
      const band = bandOf(result, fragment);
      const item = fragment.item;
      switch (item.kind) {
        case "text":
          extendAll(fragment, band);
          target().push(
            textBox(item.node, item.style, fragment.text ?? item.text, {
              x: fragment.x,
              y: fragment.y,
              width: fragment.width,
              height: fragment.height,
            }),
          );
          break;
        case "atomic":
          extendAll(fragment, band);
          if (fragment.box) target().push(fragment.box);
          break;
        case "control":
          extendAll(fragment, band);
          break;
        case "float":
          if (!fragment.box) break;
          ctx.floats.add({
            box: fragment.box,
            side: item.side,
            rect: { x: fragment.x, y: fragment.y, width: fragment.width, height: fragment.height },
          });
          target().push(fragment.box);
          break;
        case "out-of-flow":
          (item.style.position === "fixed" ? ctx.fixed : input.absolutes).push({
            node: item.node,
            style: item.style,
            staticX: fragment.x,
            staticY: fragment.y,
          });
          break;
        case "open-tag":
          extendAll(fragment, band);
          frames.push({
            item,
            children: [],
            regions: [],
            current: {
              startX: fragment.x,
              endX: fragment.x + fragment.width,
              lineIndex: fragment.lineIndex,
              y: band.y,
              height: band.height,
              hasLeft: true,
              hasRight: false,
            },
          });
          break;
        case "close-tag": {
          const frame = frames.pop();
          if (!frame) break;
          extendFrame(frame, fragment, band);
          if (frame.current) frame.current.hasRight = true;
          closeRegion(frame);
          target().push(inlineBoxOf(frame, content.width, input.cbHeight));
          extendAll(fragment, band);
          break;
        }
        case "block-child":
          break;
      }
    }

    let sawContent = false;
    for (let i = 0; i < stopLine; i++) {
      const line = result.lineGeometry[i];
      if (!line || !line.hasContent) continue;
      sawContent = true;
      lineBoxes.push({ y: line.y, height: line.height, left: line.left, right: line.right });
      cursor = Math.max(cursor, line.y + line.height);
    }
    if (sawContent) pending = [];

    if (block === undefined) break;

    for (const frame of frames) closeRegion(frame);
    const child = block.item;
    const collapsing = collapsesWithSiblings(child.style);
    const topMargins = collapsing
      ? effectiveTopMargins(ctx.styleOf, child.node, child.style, content.width)
      : [];
    let borderTop = cursor + collapseMarginList([...pending, ...topMargins]);
    if (!collapsing) borderTop += resolveLengthAuto(child.style.marginTop, content.width) ?? 0;
    if (child.style.clear !== "none") borderTop = ctx.floats.clearance(child.style.clear, borderTop);
    const { laid, y: top } = ops.layoutInFlow(ctx, {
      node: child.node,
      style: child.style,
      cb,
      y: borderTop,
      absolutes: input.absolutes,
    });
    target().push(laid.box);
    if (laid.collapsedThrough) {
      pending = [...pending, ...topMargins, ...laid.marginBottom];
    } else if (collapsing) {
      cursor = top + borderBoxHeight(laid.box);
      pending = [...laid.marginBottom];
    } else {
      cursor = top + borderBoxHeight(laid.box) + collapseMarginList(laid.marginBottom);
      pending = [];
    }
    offset = start + block.itemIndex + 1;
  }

  return {
    children: Object.freeze(rootChildren),
    contentBottom: cursor + collapseMarginList(pending),
    marginBottom: [],
    lineBoxes: lineBoxes.length > 0 ? Object.freeze(lineBoxes) : null,
  };
}

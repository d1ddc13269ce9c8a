/**
 * packages/core/src/layout/flow.ts — Block boxes and block formatting.
 *
 * Why: Every box is placed exactly once at its final border-box Y. The caller
 * collapses the margins above a child (including the ones that reach it from
 * its first descendants, via `effectiveTopMargins`) before laying it out, and
 * the child reports the margins still open at its bottom. Subtrees that must be
 * sized before their position is known (floats, atomic inlines, absolutes) are
 * laid out detached at the origin and re-emitted with `translateBox`.
 *
 * Float placement mutates the context's float manager; opening a formatting
 * context always goes through `FloatManager.withFormattingContext`. Fixed boxes
 * queue on the context for the whole layout; those recorded inside a detached
 * subtree are anchored to its root.
 */

import { warnLayoutIssue } from "../diagnostics.js";
import { type ElementNode, describeNode } from "../document/types.js";
import type { ComputedStyle } from "../style/types.js";
import {
  type Box,
  type ImagePayload,
  NO_BOXES,
  borderBoxHeight,
  marginBoxRect,
  paddingBoxRect,
  translateBox,
} from "./box.js";
import {
  clampHeight,
  clampWidth,
  establishesFormattingContext,
  isFloated,
  isOutOfFlow,
  isReplaced,
  isShrinkToFit,
  relativeOffset,
  resolveDisplay,
  resolveEdges,
  resolveLengthAgainst,
  resolveLengthAuto,
  resolveSpecifiedHeight,
} from "./boxModel.js";
import type { AbsoluteQueue, LayoutContext } from "./context.js";
import type {
  BlockInput,
  BlockResult,
  ContainingBlock,
  ContentInput,
  ContentResult,
  DetachedSizing,
  FlowOps,
  InFlowResult,
} from "./flowTypes.js";
import { type Size, edges, horizontal } from "./geometry.js";
import { resolveNaturalImageSize } from "./images.js";
import { layoutInlineContent } from "./inlineFlow.js";
import { intrinsicContentSizes } from "./intrinsic.js";
import { collapseMarginList } from "./margins.js";
import {
  collapsesThrough,
  collapsesWithFirstChild,
  collapsesWithLastChild,
  collapsesWithSiblings,
  effectiveTopMargins,
  hasInlineContent,
} from "./marginChain.js";
import { layoutAbsolute } from "./positioning.js";

type ReplacedContent = Readonly<{ size: Size; image: ImagePayload }>;

function replacedContent(
  ctx: LayoutContext,
  node: ElementNode,
  style: ComputedStyle,
  cb: ContainingBlock,
): ReplacedContent {
  const natural = resolveNaturalImageSize(
    node,
    ctx.config.imageSize,
    ctx.config.placeholderImageSize,
  );
  const src = node.attrs["src"] ?? "";
  if (natural.failure !== null) {
    const label = describeNode(node);
    warnLayoutIssue(
      ctx.diagnostics,
      `image-failed:${label}:${src}`,
      `image size lookup for <${label}> "${src}" failed: ${natural.failure}`,
    );
  }
  if (natural.fallback) {
    const label = describeNode(node);
    warnLayoutIssue(
      ctx.diagnostics,
      `image:${label}:${src}`,
      `no size known for <${label}> "${src}"; using ${natural.size.width}x${natural.size.height} placeholder`,
    );
  }
  const image = { src, fallback: natural.fallback };
  const w = resolveLengthAuto(style.width, cb.width);
  const h = resolveLengthAgainst(style.height, cb.height);
  const nat = natural.size;
  if (w !== null && h !== null) return { size: { width: w, height: h }, image };
  if (w !== null) {
    return { size: { width: w, height: nat.width > 0 ? (w * nat.height) / nat.width : nat.height }, image };
  }
  if (h !== null) {
    return { size: { width: nat.height > 0 ? (h * nat.width) / nat.height : nat.width, height: h }, image };
  }
  return { size: nat, image };
}

/**
 * Place a float from block flow with its margin-box top at `y` (or lower, after
 * clearance and the drop search), register it and return its final box.
 */
function placeFloat(
  ctx: LayoutContext,
  node: ElementNode,
  style: ComputedStyle,
  cb: ContainingBlock,
  y: number,
): Box {
  const box = layoutDetached(ctx, node, style, cb);
  const outer = marginBoxRect(box);
  const width = Math.max(0, outer.width);
  const height = Math.max(0, outer.height);
  const side = style.float === "right" ? "right" : "left";
  const container = { left: cb.x, width: cb.width };

  const drop = ctx.floats.dropY(side, width, height, ctx.floats.clearance(style.clear, y), container, {
    maxIterations: ctx.config.floatDropMaxIterations,
    maxDescent: ctx.config.floatDropMaxDescent,
  });
  if (drop.gaveUp) {
    const label = describeNode(node);
    warnLayoutIssue(
      ctx.diagnostics,
      `float-drop:${label}`,
      `float drop search gave up for <${label}>; float left at y=${drop.y}`,
    );
  }
  const offsets = ctx.floats.offsets(drop.y, height, container);
  const x = side === "left" ? cb.x + offsets.left : cb.x + cb.width - offsets.right - width;
  const placed = translateBox(box, x, drop.y);
  ctx.floats.add({ box: placed, side, rect: { x, y: drop.y, width, height } });
  return placed;
}

function layoutBlockChildren(ctx: LayoutContext, input: ContentInput): ContentResult {
  const { node, style, content } = input;
  const cb: ContainingBlock = { x: content.x, y: content.y, width: content.width, height: input.cbHeight };
  const children: Box[] = [];
  let cursor = content.y;
  let pending: number[] = [];
  let absorbing = input.absorbTop;

  for (const child of node.children) {
    if (child.kind === "text") continue;
    const childStyle = ctx.styleOf(child, style);
    if (resolveDisplay(childStyle) === "none") continue;
    const hereY = absorbing ? cursor : cursor + collapseMarginList(pending);

    if (isOutOfFlow(childStyle)) {
      (childStyle.position === "fixed" ? ctx.fixed : input.absolutes).push({
        node: child,
        style: childStyle,
        staticX: cb.x,
        staticY: hereY,
      });
      continue;
    }
    if (isFloated(childStyle)) {
      children.push(placeFloat(ctx, child, childStyle, cb, hereY));
      continue;
    }

    if (childStyle.clear !== "none") absorbing = false;
    const collapsing = collapsesWithSiblings(childStyle);
    const topMargins =
      absorbing || !collapsing ? [] : effectiveTopMargins(ctx.styleOf, child, childStyle, cb.width);
    let borderTop = absorbing ? cursor : cursor + collapseMarginList([...pending, ...topMargins]);
    if (!collapsing) borderTop += resolveLengthAuto(childStyle.marginTop, cb.width) ?? 0;
    if (childStyle.clear !== "none") {
      const cleared = ctx.floats.clearance(childStyle.clear, borderTop);
      if (cleared > borderTop) {
        borderTop = cleared;
        pending = [];
      }
    }

    const { laid, y: top } = layoutInFlow(ctx, {
      node: child,
      style: childStyle,
      cb,
      y: borderTop,
      absolutes: input.absolutes,
    });
    children.push(laid.box);
    if (laid.collapsedThrough) {
      if (!absorbing) pending = [...pending, ...topMargins, ...laid.marginBottom];
      continue;
    }
    absorbing = false;
    cursor = top + borderBoxHeight(laid.box);
    if (collapsing) {
      pending = [...laid.marginBottom];
    } else {
      cursor += collapseMarginList(laid.marginBottom);
      pending = [];
    }
  }

  if (input.escapeBottom) {
    return { children, contentBottom: cursor, marginBottom: pending, lineBoxes: null };
  }
  return {
    children,
    contentBottom: cursor + collapseMarginList(pending),
    marginBottom: [],
    lineBoxes: null,
  };
}

function layoutContents(ctx: LayoutContext, input: ContentInput): ContentResult {
  if (hasInlineContent(ctx.styleOf, input.node.children, input.style)) {
    return layoutInlineContent(ctx, input, FLOW_OPS);
  }
  return layoutBlockChildren(ctx, input);
}

function contentWidthOf(
  ctx: LayoutContext,
  input: BlockInput,
  shrinkToFit: boolean,
  replaced: ReplacedContent | null,
  fill: number,
): number {
  if (input.forcedWidth !== undefined) return input.forcedWidth;
  if (replaced !== null) return replaced.size.width;
  const specified = resolveLengthAuto(input.style.width, input.cb.width);
  if (specified !== null) return specified;
  if (!shrinkToFit) return fill;
  const sizes = intrinsicContentSizes(ctx.intrinsic, input.node, input.style);
  return Math.min(Math.max(sizes.minContent, fill), sizes.maxContent);
}

/**
 * Lay out a block-level box with its border-box top at `input.y` (plus any
 * relative offset) and everything inside it.
 */
export function layoutBlock(ctx: LayoutContext, input: BlockInput): BlockResult {
  const { node, style, cb } = input;
  const display = resolveDisplay(style);
  const resolved = resolveEdges(style, cb.width);
  const { border, padding } = resolved;
  const shrinkToFit = isShrinkToFit(style, display);
  const replaced = isReplaced(node) ? replacedContent(ctx, node, style, cb) : null;

  let marginLeft = resolved.margin.left;
  let marginRight = resolved.margin.right;
  const edgesX = horizontal(border) + horizontal(padding);
  const fill = Math.max(0, cb.width - marginLeft - marginRight - edgesX);
  const width = clampWidth(contentWidthOf(ctx, input, shrinkToFit, replaced, fill), style, cb.width);

  if (!shrinkToFit && (resolved.autoMarginLeft || resolved.autoMarginRight)) {
    const free = Math.max(0, cb.width - width - edgesX - marginLeft - marginRight);
    if (resolved.autoMarginLeft && resolved.autoMarginRight) {
      marginLeft += free / 2;
      marginRight += free / 2;
    } else if (resolved.autoMarginLeft) {
      marginLeft += free;
    } else {
      marginRight += free;
    }
  }
  const margin = edges(resolved.margin.top, marginRight, resolved.margin.bottom, marginLeft);

  const rel = relativeOffset(style, cb.width, cb.height);
  const x = cb.x + marginLeft + rel.x;
  const y = input.y + rel.y;

  const specifiedHeight =
    input.forcedHeight ?? (replaced !== null ? replaced.size.height : resolveSpecifiedHeight(style, cb.height));
  const definiteHeight = specifiedHeight === null ? null : clampHeight(specifiedHeight, style, cb.height);

  const detached = input.detached === true;
  const positioned = style.position !== "static" || detached;
  const absolutes: AbsoluteQueue = positioned ? [] : input.absolutes;
  const fixedStart = ctx.fixed.length;
  const formattingRoot =
    establishesFormattingContext(style, display) || detached || input.root === true;

  const contentInput: ContentInput = {
    node,
    style,
    content: { x: x + border.left + padding.left, y: y + border.top + padding.top, width },
    cbHeight: definiteHeight,
    absolutes,
    absorbTop: !formattingRoot && collapsesWithFirstChild(node, style),
    escapeBottom: !formattingRoot && collapsesWithLastChild(node, style),
  };
  const contentY = contentInput.content.y;
  const flowed =
    replaced !== null
      ? {
          contents: { children: NO_BOXES, contentBottom: contentY, marginBottom: [], lineBoxes: null },
          floatBottom: null,
        }
      : formattingRoot
        ? ctx.floats.withFormattingContext(() => ({
            contents: layoutContents(ctx, contentInput),
            floatBottom: ctx.floats.lowestBottom(),
          }))
        : { contents: layoutContents(ctx, contentInput), floatBottom: null };

  const autoHeight = Math.max(
    0,
    flowed.contents.contentBottom - contentY,
    flowed.floatBottom === null ? 0 : flowed.floatBottom - contentY,
  );
  const height = definiteHeight ?? clampHeight(autoHeight, style, cb.height);

  let box: Box = {
    node,
    style,
    kind: replaced !== null ? "replaced" : display === "inline-block" ? "inline-block" : "block",
    x,
    y,
    width,
    height,
    margin,
    border,
    padding,
    position: style.position,
    float: style.float,
    zIndex: style.zIndex,
    children: Object.freeze([...flowed.contents.children]),
    ...(flowed.contents.lineBoxes === null ? {} : { lineBoxes: flowed.contents.lineBoxes }),
    ...(replaced === null ? {} : { image: replaced.image }),
  };

  if (positioned && absolutes.length > 0) {
    const containing = paddingBoxRect(box);
    const placed: Box[] = [];
    for (let i = 0; i < absolutes.length; i++) {
      const pending = absolutes[i];
      if (pending) placed.push(layoutAbsolute(ctx, pending, containing, FLOW_OPS));
    }
    box = { ...box, children: Object.freeze([...box.children, ...placed]) };
  }

  if (detached) anchorFixed(ctx, fixedStart, box);

  const collapsedThrough = height === 0 && !formattingRoot && collapsesThrough(ctx.styleOf, node, style);
  return {
    box,
    marginBottom: [margin.bottom, ...(contentInput.escapeBottom ? flowed.contents.marginBottom : [])],
    collapsedThrough,
  };
}

/**
 * Tie the static positions of fixed boxes queued while laying out a detached
 * root to that root, so they follow it when it is translated into place.
 */
function anchorFixed(ctx: LayoutContext, start: number, root: Box): void {
  if (root.node === null || root.node.kind !== "element") return;
  const anchor = { node: root.node, x: root.x, y: root.y };
  for (let i = start; i < ctx.fixed.length; i++) {
    const pending = ctx.fixed[i];
    if (pending && pending.anchor === undefined) ctx.fixed[i] = { ...pending, anchor };
  }
}

/**
 * Lay out an in-flow block at `input.y`. A formatting context root that meets
 * floats is laid out in the space between them, and moved down past float
 * bottoms while its margin box does not fit there.
 */
export function layoutInFlow(ctx: LayoutContext, input: BlockInput): InFlowResult {
  const { style, cb } = input;
  if (!establishesFormattingContext(style, resolveDisplay(style)) || ctx.floats.lowestBottom() === null) {
    return { laid: layoutBlock(ctx, input), y: input.y };
  }

  const container = { left: cb.x, width: cb.width };
  const absolutesStart = input.absolutes.length;
  const fixedStart = ctx.fixed.length;
  const { floatDropMaxIterations, floatDropMaxDescent } = ctx.config;
  let top = input.y;
  let band = 0;
  for (let iter = 0; iter < floatDropMaxIterations && top - input.y <= floatDropMaxDescent; iter++) {
    input.absolutes.length = absolutesStart;
    ctx.fixed.length = fixedStart;
    const offsets = ctx.floats.offsets(top, band, container);
    const width = Math.max(0, cb.width - offsets.left - offsets.right);
    const laid = layoutBlock(ctx, { ...input, cb: { ...cb, x: cb.x + offsets.left, width }, y: top });
    const height = borderBoxHeight(laid.box);

    const intruded = offsets.left > 0 || offsets.right > 0;
    if (intruded && (width <= 0 || marginBoxRect(laid.box).width > width)) {
      const next = ctx.floats.nextBottom(top, band);
      if (next === null) return { laid, y: top };
      top = next;
      band = 0;
      continue;
    }
    const reach = Math.max(band, height);
    const settled = ctx.floats.offsets(top, reach, container);
    if (settled.left === offsets.left && settled.right === offsets.right) return { laid, y: top };
    band = reach;
  }

  const label = describeNode(input.node);
  warnLayoutIssue(
    ctx.diagnostics,
    `float-avoid:${label}`,
    `float avoidance gave up for <${label}>; box left at y=${input.y}`,
  );
  input.absolutes.length = absolutesStart;
  ctx.fixed.length = fixedStart;
  return { laid: layoutBlock(ctx, input), y: input.y };
}

/**
 * Lay out `node` in its own formatting context with its margin box at (0, 0).
 * The caller positions the result with `translateBox`.
 */
export function layoutDetached(
  ctx: LayoutContext,
  node: ElementNode,
  style: ComputedStyle,
  cb: ContainingBlock,
  sizing: DetachedSizing = {},
): Box {
  const laid = layoutBlock(ctx, {
    node,
    style,
    cb: { x: 0, y: 0, width: cb.width, height: cb.height },
    y: resolveLengthAuto(style.marginTop, cb.width) ?? 0,
    absolutes: [],
    detached: true,
    ...sizing,
  });
  return laid.box;
}

export const FLOW_OPS: FlowOps = Object.freeze({ layoutBlock, layoutInFlow, layoutDetached });

/**
 * packages/core/src/engine.ts — Layout engine entry points.
 *
 * Why: The engine is only configuration. Each call builds a fresh
 * `LayoutContext` (float manager, warning dedupe, absolute queues), so calls
 * are independent and the engine can be shared freely.
 */

import { type LayoutConfig, type ResolvedLayoutConfig, resolveLayoutConfig } from "./config.js";
import type { DocNode, ElementNode } from "./document/types.js";
import { BoxflowError } from "./errors.js";
import { type Box, buildParentIndex, walkBoxes } from "./layout/box.js";
import { resolveLengthAuto } from "./layout/boxModel.js";
import { type AbsoluteQueue, type LayoutContext, createLayoutContext } from "./layout/context.js";
import { FLOW_OPS, layoutBlock } from "./layout/flow.js";
import type { ContainingBlock } from "./layout/flowTypes.js";
import type { IntrinsicSizes, Rect } from "./layout/geometry.js";
import { intrinsicSizes } from "./layout/intrinsic.js";
import { layoutAbsolute } from "./layout/positioning.js";
import { initialStyleWithFontSize } from "./style/initial.js";
import type { ComputedStyle } from "./style/types.js";

export type LayoutOptions = Readonly<{
  viewportWidth?: number;
  viewportHeight?: number;
}>;

export type LayoutNodeOptions = Readonly<{
  availableWidth: number;
  /** Definite containing block height; omitted or `null` when indefinite. */
  availableHeight?: number | null;
  /** Containing block origin. Default (0, 0). */
  x?: number;
  y?: number;
  /** Computed style of the containing block. Default: the initial style. */
  parent?: ComputedStyle;
}>;

export type LayoutOutput = Readonly<{
  root: Box;
  /** Parent box, or `null` for the root and for boxes not in this output. */
  parentOf: (box: Box) => Box | null;
  /** Every box, pre-order. */
  boxes: () => readonly Box[];
}>;

export type LayoutEngine = Readonly<{
  config: ResolvedLayoutConfig;
  layout: (root: DocNode, opts?: LayoutOptions) => LayoutOutput;
  layoutNode: (node: DocNode, opts: LayoutNodeOptions) => LayoutOutput;
  /** Border-box min-/max-content contributions; places nothing. */
  intrinsicSizes: (node: DocNode, parentStyle?: ComputedStyle) => IntrinsicSizes;
}>;

function invalidArgument(detail: string): never {
  throw new BoxflowError("BOXFLOW_INVALID_ARGUMENT", detail);
}

function requireElement(entry: string, node: DocNode): ElementNode {
  if (typeof node !== "object" || node === null || node.kind !== "element") {
    invalidArgument(`${entry}: expected an element node`);
  }
  return node;
}

function requireLength(entry: string, name: string, v: number | undefined, fallback: number): number {
  if (v === undefined) return fallback;
  if (!Number.isFinite(v) || v < 0) invalidArgument(`${entry}: ${name} must be a non-negative finite number`);
  return v;
}

function requireCoordinate(entry: string, name: string, v: number | undefined): number {
  if (v === undefined) return 0;
  if (!Number.isFinite(v)) invalidArgument(`${entry}: ${name} must be a finite number`);
  return v;
}

function outputOf(root: Box): LayoutOutput {
  const parents = buildParentIndex(root);
  return Object.freeze({
    root,
    parentOf: (box: Box) => parents.get(box) ?? null,
    boxes: () => {
      const out: Box[] = [];
      walkBoxes(root, (box) => {
        out.push(box);
      });
      return Object.freeze(out);
    },
  });
}

/**
 * Fixed boxes in queue order, each against the viewport. A static position
 * recorded inside a detached subtree is shifted by however far that subtree's
 * root moved after it was recorded.
 */
function placeFixed(ctx: LayoutContext, laidOut: readonly Box[]): Box[] {
  const byNode = new Map<DocNode, Box>();
  const index = (box: Box) =>
    walkBoxes(box, (b) => {
      if (b.node !== null && !byNode.has(b.node)) byNode.set(b.node, b);
    });
  for (const box of laidOut) index(box);

  const placed: Box[] = [];
  for (let i = 0; i < ctx.fixed.length; i++) {
    const pending = ctx.fixed[i];
    if (!pending) continue;
    const moved = pending.anchor === undefined ? undefined : byNode.get(pending.anchor.node);
    const shifted =
      pending.anchor === undefined || moved === undefined
        ? pending
        : {
            ...pending,
            staticX: pending.staticX + moved.x - pending.anchor.x,
            staticY: pending.staticY + moved.y - pending.anchor.y,
          };
    const box = layoutAbsolute(ctx, shifted, ctx.viewport, FLOW_OPS);
    index(box);
    placed.push(box);
  }
  return placed;
}

/**
 * Lay out `node` as the root of a formatting context inside `cb`. Absolute
 * boxes without a positioned ancestor use `initial`; fixed boxes use the
 * viewport.
 */
function layoutRoot(
  ctx: LayoutContext,
  node: ElementNode,
  parent: ComputedStyle,
  cb: ContainingBlock,
  initial: Rect,
): Box {
  const style = ctx.styleOf(node, parent);
  const absolutes: AbsoluteQueue = [];
  const laid = ctx.floats.withFormattingContext(() =>
    layoutBlock(ctx, {
      node,
      style,
      cb,
      y: cb.y + (resolveLengthAuto(style.marginTop, cb.width) ?? 0),
      absolutes,
      root: true,
    }),
  );
  if (absolutes.length === 0 && ctx.fixed.length === 0) return laid.box;
  const positioned = absolutes.map((p) => layoutAbsolute(ctx, p, initial, FLOW_OPS));
  const placed = [...positioned, ...placeFixed(ctx, [laid.box, ...positioned])];
  return { ...laid.box, children: Object.freeze([...laid.box.children, ...placed]) };
}

export function createLayoutEngine(config?: LayoutConfig): LayoutEngine {
  const resolved = resolveLayoutConfig(config);
  const rootParent = initialStyleWithFontSize(resolved.defaultFontSize);

  return Object.freeze({
    config: resolved,

    layout(root: DocNode, opts: LayoutOptions = {}): LayoutOutput {
      const element = requireElement("layout", root);
      const width = requireLength("layout", "viewportWidth", opts.viewportWidth, resolved.viewportWidth);
      const height = requireLength("layout", "viewportHeight", opts.viewportHeight, resolved.viewportHeight);
      const ctx = createLayoutContext(resolved, width, height);
      const cb = { x: 0, y: 0, width, height };
      return outputOf(layoutRoot(ctx, element, rootParent, cb, ctx.viewport));
    },

    layoutNode(node: DocNode, opts: LayoutNodeOptions): LayoutOutput {
      const element = requireElement("layoutNode", node);
      const width = requireLength("layoutNode", "availableWidth", opts.availableWidth, 0);
      const height =
        opts.availableHeight === undefined || opts.availableHeight === null
          ? null
          : requireLength("layoutNode", "availableHeight", opts.availableHeight, 0);
      const x = requireCoordinate("layoutNode", "x", opts.x);
      const y = requireCoordinate("layoutNode", "y", opts.y);
      const ctx = createLayoutContext(resolved, resolved.viewportWidth, resolved.viewportHeight);
      const cb: ContainingBlock = { x, y, width, height };
      const initial: Rect = { x, y, width, height: height ?? 0 };
      return outputOf(layoutRoot(ctx, element, opts.parent ?? rootParent, cb, initial));
    },

    intrinsicSizes(node: DocNode, parentStyle?: ComputedStyle): IntrinsicSizes {
      if (typeof node !== "object" || node === null) invalidArgument("intrinsicSizes: expected a node");
      const ctx = createLayoutContext(resolved, resolved.viewportWidth, resolved.viewportHeight);
      return intrinsicSizes(ctx.intrinsic, node, parentStyle ?? rootParent);
    },
  });
}

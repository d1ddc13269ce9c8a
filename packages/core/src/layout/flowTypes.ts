/**
 * packages/core/src/layout/flowTypes.ts — Contracts between the flow builders.
 *
 * Block flow, inline flow and absolute positioning call into each other. Each
 * receives the others through `FlowOps` instead of importing them, so every
 * module can be exercised with a stubbed partner.
 */

import type { ElementNode } from "../document/types.js";
import type { ComputedStyle } from "../style/types.js";
import type { Box, LineBox } from "./box.js";
import type { AbsoluteQueue, LayoutContext } from "./context.js";

export type ContainingBlock = Readonly<{
  /** Content-box origin. */
  x: number;
  y: number;
  width: number;
  /** `null` when the height is not yet known. */
  height: number | null;
}>;

export type BlockInput = Readonly<{
  node: ElementNode;
  style: ComputedStyle;
  cb: ContainingBlock;
  /** Final border-box top in flow, margins already collapsed by the caller. */
  y: number;
  /** Queue of the nearest positioned ancestor. */
  absolutes: AbsoluteQueue;
  /** Used content width, bypassing width resolution. */
  forcedWidth?: number;
  /** Used content height, bypassing height resolution. */
  forcedHeight?: number;
  /**
   * Laid out in isolation (float, atomic inline, absolute box): the box opens
   * its own formatting context and positions its out-of-flow descendants.
   */
  detached?: boolean;
  /** Document root: a formatting context root, but not a containing block. */
  root?: boolean;
}>;

export type BlockResult = Readonly<{
  box: Box;
  /** Margins adjoining the bottom edge, still to be collapsed with what follows. */
  marginBottom: readonly number[];
  /** Top and bottom margins adjoin; the box takes no block space. */
  collapsedThrough: boolean;
}>;

/** An in-flow block and the border-box top it was finally placed at. */
export type InFlowResult = Readonly<{ laid: BlockResult; y: number }>;

export type ContentInput = Readonly<{
  node: ElementNode;
  style: ComputedStyle;
  content: Readonly<{ x: number; y: number; width: number }>;
  cbHeight: number | null;
  absolutes: AbsoluteQueue;
  /** Leading child margins were already collapsed into the container's top margin. */
  absorbTop: boolean;
  /** Trailing child margins escape through the container's bottom. */
  escapeBottom: boolean;
}>;

export type ContentResult = Readonly<{
  children: readonly Box[];
  /** Absolute Y where in-flow content ends (collapsed margins included unless they escape). */
  contentBottom: number;
  /** Escaping trailing margins (only when `escapeBottom`). */
  marginBottom: readonly number[];
  lineBoxes: readonly LineBox[] | null;
}>;

export type DetachedSizing = Readonly<{ forcedWidth?: number; forcedHeight?: number }>;

export type FlowOps = Readonly<{
  layoutBlock: (ctx: LayoutContext, input: BlockInput) => BlockResult;
  /**
   * `layoutBlock` for an in-flow child at `input.y`. A box that opens a
   * formatting context is narrowed or moved down to stay clear of floats.
   */
  layoutInFlow: (ctx: LayoutContext, input: BlockInput) => InFlowResult;
  /** Lay out in isolation with the margin box at (0, 0). */
  layoutDetached: (
    ctx: LayoutContext,
    node: ElementNode,
    style: ComputedStyle,
    cb: ContainingBlock,
    sizing?: DetachedSizing,
  ) => Box;
}>;

/**
 * packages/core/src/layout/inline/items.ts — Inline pipeline data types.
 *
 * Items are the flattened content of an inline formatting context, lines group
 * items, and fragments are the positioned output. All three are immutable once
 * created; a fragment's position is final when it is constructed.
 */

import type { ElementNode, TextNode } from "../../document/types.js";
import type { ComputedStyle } from "../../style/types.js";
import type { Box } from "../box.js";
import type { ConstraintSpace } from "../constraintSpace.js";
import type { BoxEdges } from "../geometry.js";

type ItemBase = Readonly<{
  style: ComputedStyle;
  /** Inline advance. For atomics and floats, the margin-box width. */
  width: number;
  /** For atomics and floats, the margin-box height. */
  height: number;
}>;

export type TextItem = ItemBase &
  Readonly<{
    kind: "text";
    node: TextNode;
    text: string;
    /** Width of trailing collapsible space; allowed to overflow the line. */
    hangingWidth: number;
    whitespaceOnly: boolean;
    /** No break opportunity between this item and the next content item. */
    noBreakAfter: boolean;
  }>;

export type OpenTagItem = ItemBase &
  Readonly<{
    kind: "open-tag";
    node: ElementNode;
    margin: BoxEdges;
    border: BoxEdges;
    padding: BoxEdges;
  }>;

export type CloseTagItem = ItemBase &
  Readonly<{
    kind: "close-tag";
    node: ElementNode;
  }>;

/** Inline-block or replaced element, laid out as one unbreakable unit. */
export type AtomicItem = ItemBase &
  Readonly<{
    kind: "atomic";
    node: ElementNode;
    /** Laid out with its margin box at (0, 0). */
    box: Box;
  }>;

export type FloatItem = ItemBase &
  Readonly<{
    kind: "float";
    node: ElementNode;
    side: "left" | "right";
    /** Laid out with its margin box at (0, 0). */
    box: Box;
  }>;

/** Forced line break. */
export type ControlItem = ItemBase &
  Readonly<{
    kind: "control";
    node: ElementNode;
  }>;

/** Block-level child; laid out one level up, between lines. */
export type BlockChildItem = ItemBase &
  Readonly<{
    kind: "block-child";
    node: ElementNode;
  }>;

/** Absolutely or fixed positioned child; only its static position is recorded. */
export type OutOfFlowItem = ItemBase &
  Readonly<{
    kind: "out-of-flow";
    node: ElementNode;
  }>;

export type InlineItem =
  | TextItem
  | OpenTagItem
  | CloseTagItem
  | AtomicItem
  | FloatItem
  | ControlItem
  | BlockChildItem
  | OutOfFlowItem;

export type InlineItemKind = InlineItem["kind"];

export type LineInfo = Readonly<{
  y: number;
  items: readonly InlineItem[];
  /** Index of `items[0]` in the item list the line was broken from. */
  startIndex: number;
  /** Constraint the breaker measured this line against. */
  constraint: ConstraintSpace;
  height: number;
  /** True when the line holds text, atomics or a forced break. */
  hasContent: boolean;
}>;

export type Fragment = Readonly<{
  kind: InlineItemKind;
  item: InlineItem;
  itemIndex: number;
  lineIndex: number;
  x: number;
  y: number;
  width: number;
  height: number;
  /** Text payload for text fragments. */
  text?: string;
  /** Final-position box for atomic and float fragments. */
  box?: Box;
}>;

/** A constructed line in absolute coordinates. */
export type LineGeometry = Readonly<{
  y: number;
  height: number;
  left: number;
  right: number;
  hasContent: boolean;
}>;

/** Whether an item takes part in line height and content tests. */
export function isInFlowContent(item: InlineItem): boolean {
  return item.kind === "text" || item.kind === "atomic" || item.kind === "control";
}

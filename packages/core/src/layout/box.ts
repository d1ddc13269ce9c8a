/**
 * packages/core/src/layout/box.ts — Layout output tree.
 *
 * Why: A Box is the positioned, sized rectangle handed to painting. Boxes are
 * immutable once returned: a subtree laid out at a provisional origin is
 * re-emitted at its final origin through `translateBox`, which builds new
 * records rather than patching positions in place.
 *
 * Geometry: `x`/`y` is the border-box origin; `width`/`height` is the content
 * size. Parent links live in `LayoutOutput.parentOf`, not on the box.
 */

import type { DocNode } from "../document/types.js";
import type { ComputedStyle, FloatSide, PositionScheme } from "../style/types.js";
import {
  type BoxEdges,
  type Rect,
  ZERO_EDGES,
  horizontal,
  vertical,
} from "./geometry.js";

export type BoxKind = "block" | "inline" | "inline-block" | "replaced" | "text";

/** Which inline-axis edges (border + padding + margin) a fragment draws. */
export type FragmentEdges = Readonly<{ left: boolean; right: boolean }>;

/** One piece of an inline box split across lines or around a block child. */
export type BoxFragment = Readonly<{
  /** Border-box rect of this piece. */
  rect: Rect;
  edges: FragmentEdges;
}>;

/** One line of an inline formatting context, after float intrusion. */
export type LineBox = Readonly<{
  y: number;
  height: number;
  /** Absolute x of the first usable pixel. */
  left: number;
  /** Absolute x just past the last usable pixel. */
  right: number;
}>;

export type ImagePayload = Readonly<{ src: string; fallback: boolean }>;

export type Box = Readonly<{
  node: DocNode | null;
  style: ComputedStyle;
  kind: BoxKind;
  x: number;
  y: number;
  width: number;
  height: number;
  margin: BoxEdges;
  border: BoxEdges;
  padding: BoxEdges;
  position: PositionScheme;
  float: FloatSide;
  zIndex: number | "auto";
  children: readonly Box[];
  fragments?: readonly BoxFragment[];
  lineBoxes?: readonly LineBox[];
  text?: string;
  image?: ImagePayload;
}>;

export const NO_BOXES: readonly Box[] = Object.freeze([]);

export function borderBoxWidth(box: Box): number {
  return box.width + horizontal(box.padding) + horizontal(box.border);
}

export function borderBoxHeight(box: Box): number {
  return box.height + vertical(box.padding) + vertical(box.border);
}

export function borderBoxRect(box: Box): Rect {
  return { x: box.x, y: box.y, width: borderBoxWidth(box), height: borderBoxHeight(box) };
}

export function paddingBoxRect(box: Box): Rect {
  return {
    x: box.x + box.border.left,
    y: box.y + box.border.top,
    width: box.width + horizontal(box.padding),
    height: box.height + vertical(box.padding),
  };
}

export function contentRect(box: Box): Rect {
  return {
    x: box.x + box.border.left + box.padding.left,
    y: box.y + box.border.top + box.padding.top,
    width: box.width,
    height: box.height,
  };
}

export function marginBoxRect(box: Box): Rect {
  return {
    x: box.x - box.margin.left,
    y: box.y - box.margin.top,
    width: borderBoxWidth(box) + horizontal(box.margin),
    height: borderBoxHeight(box) + vertical(box.margin),
  };
}

function translateRect(r: Rect, dx: number, dy: number): Rect {
  return { x: r.x + dx, y: r.y + dy, width: r.width, height: r.height };
}

/** Re-emit a finalized subtree at an offset. Returns `box` itself when the offset is zero. */
export function translateBox(box: Box, dx: number, dy: number): Box {
  if (dx === 0 && dy === 0) return box;
  const children =
    box.children.length === 0
      ? box.children
      : Object.freeze(box.children.map((child) => translateBox(child, dx, dy)));
  return {
    ...box,
    x: box.x + dx,
    y: box.y + dy,
    children,
    ...(box.fragments === undefined
      ? {}
      : {
          fragments: Object.freeze(
            box.fragments.map((f) => ({ rect: translateRect(f.rect, dx, dy), edges: f.edges })),
          ),
        }),
    ...(box.lineBoxes === undefined
      ? {}
      : {
          lineBoxes: Object.freeze(
            box.lineBoxes.map((l) => ({
              y: l.y + dy,
              height: l.height,
              left: l.left + dx,
              right: l.right + dx,
            })),
          ),
        }),
  };
}

/** Anonymous text-run box. */
export function textBox(
  node: DocNode | null,
  style: ComputedStyle,
  text: string,
  rect: Rect,
): Box {
  return {
    node,
    style,
    kind: "text",
    x: rect.x,
    y: rect.y,
    width: rect.width,
    height: rect.height,
    margin: ZERO_EDGES,
    border: ZERO_EDGES,
    padding: ZERO_EDGES,
    position: "static",
    float: "none",
    zIndex: "auto",
    children: NO_BOXES,
    text,
  };
}

/** Pre-order traversal. */
export function walkBoxes(root: Box, visit: (box: Box, parent: Box | null) => void): void {
  const stack: Array<{ box: Box; parent: Box | null }> = [{ box: root, parent: null }];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) continue;
    visit(entry.box, entry.parent);
    for (let i = entry.box.children.length - 1; i >= 0; i--) {
      const child = entry.box.children[i];
      if (child) stack.push({ box: child, parent: entry.box });
    }
  }
}

/** Parent back-references for a finished tree. */
export function buildParentIndex(root: Box): ReadonlyMap<Box, Box> {
  const parents = new Map<Box, Box>();
  walkBoxes(root, (box, parent) => {
    if (parent) parents.set(box, parent);
  });
  return parents;
}

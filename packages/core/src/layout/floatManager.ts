/**
 * packages/core/src/layout/floatManager.ts — Floats of the current formatting context.
 *
 * Why: Floats placed anywhere inside a block formatting context (BFC) affect
 * every later box in it, but must not escape it. The manager holds the float
 * list plus a stack of base indices, one per open BFC. It lives on the per-call
 * layout context, never on the engine, so separate layouts cannot observe each
 * other. `withFormattingContext` is the only way to open a BFC and always
 * restores the outer state, even when the callback throws.
 *
 * Rects are margin boxes in absolute coordinates.
 */

import type { Clear } from "../style/types.js";
import type { Box } from "./box.js";
import {
  type Exclusion,
  ExclusionSpace,
  type FloatDropLimits,
  type FloatDropResult,
  type InlineOffsets,
  bandsOverlap,
} from "./exclusionSpace.js";
import { type Rect, rectBottom, rectRight } from "./geometry.js";

export type PlacedFloatSide = "left" | "right";

export type FloatInfo = Readonly<{
  box: Box;
  side: PlacedFloatSide;
  /** Margin box, absolute. Height includes (possibly negative) vertical margins. */
  rect: Rect;
}>;

/** Horizontal extent of the container floats are placed in. */
export type FloatContainer = Readonly<{ left: number; width: number }>;

export class FloatManager {
  private readonly floats: FloatInfo[] = [];
  private readonly bases: number[] = [];
  private base = 0;

  /** Floats of the current BFC, in placement order. */
  active(): readonly FloatInfo[] {
    return this.floats.slice(this.base);
  }

  get depth(): number {
    return this.bases.length;
  }

  add(info: FloatInfo): void {
    this.floats.push(info);
  }

  /**
   * Run `fn` inside a new BFC. Floats added inside are discarded when it
   * returns, and queries inside see none of the outer floats.
   */
  withFormattingContext<T>(fn: () => T): T {
    this.bases.push(this.base);
    this.base = this.floats.length;
    try {
      return fn();
    } finally {
      this.floats.length = this.base;
      this.base = this.bases.pop() ?? 0;
    }
  }

  /**
   * Float intrusion into `container` for the band `[y, y + height)`,
   * measured from the container's left and right edges.
   */
  offsets(y: number, height: number, container: FloatContainer): InlineOffsets {
    let left = 0;
    let right = 0;
    const containerRight = container.left + container.width;
    for (let i = this.base; i < this.floats.length; i++) {
      const f = this.floats[i];
      if (!f || !bandsOverlap(f.rect, y, height)) continue;
      if (f.side === "left") {
        left = Math.max(left, rectRight(f.rect) - container.left);
      } else {
        right = Math.max(right, containerRight - f.rect.x);
      }
    }
    return { left, right };
  }

  /** Lowest margin-box bottom of floats on the cleared side(s), or `y` if higher. */
  clearance(clear: Clear, y: number): number {
    if (clear === "none") return y;
    let out = y;
    for (let i = this.base; i < this.floats.length; i++) {
      const f = this.floats[i];
      if (!f) continue;
      if (clear !== "both" && clear !== f.side) continue;
      out = Math.max(out, rectBottom(f.rect));
    }
    return out;
  }

  /**
   * Nearest margin-box bottom below `y` among the floats overlapping the band
   * `[y, y + height)`, or `null` when none does.
   */
  nextBottom(y: number, height: number): number | null {
    let next: number | null = null;
    for (let i = this.base; i < this.floats.length; i++) {
      const f = this.floats[i];
      if (!f || !bandsOverlap(f.rect, y, height)) continue;
      const b = rectBottom(f.rect);
      if (b > y && (next === null || b < next)) next = b;
    }
    return next;
  }

  /** Margin-box bottom of every float in the current BFC, or `null` when there are none. */
  lowestBottom(): number | null {
    let bottom: number | null = null;
    for (let i = this.base; i < this.floats.length; i++) {
      const f = this.floats[i];
      if (!f) continue;
      const b = rectBottom(f.rect);
      if (bottom === null || b > bottom) bottom = b;
    }
    return bottom;
  }

  /**
   * Drop search for a new float in `container`; see `ExclusionSpace.dropY`.
   */
  dropY(
    side: PlacedFloatSide,
    width: number,
    height: number,
    y: number,
    container: FloatContainer,
    limits: FloatDropLimits,
  ): FloatDropResult {
    if (this.floats.length === this.base) return { y, gaveUp: false };
    return this.exclusionSpaceFor(container).dropY(side, width, height, y, container.width, limits);
  }

  /**
   * Snapshot of the current BFC's floats as an exclusion space in the
   * line-relative coordinates of `container`.
   */
  exclusionSpaceFor(container: FloatContainer): ExclusionSpace {
    const out: Exclusion[] = [];
    const containerRight = container.left + container.width;
    for (let i = this.base; i < this.floats.length; i++) {
      const f = this.floats[i];
      if (!f) continue;
      if (f.side === "left") {
        out.push({
          side: "left",
          rect: { x: f.rect.x - container.left, y: f.rect.y, width: f.rect.width, height: f.rect.height },
        });
      } else {
        out.push({
          side: "right",
          rect: {
            x: containerRight - rectRight(f.rect),
            y: f.rect.y,
            width: f.rect.width,
            height: f.rect.height,
          },
        });
      }
    }
    return ExclusionSpace.of(out);
  }
}

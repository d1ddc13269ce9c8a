/**
 * packages/core/src/layout/exclusionSpace.ts — Immutable set of float exclusions.
 *
 * Why: Line breaking and fragment construction must ask "how much inline space
 * do floats take at this band" many times, sometimes against hypothetical float
 * sets during retry. Keeping the set immutable lets every caller hold on to the
 * space it was given while newer spaces grow beside it.
 *
 * Coordinates: `y` is absolute. `x` is line-relative: left exclusions measure it
 * from the container's left content edge, right exclusions from its right
 * content edge, so both sides share the same "outer-most edge" rule.
 */

import type { Rect } from "./geometry.js";

export type ExclusionSide = "left" | "right";

export type Exclusion = Readonly<{
  rect: Rect;
  side: ExclusionSide;
}>;

export type InlineOffsets = Readonly<{ left: number; right: number }>;

export type FloatDropLimits = Readonly<{
  maxIterations: number;
  maxDescent: number;
}>;

export type FloatDropResult = Readonly<{
  y: number;
  /** True when the search hit its bound and fell back to the original Y. */
  gaveUp: boolean;
}>;

const NO_OFFSETS: InlineOffsets = Object.freeze({ left: 0, right: 0 });

/**
 * True when the exclusion's vertical band intrudes into `[y, y + height)`.
 * Touching bands do not overlap. A zero-height query is a point test at `y`.
 */
export function bandsOverlap(rect: Rect, y: number, height: number): boolean {
  if (rect.height <= 0) return false;
  const top = rect.y;
  const bottom = rect.y + rect.height;
  if (height > 0) return top < y + height && bottom > y;
  return top <= y && bottom > y;
}

export class ExclusionSpace {
  static readonly EMPTY = new ExclusionSpace(Object.freeze([]));

  private constructor(private readonly list: readonly Exclusion[]) {}

  static of(exclusions: readonly Exclusion[]): ExclusionSpace {
    if (exclusions.length === 0) return ExclusionSpace.EMPTY;
    return new ExclusionSpace(Object.freeze([...exclusions]));
  }

  get exclusions(): readonly Exclusion[] {
    return this.list;
  }

  get size(): number {
    return this.list.length;
  }

  get isEmpty(): boolean {
    return this.list.length === 0;
  }

  /** Returns a new space containing `exclusion`; the receiver is unchanged. */
  add(exclusion: Exclusion): ExclusionSpace {
    return new ExclusionSpace(Object.freeze([...this.list, exclusion]));
  }

  /**
   * Left and right intrusion for the band `[y, y + height)`: the outer-most
   * edge of the overlapping exclusions on each side.
   */
  availableInlineSize(y: number, height: number): InlineOffsets {
    if (this.list.length === 0) return NO_OFFSETS;
    let left = 0;
    let right = 0;
    for (const exclusion of this.list) {
      if (!bandsOverlap(exclusion.rect, y, height)) continue;
      const edge = exclusion.rect.x + exclusion.rect.width;
      if (exclusion.side === "left") {
        if (edge > left) left = edge;
      } else if (edge > right) {
        right = edge;
      }
    }
    return left === 0 && right === 0 ? NO_OFFSETS : { left, right };
  }

  /**
   * Highest Y at or below `y` where a float of `width`×`height` on `side` fits
   * within `availableWidth`.
   *
   * Only an opposite-side exclusion can force a drop; same-side floats stack
   * horizontally even past the container edge (CSS 2.1 §9.5.1 rule 6 as
   * applied here). Candidates are the bottoms of the exclusions blocking the
   * band. When the bounds run out the original `y` is returned.
   */
  dropY(
    side: ExclusionSide,
    width: number,
    height: number,
    y: number,
    availableWidth: number,
    limits: FloatDropLimits,
  ): FloatDropResult {
    let current = y;
    for (let iter = 0; iter < limits.maxIterations; iter++) {
      if (current - y > limits.maxDescent) break;
      const blocking = this.list.filter((e) => bandsOverlap(e.rect, current, height));
      if (!blocking.some((e) => e.side !== side)) return { y: current, gaveUp: false };

      const { left, right } = this.availableInlineSize(current, height);
      if (left + right + width <= availableWidth) return { y: current, gaveUp: false };

      let next: number | null = null;
      for (const e of blocking) {
        const bottom = e.rect.y + e.rect.height;
        if (bottom > current && (next === null || bottom < next)) next = bottom;
      }
      if (next === null) break;
      current = next;
    }
    return { y, gaveUp: true };
  }

  /** Bottom of the lowest exclusion, or `null` when empty. */
  lowestBottom(): number | null {
    let bottom: number | null = null;
    for (const exclusion of this.list) {
      const b = exclusion.rect.y + exclusion.rect.height;
      if (bottom === null || b > bottom) bottom = b;
    }
    return bottom;
  }
}

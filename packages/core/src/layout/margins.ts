/**
 * packages/core/src/layout/margins.ts — Vertical margin collapsing (CSS 2.1 §8.3.1).
 *
 * Adjoining margins are tracked as lists and collapsed once, when the position
 * they separate is needed: the largest positive margin plus the most negative.
 */

import type { ComputedStyle, Display } from "../style/types.js";

/** Collapse two adjoining margins. */
export function collapseMargins(a: number, b: number): number {
  if (a >= 0 && b >= 0) return Math.max(a, b);
  if (a <= 0 && b <= 0) return Math.min(a, b);
  return a + b;
}

/** Collapse any number of adjoining margins. Empty lists collapse to 0. */
export function collapseMarginList(margins: readonly number[]): number {
  let positive = 0;
  let negative = 0;
  for (const m of margins) {
    if (m > positive) positive = m;
    else if (m < negative) negative = m;
  }
  return positive + negative;
}

/**
 * Whether a box's margins can collapse with its neighbours. Floats,
 * out-of-flow boxes, inline-level boxes, flex containers and boxes with
 * clipped overflow keep their margins.
 */
export function shouldCollapseMargins(style: ComputedStyle, display: Display): boolean {
  if (style.float !== "none") return false;
  if (style.position === "absolute" || style.position === "fixed") return false;
  if (display === "inline-block" || display === "inline" || display === "flex") return false;
  return style.overflow === "visible";
}

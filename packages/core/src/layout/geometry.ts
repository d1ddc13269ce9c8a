/**
 * packages/core/src/layout/geometry.ts — Layout primitive type definitions.
 *
 * Why: Defines the geometric types shared by every layout stage. All values are
 * CSS pixels; coordinates are absolute (document origin at 0,0).
 */

/** Point in document coordinates. */
export type Position = Readonly<{ x: number; y: number }>;

/** Width and height. */
export type Size = Readonly<{ width: number; height: number }>;

/** Rectangle with position and dimensions. */
export type Rect = Readonly<{ x: number; y: number; width: number; height: number }>;

/** Resolved margin, border or padding widths. */
export type BoxEdges = Readonly<{ top: number; right: number; bottom: number; left: number }>;

/** Min-content and max-content inline sizes. */
export type IntrinsicSizes = Readonly<{ minContent: number; maxContent: number }>;

export const ZERO_EDGES: BoxEdges = Object.freeze({ top: 0, right: 0, bottom: 0, left: 0 });

export function edges(top: number, right: number, bottom: number, left: number): BoxEdges {
  if (top === 0 && right === 0 && bottom === 0 && left === 0) return ZERO_EDGES;
  return { top, right, bottom, left };
}

export function horizontal(e: BoxEdges): number {
  return e.left + e.right;
}

export function vertical(e: BoxEdges): number {
  return e.top + e.bottom;
}

export function clampNonNegative(v: number): number {
  return Number.isFinite(v) && v > 0 ? v : 0;
}

/**
 * Clamp `v` into [min, max]. When min > max, min wins (CSS 2.1 §10.4, §10.7).
 */
export function clampMinMax(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}

export function rectBottom(r: Rect): number {
  return r.y + r.height;
}

export function rectRight(r: Rect): number {
  return r.x + r.width;
}

/** Smallest rect covering both. */
export function unionRect(a: Rect, b: Rect): Rect {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return {
    x,
    y,
    width: Math.max(rectRight(a), rectRight(b)) - x,
    height: Math.max(rectBottom(a), rectBottom(b)) - y,
  };
}

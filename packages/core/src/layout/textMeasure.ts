/**
 * packages/core/src/layout/textMeasure.ts — Text measurement service.
 *
 * Why: Real shaping lives outside the engine. Layout only needs (width, height)
 * for a string at a font size and weight; embedders inject a measurer. The
 * default measurer uses a fixed advance per code point, which keeps tests and
 * headless runs deterministic.
 */

import type { FontWeight } from "../style/types.js";
import type { Size } from "./geometry.js";

export type FontSpec = Readonly<{ fontSize: number; fontWeight: FontWeight }>;

/** Pure, side-effect-free measurement of one string. */
export type TextMeasurer = (text: string, font: FontSpec) => Size;

export type FixedAdvanceOptions = Readonly<{
  /** Advance per code point as a fraction of font size. Default 0.6. */
  advanceRatio?: number;
  /** Text height as a fraction of font size. Default 1.2. */
  lineHeightRatio?: number;
  /** Max cached entries before the oldest is evicted. Default 10000. */
  cacheSize?: number;
}>;

/** Strings longer than this are measured without caching; they rarely repeat. */
const CACHE_MAX_KEY_LENGTH = 96;

function countCodePoints(text: string): number {
  let n = 0;
  for (const _ of text) n++;
  return n;
}

export function createFixedAdvanceMeasurer(opts: FixedAdvanceOptions = {}): TextMeasurer {
  const advanceRatio = opts.advanceRatio ?? 0.6;
  const lineHeightRatio = opts.lineHeightRatio ?? 1.2;
  const cacheSize = opts.cacheSize ?? 10000;
  const cache = new Map<string, number>();

  function advanceUnits(text: string): number {
    if (text.length > CACHE_MAX_KEY_LENGTH) return countCodePoints(text);
    const hit = cache.get(text);
    if (hit !== undefined) return hit;
    const units = countCodePoints(text);
    if (cache.size >= cacheSize) {
      const oldest = cache.keys().next();
      if (!oldest.done) cache.delete(oldest.value);
    }
    cache.set(text, units);
    return units;
  }

  return (text, font) => ({
    width: advanceUnits(text) * font.fontSize * advanceRatio,
    height: font.fontSize * lineHeightRatio,
  });
}

/** Shared default measurer (0.6em advance, 1.2em height). */
export const fixedAdvanceMeasurer: TextMeasurer = createFixedAdvanceMeasurer();

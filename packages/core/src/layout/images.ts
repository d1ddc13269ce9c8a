/**
 * packages/core/src/layout/images.ts — Replaced-element sizing.
 *
 * Image dimensions come from an injected provider treated as a best-effort,
 * synchronous lookup. A missing source or failed lookup falls back to a fixed
 * placeholder instead of aborting layout.
 */

import type { ElementNode } from "../document/types.js";
import type { Size } from "./geometry.js";

/** Natural size of the image at `src`, or `null` when unknown. */
export type ImageSizeProvider = (src: string) => Size | null;

export const noImageSizes: ImageSizeProvider = () => null;

export type NaturalImageSize = Readonly<{
  size: Size;
  /** True when the placeholder was used. */
  fallback: boolean;
  /** Message of the error the provider threw, if it threw. */
  failure: string | null;
}>;

function readDimensionAttr(node: ElementNode, name: "width" | "height"): number | null {
  const raw = node.attrs[name];
  if (raw === undefined) return null;
  const n = Number.parseFloat(raw);
  return Number.isFinite(n) && n >= 0 ? n : null;
}

/**
 * Size an image element from its attributes, then the provider, then the
 * placeholder. A single attribute scales the natural size by its aspect ratio.
 * A provider that throws counts as one that knows nothing; the message is
 * returned in `failure` for the caller to report.
 */
export function resolveNaturalImageSize(
  node: ElementNode,
  provider: ImageSizeProvider,
  placeholder: Size,
): NaturalImageSize {
  const attrW = readDimensionAttr(node, "width");
  const attrH = readDimensionAttr(node, "height");
  if (attrW !== null && attrH !== null) {
    return { size: { width: attrW, height: attrH }, fallback: false, failure: null };
  }

  const src = node.attrs["src"];
  let natural: Size | null = null;
  let failure: string | null = null;
  if (src !== undefined && src.length > 0) {
    try {
      const provided = provider(src);
      if (provided !== null && provided.width >= 0 && provided.height >= 0) natural = provided;
    } catch (err: unknown) {
      failure = err instanceof Error ? err.message : String(err);
    }
  }
  const fallback = natural === null;
  const base = natural ?? placeholder;

  if (attrW !== null) {
    const height = base.width > 0 ? (attrW * base.height) / base.width : base.height;
    return { size: { width: attrW, height }, fallback, failure };
  }
  if (attrH !== null) {
    const width = base.height > 0 ? (attrH * base.width) / base.height : base.width;
    return { size: { width, height: attrH }, fallback, failure };
  }
  return { size: base, fallback, failure };
}

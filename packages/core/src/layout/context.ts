/**
 * packages/core/src/layout/context.ts — Per-call layout state.
 *
 * Why: Everything a layout mutates while it runs (the float list, the
 * warning dedupe set) lives here and is created fresh for each `layout` call,
 * so concurrent or repeated layouts never observe each other's state.
 */

import type { ResolvedLayoutConfig } from "../config.js";
import { type LayoutDiagnostics, createLayoutDiagnostics, warnLayoutIssue } from "../diagnostics.js";
import { type ElementNode, describeNode } from "../document/types.js";
import { computeStyle } from "../style/computeStyle.js";
import type { ComputedStyle, StyleDeclaration } from "../style/types.js";
import { FloatManager } from "./floatManager.js";
import type { Rect } from "./geometry.js";
import { resolveNaturalImageSize } from "./images.js";
import type { IntrinsicEnv } from "./intrinsic.js";

/** An absolutely or fixed positioned element waiting for its containing block. */
export type PendingAbsolute = Readonly<{
  node: ElementNode;
  style: ComputedStyle;
  /** Margin-box origin the element would have had in normal flow. */
  staticX: number;
  staticY: number;
  /**
   * Innermost detached root the static position was recorded in, with its
   * border-box origin at that time. The static position moves with that box.
   */
  anchor?: FixedAnchor;
}>;

export type FixedAnchor = Readonly<{ node: ElementNode; x: number; y: number }>;

export type AbsoluteQueue = PendingAbsolute[];

export type StyleResolver = (node: ElementNode, parent: ComputedStyle) => ComputedStyle;

export type LayoutContext = Readonly<{
  config: ResolvedLayoutConfig;
  floats: FloatManager;
  diagnostics: LayoutDiagnostics;
  /** Initial containing block. */
  viewport: Rect;
  /** Fixed boxes of the whole layout, placed against the viewport once the root is done. */
  fixed: AbsoluteQueue;
  styleOf: StyleResolver;
  pseudoStyleOf: (decl: StyleDeclaration, parent: ComputedStyle) => ComputedStyle;
  intrinsic: IntrinsicEnv;
}>;

type CachedStyle = { parent: ComputedStyle; style: ComputedStyle };

export function createLayoutContext(
  config: ResolvedLayoutConfig,
  viewportWidth: number,
  viewportHeight: number,
): LayoutContext {
  const diagnostics = createLayoutDiagnostics(config.devMode, config.warn);
  const cache = new WeakMap<ElementNode, CachedStyle>();

  const styleOf: StyleResolver = (node, parent) => {
    const hit = cache.get(node);
    if (hit !== undefined && hit.parent === parent) return hit.style;
    const style = config.styleOf(node, parent, (property, value) => {
      warnLayoutIssue(
        diagnostics,
        `style:${describeNode(node)}:${property}`,
        `ignored invalid ${property} ${JSON.stringify(value) ?? String(value)} on <${describeNode(node)}>`,
      );
    });
    cache.set(node, { parent, style });
    return style;
  };

  const pseudoStyleOf = (decl: StyleDeclaration, parent: ComputedStyle) =>
    computeStyle(decl, parent, (property, value) => {
      warnLayoutIssue(
        diagnostics,
        `style:first-letter:${property}`,
        `ignored invalid ${property} ${JSON.stringify(value) ?? String(value)} in ::first-letter`,
      );
    });

  return {
    config,
    floats: new FloatManager(),
    diagnostics,
    viewport: { x: 0, y: 0, width: viewportWidth, height: viewportHeight },
    fixed: [],
    styleOf,
    pseudoStyleOf,
    intrinsic: {
      styleOf,
      measureText: config.measureText,
      naturalImageSize: (node) =>
        resolveNaturalImageSize(node, config.imageSize, config.placeholderImageSize).size,
    },
  };
}

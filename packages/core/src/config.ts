/**
 * packages/core/src/config.ts — Engine configuration.
 *
 * Why: Collaborators (text measurement, image sizes, style lookup) and the
 * engine's bounded loops are injected here. Values are validated once when the
 * engine is created; the resolved config is frozen.
 */

import { type WarnFn, consoleWarn, defaultDevMode } from "./diagnostics.js";
import type { ElementNode } from "./document/types.js";
import { BoxflowError } from "./errors.js";
import type { Size } from "./layout/geometry.js";
import { type ImageSizeProvider, noImageSizes } from "./layout/images.js";
import { type TextMeasurer, createFixedAdvanceMeasurer } from "./layout/textMeasure.js";
import { type StyleIssueReporter, computeStyle } from "./style/computeStyle.js";
import type { ComputedStyle } from "./style/types.js";

/** Computed style of an element given its parent's computed style. Must be pure. */
export type StyleLookup = (
  node: ElementNode,
  parent: ComputedStyle,
  report: StyleIssueReporter,
) => ComputedStyle;

export const defaultStyleLookup: StyleLookup = (node, parent, report) =>
  computeStyle(node.style, parent, report);

export type LayoutConfig = Readonly<{
  /** Initial containing block width. Default 800. */
  viewportWidth?: number;
  /** Initial containing block height. Default 600. */
  viewportHeight?: number;
  /** Root font size. Default 16. */
  defaultFontSize?: number;
  /** `line-height: normal` as a multiple of font size. Default 1.2. */
  lineHeightRatio?: number;
  /** Inline pipeline attempts before the last result is accepted. Default 3. */
  maxInlineAttempts?: number;
  /** Float drop search bound (candidate positions). Default 100. */
  floatDropMaxIterations?: number;
  /** Float drop search bound (pixels below the original Y). Default 1000. */
  floatDropMaxDescent?: number;
  /** Size used when an image's dimensions are unknown. Default 100×100. */
  placeholderImageSize?: Size;
  measureText?: TextMeasurer;
  imageSize?: ImageSizeProvider;
  styleOf?: StyleLookup;
  /** Emit warnings. Default: NODE_ENV !== "production". */
  devMode?: boolean;
  warn?: WarnFn;
}>;

export type ResolvedLayoutConfig = Readonly<{
  viewportWidth: number;
  viewportHeight: number;
  defaultFontSize: number;
  lineHeightRatio: number;
  maxInlineAttempts: number;
  floatDropMaxIterations: number;
  floatDropMaxDescent: number;
  placeholderImageSize: Size;
  measureText: TextMeasurer;
  imageSize: ImageSizeProvider;
  styleOf: StyleLookup;
  devMode: boolean;
  warn: WarnFn;
}>;

export const DEFAULT_LAYOUT_CONFIG: ResolvedLayoutConfig = Object.freeze({
  viewportWidth: 800,
  viewportHeight: 600,
  defaultFontSize: 16,
  lineHeightRatio: 1.2,
  maxInlineAttempts: 3,
  floatDropMaxIterations: 100,
  floatDropMaxDescent: 1000,
  placeholderImageSize: Object.freeze({ width: 100, height: 100 }),
  measureText: createFixedAdvanceMeasurer(),
  imageSize: noImageSizes,
  styleOf: defaultStyleLookup,
  devMode: defaultDevMode(),
  warn: consoleWarn,
});

function invalidConfig(detail: string): never {
  throw new BoxflowError("BOXFLOW_INVALID_CONFIG", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidConfig(`${name} must be a positive integer`);
  return v;
}

function requirePositiveNumber(name: string, v: number): number {
  if (!Number.isFinite(v) || v <= 0) invalidConfig(`${name} must be a positive finite number`);
  return v;
}

function requireNonNegativeNumber(name: string, v: number): number {
  if (!Number.isFinite(v) || v < 0) invalidConfig(`${name} must be a non-negative finite number`);
  return v;
}

function requireFunction<T>(name: string, v: T): T {
  if (typeof v !== "function") invalidConfig(`${name} must be a function`);
  return v;
}

export function resolveLayoutConfig(config: LayoutConfig | undefined): ResolvedLayoutConfig {
  if (!config) return DEFAULT_LAYOUT_CONFIG;
  const defaultFontSize =
    config.defaultFontSize === undefined
      ? DEFAULT_LAYOUT_CONFIG.defaultFontSize
      : requirePositiveNumber("defaultFontSize", config.defaultFontSize);
  const lineHeightRatio =
    config.lineHeightRatio === undefined
      ? DEFAULT_LAYOUT_CONFIG.lineHeightRatio
      : requirePositiveNumber("lineHeightRatio", config.lineHeightRatio);
  const placeholder = config.placeholderImageSize;

  return Object.freeze({
    viewportWidth:
      config.viewportWidth === undefined
        ? DEFAULT_LAYOUT_CONFIG.viewportWidth
        : requireNonNegativeNumber("viewportWidth", config.viewportWidth),
    viewportHeight:
      config.viewportHeight === undefined
        ? DEFAULT_LAYOUT_CONFIG.viewportHeight
        : requireNonNegativeNumber("viewportHeight", config.viewportHeight),
    defaultFontSize,
    lineHeightRatio,
    maxInlineAttempts:
      config.maxInlineAttempts === undefined
        ? DEFAULT_LAYOUT_CONFIG.maxInlineAttempts
        : requirePositiveInt("maxInlineAttempts", config.maxInlineAttempts),
    floatDropMaxIterations:
      config.floatDropMaxIterations === undefined
        ? DEFAULT_LAYOUT_CONFIG.floatDropMaxIterations
        : requirePositiveInt("floatDropMaxIterations", config.floatDropMaxIterations),
    floatDropMaxDescent:
      config.floatDropMaxDescent === undefined
        ? DEFAULT_LAYOUT_CONFIG.floatDropMaxDescent
        : requireNonNegativeNumber("floatDropMaxDescent", config.floatDropMaxDescent),
    placeholderImageSize:
      placeholder === undefined
        ? DEFAULT_LAYOUT_CONFIG.placeholderImageSize
        : Object.freeze({
            width: requireNonNegativeNumber("placeholderImageSize.width", placeholder.width),
            height: requireNonNegativeNumber("placeholderImageSize.height", placeholder.height),
          }),
    measureText:
      config.measureText === undefined
        ? config.lineHeightRatio === undefined
          ? DEFAULT_LAYOUT_CONFIG.measureText
          : createFixedAdvanceMeasurer({ lineHeightRatio })
        : requireFunction("measureText", config.measureText),
    imageSize:
      config.imageSize === undefined
        ? DEFAULT_LAYOUT_CONFIG.imageSize
        : requireFunction("imageSize", config.imageSize),
    styleOf:
      config.styleOf === undefined
        ? DEFAULT_LAYOUT_CONFIG.styleOf
        : requireFunction("styleOf", config.styleOf),
    devMode: config.devMode === undefined ? DEFAULT_LAYOUT_CONFIG.devMode : config.devMode === true,
    warn: config.warn === undefined ? DEFAULT_LAYOUT_CONFIG.warn : requireFunction("warn", config.warn),
  });
}

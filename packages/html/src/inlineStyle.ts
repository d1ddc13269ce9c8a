/**
 * packages/html/src/inlineStyle.ts — `style="..."` attribute → StyleDeclaration.
 *
 * Covers the properties the engine lays out. Lengths are `px` or unitless
 * numbers, plus `%` where CSS allows it. Declarations with an unknown property
 * or an unparseable value are dropped; `computeStyle` validates the rest.
 */

import type {
  Clear,
  Display,
  EdgeShorthand,
  FloatSide,
  FontWeight,
  LengthPercentage,
  LengthPercentageAuto,
  MaxSize,
  Overflow,
  PositionScheme,
  StyleDeclaration,
  TextAlign,
  VerticalAlign,
  WhiteSpace,
} from "@boxflow/core";

type MutableDeclaration = { -readonly [K in keyof StyleDeclaration]: StyleDeclaration[K] };

type Handler = (value: string, out: MutableDeclaration) => void;

const NUMBER_RE = /^(-?(?:\d+(?:\.\d+)?|\.\d+))(px)?$/;
const PERCENT_RE = /^(-?(?:\d+(?:\.\d+)?|\.\d+))%$/;

const BORDER_KEYWORDS: Readonly<Record<string, number>> = Object.freeze({
  thin: 1,
  medium: 3,
  thick: 5,
});

function keyword<T extends string>(allowed: readonly T[]) {
  return (value: string): T | null => {
    for (const candidate of allowed) {
      if (candidate === value) return candidate;
    }
    return null;
  };
}

const display = keyword<Display>([
  "block",
  "inline",
  "inline-block",
  "list-item",
  "table",
  "flex",
  "grid",
  "none",
]);
const position = keyword<PositionScheme>(["static", "relative", "absolute", "fixed"]);
const floatSide = keyword<FloatSide>(["none", "left", "right"]);
const clear = keyword<Clear>(["none", "left", "right", "both"]);
const overflow = keyword<Overflow>(["visible", "hidden", "scroll", "auto"]);
const textAlign = keyword<TextAlign>(["left", "right", "center"]);
const whiteSpace = keyword<WhiteSpace>(["normal", "nowrap"]);
const verticalAlign = keyword<VerticalAlign>(["baseline", "top", "middle", "bottom"]);

export function parsePx(value: string): number | null {
  const m = NUMBER_RE.exec(value);
  if (!m || m[1] === undefined) return null;
  const n = Number.parseFloat(m[1]);
  return Number.isFinite(n) ? n : null;
}

export function parseLengthPercentage(value: string): LengthPercentage | null {
  const m = PERCENT_RE.exec(value);
  if (m && m[1] !== undefined) {
    const n = Number.parseFloat(m[1]);
    if (!Number.isFinite(n)) return null;
    const pct: `${number}%` = `${n}%`;
    return pct;
  }
  return parsePx(value);
}

function lengthPercentageAuto(value: string): LengthPercentageAuto | null {
  return value === "auto" ? "auto" : parseLengthPercentage(value);
}

function maxSize(value: string): MaxSize | null {
  return value === "none" ? "none" : parseLengthPercentage(value);
}

function fontWeight(value: string): FontWeight | null {
  if (value === "bold" || value === "bolder") return "bold";
  if (value === "normal" || value === "lighter") return "normal";
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || String(n) !== value) return null;
  return n >= 600 ? "bold" : "normal";
}

function borderWidth(value: string): number | null {
  if (value === "none" || value === "hidden") return 0;
  return BORDER_KEYWORDS[value] ?? parsePx(value);
}

/** First token of a `border` shorthand that reads as a width; `none` is 0. */
function borderShorthandWidth(value: string): number | null {
  let width: number | null = null;
  for (const token of value.split(/\s+/)) {
    if (token === "none" || token === "hidden") return 0;
    const w = BORDER_KEYWORDS[token] ?? parsePx(token);
    if (w !== null && width === null) width = w;
  }
  return width ?? 3;
}

function edgeShorthand<T>(value: string, read: (v: string) => T | null): EdgeShorthand<T> | null {
  const parts = value.split(/\s+/).map(read);
  const [a, b, c, d] = parts;
  if (parts.some((p) => p === null) || a === undefined || a === null) return null;
  if (parts.length === 1) return a;
  if (b === undefined || b === null) return null;
  if (parts.length === 2) return [a, b];
  if (c === undefined || c === null) return null;
  if (parts.length === 3) return [a, b, c];
  if (d === undefined || d === null || parts.length !== 4) return null;
  return [a, b, c, d];
}

function set<T>(read: (v: string) => T | null, write: (out: MutableDeclaration, v: T) => void): Handler {
  return (value, out) => {
    const parsed = read(value);
    if (parsed !== null) write(out, parsed);
  };
}

/** A shorthand resets the longhands declared before it. */
function shorthand(handler: Handler, longhands: readonly (keyof MutableDeclaration)[]): Handler {
  return (value, out) => {
    for (const key of longhands) delete out[key];
    handler(value, out);
  };
}

const MARGIN_LONGHANDS = ["marginTop", "marginRight", "marginBottom", "marginLeft"] as const;
const PADDING_LONGHANDS = ["paddingTop", "paddingRight", "paddingBottom", "paddingLeft"] as const;
const BORDER_LONGHANDS = [
  "borderTopWidth",
  "borderRightWidth",
  "borderBottomWidth",
  "borderLeftWidth",
] as const;

const HANDLERS: Readonly<Record<string, Handler>> = Object.freeze({
  display: set(display, (o, v) => (o.display = v)),
  position: set(position, (o, v) => (o.position = v)),
  float: set(floatSide, (o, v) => (o.float = v)),
  clear: set(clear, (o, v) => (o.clear = v)),
  overflow: set(overflow, (o, v) => (o.overflow = v)),

  width: set(lengthPercentageAuto, (o, v) => (o.width = v)),
  height: set(lengthPercentageAuto, (o, v) => (o.height = v)),
  "min-width": set(parseLengthPercentage, (o, v) => (o.minWidth = v)),
  "max-width": set(maxSize, (o, v) => (o.maxWidth = v)),
  "min-height": set(parseLengthPercentage, (o, v) => (o.minHeight = v)),
  "max-height": set(maxSize, (o, v) => (o.maxHeight = v)),

  margin: shorthand(
    set(
      (v) => edgeShorthand(v, lengthPercentageAuto),
      (o, v) => (o.margin = v),
    ),
    MARGIN_LONGHANDS,
  ),
  "margin-top": set(lengthPercentageAuto, (o, v) => (o.marginTop = v)),
  "margin-right": set(lengthPercentageAuto, (o, v) => (o.marginRight = v)),
  "margin-bottom": set(lengthPercentageAuto, (o, v) => (o.marginBottom = v)),
  "margin-left": set(lengthPercentageAuto, (o, v) => (o.marginLeft = v)),

  padding: shorthand(
    set(
      (v) => edgeShorthand(v, parseLengthPercentage),
      (o, v) => (o.padding = v),
    ),
    PADDING_LONGHANDS,
  ),
  "padding-top": set(parseLengthPercentage, (o, v) => (o.paddingTop = v)),
  "padding-right": set(parseLengthPercentage, (o, v) => (o.paddingRight = v)),
  "padding-bottom": set(parseLengthPercentage, (o, v) => (o.paddingBottom = v)),
  "padding-left": set(parseLengthPercentage, (o, v) => (o.paddingLeft = v)),

  "border-width": shorthand(
    set(
      (v) => edgeShorthand(v, borderWidth),
      (o, v) => (o.borderWidth = v),
    ),
    BORDER_LONGHANDS,
  ),
  "border-top-width": set(borderWidth, (o, v) => (o.borderTopWidth = v)),
  "border-right-width": set(borderWidth, (o, v) => (o.borderRightWidth = v)),
  "border-bottom-width": set(borderWidth, (o, v) => (o.borderBottomWidth = v)),
  "border-left-width": set(borderWidth, (o, v) => (o.borderLeftWidth = v)),
  border: shorthand(
    set(borderShorthandWidth, (o, v) => (o.borderWidth = v)),
    BORDER_LONGHANDS,
  ),
  "border-top": set(borderShorthandWidth, (o, v) => (o.borderTopWidth = v)),
  "border-right": set(borderShorthandWidth, (o, v) => (o.borderRightWidth = v)),
  "border-bottom": set(borderShorthandWidth, (o, v) => (o.borderBottomWidth = v)),
  "border-left": set(borderShorthandWidth, (o, v) => (o.borderLeftWidth = v)),

  top: set(lengthPercentageAuto, (o, v) => (o.top = v)),
  right: set(lengthPercentageAuto, (o, v) => (o.right = v)),
  bottom: set(lengthPercentageAuto, (o, v) => (o.bottom = v)),
  left: set(lengthPercentageAuto, (o, v) => (o.left = v)),
  "z-index": set<number | "auto">(
    (v) => (v === "auto" ? "auto" : /^-?\d+$/.test(v) ? Number.parseInt(v, 10) : null),
    (o, v) => (o.zIndex = v),
  ),

  "font-size": set(parsePx, (o, v) => (o.fontSize = v)),
  "font-weight": set(fontWeight, (o, v) => (o.fontWeight = v)),
  "line-height": set<number | "normal">(
    (v) => (v === "normal" ? "normal" : v.endsWith("px") ? parsePx(v) : null),
    (o, v) => (o.lineHeight = v),
  ),
  "text-align": set(textAlign, (o, v) => (o.textAlign = v)),
  "white-space": set(whiteSpace, (o, v) => (o.whiteSpace = v)),
  "vertical-align": set(verticalAlign, (o, v) => (o.verticalAlign = v)),
});

/** Parse the body of a `style` attribute. Later declarations win. */
export function parseInlineStyle(text: string): StyleDeclaration {
  const out: MutableDeclaration = {};
  for (const declaration of text.split(";")) {
    const colon = declaration.indexOf(":");
    if (colon < 0) continue;
    const property = declaration.slice(0, colon).trim().toLowerCase();
    const value = declaration
      .slice(colon + 1)
      .replace(/!important\s*$/i, "")
      .trim()
      .toLowerCase();
    if (value.length === 0) continue;
    const handler = HANDLERS[property];
    handler?.(value, out);
  }
  return Object.freeze(out);
}

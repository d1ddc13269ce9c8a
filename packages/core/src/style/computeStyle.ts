/**
 * packages/core/src/style/computeStyle.ts — Declaration → computed style.
 *
 * Why: Nodes carry loosely-typed declarations (they may come from parsed HTML or
 * from untyped callers). Every value is validated here; anything invalid falls
 * back to the inherited or initial value and is reported, so layout never sees
 * a malformed style.
 */

import { INITIAL_STYLE } from "./initial.js";
import type {
  Clear,
  ComputedStyle,
  Display,
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
} from "./types.js";

/** Called once per rejected property value. */
export type StyleIssueReporter = (property: string, value: unknown) => void;

type Reader<T> = (value: unknown) => T | null;

const PERCENT_RE = /^-?(?:\d+(?:\.\d+)?|\.\d+)%$/;

const DISPLAY_VALUES: readonly Display[] = [
  "block",
  "inline",
  "inline-block",
  "list-item",
  "table",
  "flex",
  "grid",
  "none",
];
const POSITION_VALUES: readonly PositionScheme[] = ["static", "relative", "absolute", "fixed"];
const FLOAT_VALUES: readonly FloatSide[] = ["none", "left", "right"];
const CLEAR_VALUES: readonly Clear[] = ["none", "left", "right", "both"];
const OVERFLOW_VALUES: readonly Overflow[] = ["visible", "hidden", "scroll", "auto"];
const TEXT_ALIGN_VALUES: readonly TextAlign[] = ["left", "right", "center"];
const WHITE_SPACE_VALUES: readonly WhiteSpace[] = ["normal", "nowrap"];
const FONT_WEIGHT_VALUES: readonly FontWeight[] = ["normal", "bold"];
const VERTICAL_ALIGN_VALUES: readonly VerticalAlign[] = ["baseline", "top", "middle", "bottom"];

export function isPercentage(value: string): value is `${number}%` {
  return PERCENT_RE.test(value);
}

function oneOf<T extends string>(allowed: readonly T[]): Reader<T> {
  return (value) => {
    for (const candidate of allowed) {
      if (candidate === value) return candidate;
    }
    return null;
  };
}

function readFinite(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function readNonNegative(value: unknown): number | null {
  const n = readFinite(value);
  return n !== null && n >= 0 ? n : null;
}

function readPositive(value: unknown): number | null {
  const n = readFinite(value);
  return n !== null && n > 0 ? n : null;
}

export function readLengthPercentage(value: unknown): LengthPercentage | null {
  if (typeof value === "string") return isPercentage(value) ? value : null;
  return readFinite(value);
}

function readNonNegativeLengthPercentage(value: unknown): LengthPercentage | null {
  const v = readLengthPercentage(value);
  if (v === null) return null;
  if (typeof v === "number") return v >= 0 ? v : null;
  return Number.parseFloat(v) >= 0 ? v : null;
}

export function readLengthPercentageAuto(value: unknown): LengthPercentageAuto | null {
  if (value === "auto") return "auto";
  return readLengthPercentage(value);
}

function readSize(value: unknown): LengthPercentageAuto | null {
  if (value === "auto") return "auto";
  return readNonNegativeLengthPercentage(value);
}

function readMaxSize(value: unknown): MaxSize | null {
  if (value === "none") return "none";
  return readNonNegativeLengthPercentage(value);
}

function readLineHeight(value: unknown): number | "normal" | null {
  if (value === "normal") return "normal";
  return readPositive(value);
}

function readZIndex(value: unknown): number | "auto" | null {
  if (value === "auto") return "auto";
  return typeof value === "number" && Number.isInteger(value) ? value : null;
}

/** Expand a 1–4 value edge shorthand to [top, right, bottom, left]. */
function expandShorthand(
  value: unknown,
): readonly [unknown, unknown, unknown, unknown] | null | "invalid" {
  if (value === undefined) return null;
  if (!Array.isArray(value)) return [value, value, value, value];
  const list: readonly unknown[] = value;
  const [a, b, c, d] = list;
  switch (list.length) {
    case 1:
      return [a, a, a, a];
    case 2:
      return [a, b, a, b];
    case 3:
      return [a, b, c, b];
    case 4:
      return [a, b, c, d];
    default:
      return "invalid";
  }
}

/**
 * Resolve a declaration against its parent's computed style.
 *
 * Inherited: font-size, font-weight, line-height, text-align, white-space.
 * Everything else starts from the initial value.
 */
export function computeStyle(
  decl: StyleDeclaration | undefined,
  parent: ComputedStyle = INITIAL_STYLE,
  report?: StyleIssueReporter,
): ComputedStyle {
  const source: Readonly<Record<string, unknown>> = decl ?? {};

  function read<T>(property: string, reader: Reader<T>, fallback: T, shorthand?: unknown): T {
    const raw = source[property];
    const value = raw !== undefined ? raw : shorthand;
    if (value === undefined) return fallback;
    const parsed = reader(value);
    if (parsed === null) {
      report?.(property, value);
      return fallback;
    }
    return parsed;
  }

  function edges(shorthandName: string) {
    const expanded = expandShorthand(source[shorthandName]);
    if (expanded === "invalid") {
      report?.(shorthandName, source[shorthandName]);
      return [undefined, undefined, undefined, undefined] as const;
    }
    return expanded ?? ([undefined, undefined, undefined, undefined] as const);
  }

  const margin = edges("margin");
  const padding = edges("padding");
  const border = edges("borderWidth");

  return Object.freeze({
    display: read("display", oneOf(DISPLAY_VALUES), INITIAL_STYLE.display),
    position: read("position", oneOf(POSITION_VALUES), INITIAL_STYLE.position),
    float: read("float", oneOf(FLOAT_VALUES), INITIAL_STYLE.float),
    clear: read("clear", oneOf(CLEAR_VALUES), INITIAL_STYLE.clear),
    overflow: read("overflow", oneOf(OVERFLOW_VALUES), INITIAL_STYLE.overflow),

    width: read("width", readSize, INITIAL_STYLE.width),
    height: read("height", readSize, INITIAL_STYLE.height),
    minWidth: read("minWidth", readNonNegativeLengthPercentage, INITIAL_STYLE.minWidth),
    maxWidth: read("maxWidth", readMaxSize, INITIAL_STYLE.maxWidth),
    minHeight: read("minHeight", readNonNegativeLengthPercentage, INITIAL_STYLE.minHeight),
    maxHeight: read("maxHeight", readMaxSize, INITIAL_STYLE.maxHeight),

    marginTop: read("marginTop", readLengthPercentageAuto, INITIAL_STYLE.marginTop, margin[0]),
    marginRight: read("marginRight", readLengthPercentageAuto, INITIAL_STYLE.marginRight, margin[1]),
    marginBottom: read(
      "marginBottom",
      readLengthPercentageAuto,
      INITIAL_STYLE.marginBottom,
      margin[2],
    ),
    marginLeft: read("marginLeft", readLengthPercentageAuto, INITIAL_STYLE.marginLeft, margin[3]),

    paddingTop: read(
      "paddingTop",
      readNonNegativeLengthPercentage,
      INITIAL_STYLE.paddingTop,
      padding[0],
    ),
    paddingRight: read(
      "paddingRight",
      readNonNegativeLengthPercentage,
      INITIAL_STYLE.paddingRight,
      padding[1],
    ),
    paddingBottom: read(
      "paddingBottom",
      readNonNegativeLengthPercentage,
      INITIAL_STYLE.paddingBottom,
      padding[2],
    ),
    paddingLeft: read(
      "paddingLeft",
      readNonNegativeLengthPercentage,
      INITIAL_STYLE.paddingLeft,
      padding[3],
    ),

    borderTopWidth: read("borderTopWidth", readNonNegative, INITIAL_STYLE.borderTopWidth, border[0]),
    borderRightWidth: read(
      "borderRightWidth",
      readNonNegative,
      INITIAL_STYLE.borderRightWidth,
      border[1],
    ),
    borderBottomWidth: read(
      "borderBottomWidth",
      readNonNegative,
      INITIAL_STYLE.borderBottomWidth,
      border[2],
    ),
    borderLeftWidth: read(
      "borderLeftWidth",
      readNonNegative,
      INITIAL_STYLE.borderLeftWidth,
      border[3],
    ),

    top: read("top", readLengthPercentageAuto, INITIAL_STYLE.top),
    right: read("right", readLengthPercentageAuto, INITIAL_STYLE.right),
    bottom: read("bottom", readLengthPercentageAuto, INITIAL_STYLE.bottom),
    left: read("left", readLengthPercentageAuto, INITIAL_STYLE.left),
    zIndex: read("zIndex", readZIndex, INITIAL_STYLE.zIndex),

    fontSize: read("fontSize", readPositive, parent.fontSize),
    fontWeight: read("fontWeight", oneOf(FONT_WEIGHT_VALUES), parent.fontWeight),
    lineHeight: read("lineHeight", readLineHeight, parent.lineHeight),
    textAlign: read("textAlign", oneOf(TEXT_ALIGN_VALUES), parent.textAlign),
    whiteSpace: read("whiteSpace", oneOf(WHITE_SPACE_VALUES), parent.whiteSpace),
    verticalAlign: read("verticalAlign", oneOf(VERTICAL_ALIGN_VALUES), INITIAL_STYLE.verticalAlign),
  });
}

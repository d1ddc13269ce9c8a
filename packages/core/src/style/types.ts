/**
 * packages/core/src/style/types.ts — Style value and declaration types.
 *
 * Why: The engine consumes computed styles, not CSS text. Each element node
 * carries its own `StyleDeclaration`; `computeStyle` turns it into a complete
 * `ComputedStyle` by inheriting text properties and filling initial values.
 * Lengths are CSS pixels.
 */

/** Length in pixels or a percentage of the containing block. */
export type LengthPercentage = number | `${number}%`;
/** Length, percentage, or `auto`. */
export type LengthPercentageAuto = LengthPercentage | "auto";
/** Max-size constraint; `none` means unbounded. */
export type MaxSize = LengthPercentage | "none";

export type Display =
  | "block"
  | "inline"
  | "inline-block"
  | "list-item"
  | "table"
  | "flex"
  | "grid"
  | "none";

export type PositionScheme = "static" | "relative" | "absolute" | "fixed";
export type FloatSide = "none" | "left" | "right";
export type Clear = "none" | "left" | "right" | "both";
export type Overflow = "visible" | "hidden" | "scroll" | "auto";
export type TextAlign = "left" | "right" | "center";
export type WhiteSpace = "normal" | "nowrap";
export type VerticalAlign = "baseline" | "top" | "middle" | "bottom";
export type FontWeight = "normal" | "bold";

/** Fully resolved style of one element. Every property has a value. */
export type ComputedStyle = Readonly<{
  display: Display;
  position: PositionScheme;
  float: FloatSide;
  clear: Clear;
  overflow: Overflow;

  width: LengthPercentageAuto;
  height: LengthPercentageAuto;
  minWidth: LengthPercentage;
  maxWidth: MaxSize;
  minHeight: LengthPercentage;
  maxHeight: MaxSize;

  marginTop: LengthPercentageAuto;
  marginRight: LengthPercentageAuto;
  marginBottom: LengthPercentageAuto;
  marginLeft: LengthPercentageAuto;

  paddingTop: LengthPercentage;
  paddingRight: LengthPercentage;
  paddingBottom: LengthPercentage;
  paddingLeft: LengthPercentage;

  borderTopWidth: number;
  borderRightWidth: number;
  borderBottomWidth: number;
  borderLeftWidth: number;

  top: LengthPercentageAuto;
  right: LengthPercentageAuto;
  bottom: LengthPercentageAuto;
  left: LengthPercentageAuto;
  zIndex: number | "auto";

  fontSize: number;
  fontWeight: FontWeight;
  /** `normal` resolves to `fontSize * lineHeightRatio` from the engine config. */
  lineHeight: number | "normal";
  textAlign: TextAlign;
  whiteSpace: WhiteSpace;
  /** Placement of an inline-level box within its line. Not inherited. */
  verticalAlign: VerticalAlign;
}>;

/** Edge shorthand: one value for all sides, or the usual 2/3/4-value CSS forms. */
export type EdgeShorthand<T> =
  | T
  | readonly [T, T]
  | readonly [T, T, T]
  | readonly [T, T, T, T];

/**
 * Specified values for one element. Longhands override shorthands.
 *
 * Shorthands:
 * - `margin`, `padding`, `borderWidth` accept one to four values (top, right, bottom, left order)
 */
export type StyleDeclaration = Readonly<
  Partial<ComputedStyle> & {
    margin?: EdgeShorthand<LengthPercentageAuto>;
    padding?: EdgeShorthand<LengthPercentage>;
    borderWidth?: EdgeShorthand<number>;
  }
>;

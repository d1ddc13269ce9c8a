import type { ComputedStyle } from "./types.js";

/** CSS initial values. Used for the root's parent and for elements without a declaration. */
export const INITIAL_STYLE: ComputedStyle = Object.freeze({
  display: "inline",
  position: "static",
  float: "none",
  clear: "none",
  overflow: "visible",

  width: "auto",
  height: "auto",
  minWidth: 0,
  maxWidth: "none",
  minHeight: 0,
  maxHeight: "none",

  marginTop: 0,
  marginRight: 0,
  marginBottom: 0,
  marginLeft: 0,

  paddingTop: 0,
  paddingRight: 0,
  paddingBottom: 0,
  paddingLeft: 0,

  borderTopWidth: 0,
  borderRightWidth: 0,
  borderBottomWidth: 0,
  borderLeftWidth: 0,

  top: "auto",
  right: "auto",
  bottom: "auto",
  left: "auto",
  zIndex: "auto",

  fontSize: 16,
  fontWeight: "normal",
  lineHeight: "normal",
  textAlign: "left",
  whiteSpace: "normal",
  verticalAlign: "baseline",
});

/** Initial style with a different root font size. */
export function initialStyleWithFontSize(fontSize: number): ComputedStyle {
  if (fontSize === INITIAL_STYLE.fontSize) return INITIAL_STYLE;
  return Object.freeze({ ...INITIAL_STYLE, fontSize });
}

/**
 * @boxflow/html
 *
 * HTML fixture front end: markup in, `@boxflow/core` document nodes out.
 */

export { decodeEntities, fromHtml, parseHtml } from "./fromHtml.js";
export { parseInlineStyle, parseLengthPercentage, parsePx } from "./inlineStyle.js";

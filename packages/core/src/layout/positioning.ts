/**
 * packages/core/src/layout/positioning.ts — Absolute and fixed boxes.
 *
 * Out-of-flow elements are queued with their static position while their
 * containing block is still being laid out, then placed here once its padding
 * box is final. Offsets win over the static position; a width or height left
 * `auto` between two opposing offsets stretches to fill the space.
 */

import type { Box } from "./box.js";
import { marginBoxRect, translateBox } from "./box.js";
import { clampWidth, isReplaced, resolveEdges, resolveLengthAuto } from "./boxModel.js";
import type { LayoutContext, PendingAbsolute } from "./context.js";
import type { DetachedSizing, FlowOps } from "./flowTypes.js";
import { type Rect, horizontal, vertical } from "./geometry.js";

export function layoutAbsolute(
  ctx: LayoutContext,
  pending: PendingAbsolute,
  cb: Rect,
  ops: FlowOps,
): Box {
  const { node, style } = pending;
  const resolved = resolveEdges(style, cb.width);
  const left = resolveLengthAuto(style.left, cb.width);
  const right = resolveLengthAuto(style.right, cb.width);
  const top = resolveLengthAuto(style.top, cb.height);
  const bottom = resolveLengthAuto(style.bottom, cb.height);
  const replaced = isReplaced(node);

  const stretchX = style.width === "auto" && left !== null && right !== null && !replaced;
  const stretchY = style.height === "auto" && top !== null && bottom !== null && !replaced;
  const sizing: DetachedSizing = {
    ...(stretchX
      ? {
          forcedWidth: clampWidth(
            cb.width -
              (left ?? 0) -
              (right ?? 0) -
              horizontal(resolved.margin) -
              horizontal(resolved.border) -
              horizontal(resolved.padding),
            style,
            cb.width,
          ),
        }
      : {}),
    ...(stretchY
      ? {
          forcedHeight: Math.max(
            0,
            cb.height -
              (top ?? 0) -
              (bottom ?? 0) -
              vertical(resolved.margin) -
              vertical(resolved.border) -
              vertical(resolved.padding),
          ),
        }
      : {}),
  };

  const box = ops.layoutDetached(
    ctx,
    node,
    style,
    { x: 0, y: 0, width: cb.width, height: cb.height },
    sizing,
  );
  const outer = marginBoxRect(box);
  const x =
    left !== null
      ? cb.x + left
      : right !== null
        ? cb.x + cb.width - right - outer.width
        : pending.staticX;
  const y =
    top !== null
      ? cb.y + top
      : bottom !== null
        ? cb.y + cb.height - bottom - outer.height
        : pending.staticY;
  return translateBox(box, x, y);
}

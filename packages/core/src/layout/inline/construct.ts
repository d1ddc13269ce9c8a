/**
 * packages/core/src/layout/inline/construct.ts — Phase 3: fragment construction.
 *
 * Each line places its floats first (whatever their item order), narrowing the
 * constraint, then positions the remaining items left to right from the
 * post-float left edge, shifted by `text-align`. Text and atomic items sit at
 * the line's top unless their `vertical-align` says otherwise. Fragments are
 * absolute and final when created. The updated constraint carries into the
 * next line.
 */

import { translateBox } from "../box.js";
import type { ConstraintSpace } from "../constraintSpace.js";
import type { FloatDropLimits } from "../exclusionSpace.js";
import type { Fragment, InlineItem, LineGeometry, LineInfo } from "./items.js";

export type ConstructOptions = Readonly<{
  /** Absolute x of the container's content-box left edge. */
  originX: number;
  floatDrop: FloatDropLimits;
}>;

export type ConstructResult = Readonly<{
  fragments: readonly Fragment[];
  lines: readonly LineGeometry[];
  /** Constraint after every float on every line has been placed. */
  constraint: ConstraintSpace;
  /** Floats whose drop search ran out and were left at their line's Y. */
  abandonedFloatDrops: number;
}>;

/** Width of the line's in-flow content, not counting space hanging at its end. */
function contentWidth(items: readonly InlineItem[]): number {
  let width = 0;
  let hanging = 0;
  for (const item of items) {
    if (item.kind === "float" || item.kind === "block-child" || item.kind === "out-of-flow") continue;
    width += item.width;
    if (item.kind === "text") hanging = item.hangingWidth;
    else if (item.kind !== "close-tag") hanging = 0;
  }
  return width - hanging;
}

function alignShift(space: ConstraintSpace, free: number): number {
  if (free <= 0) return 0;
  switch (space.textAlign) {
    case "right":
      return free;
    case "center":
      return free / 2;
    default:
      return 0;
  }
}

/** Top of an item within its line. `baseline` aligns with the line's top. */
function alignedY(line: LineInfo, item: InlineItem): number {
  switch (item.style.verticalAlign) {
    case "middle":
      return line.y + (line.height - item.height) / 2;
    case "bottom":
      return line.y + line.height - item.height;
    default:
      return line.y;
  }
}

export function constructFragments(
  lines: readonly LineInfo[],
  constraint: ConstraintSpace,
  opts: ConstructOptions,
): ConstructResult {
  const fragments: Fragment[] = [];
  const geometry: LineGeometry[] = [];
  let space = constraint;
  let abandoned = 0;

  for (let lineIndex = 0; lineIndex < lines.length; lineIndex++) {
    const line = lines[lineIndex];
    if (!line) continue;

    for (let k = 0; k < line.items.length; k++) {
      const item = line.items[k];
      if (item?.kind !== "float") continue;
      const drop = space.exclusionSpace.dropY(
        item.side,
        item.width,
        item.height,
        line.y,
        space.availableWidth,
        opts.floatDrop,
      );
      if (drop.gaveUp) abandoned++;
      const offsets = space.inlineOffsets(drop.y, item.height);
      const lineX = item.side === "left" ? offsets.left : offsets.right;
      const x =
        item.side === "left"
          ? opts.originX + lineX
          : opts.originX + space.availableWidth - lineX - item.width;
      space = space.withExclusion({
        side: item.side,
        rect: { x: lineX, y: drop.y, width: item.width, height: item.height },
      });
      fragments.push({
        kind: "float",
        item,
        itemIndex: line.startIndex + k,
        lineIndex,
        x,
        y: drop.y,
        width: item.width,
        height: item.height,
        box: translateBox(item.box, x, drop.y),
      });
    }

    const offsets = space.inlineOffsets(line.y, line.height);
    const lineLeft = opts.originX + offsets.left;
    const lineRight = opts.originX + space.availableWidth - offsets.right;
    const free = lineRight - lineLeft - contentWidth(line.items);
    let x = lineLeft + alignShift(space, free);
    geometry.push({
      y: line.y,
      height: line.height,
      left: lineLeft,
      right: lineRight,
      hasContent: line.hasContent,
    });

    for (let k = 0; k < line.items.length; k++) {
      const item = line.items[k];
      if (!item || item.kind === "float") continue;
      const base = { item, itemIndex: line.startIndex + k, lineIndex, y: line.y };
      switch (item.kind) {
        case "text":
          fragments.push({
            ...base,
            kind: "text",
            x,
            y: alignedY(line, item),
            width: item.width,
            height: item.height,
            text: item.text,
          });
          x += item.width;
          break;
        case "atomic": {
          const y = alignedY(line, item);
          fragments.push({
            ...base,
            kind: "atomic",
            x,
            y,
            width: item.width,
            height: item.height,
            box: translateBox(item.box, x, y),
          });
          x += item.width;
          break;
        }
        case "block-child":
          fragments.push({ ...base, kind: "block-child", x: lineLeft, width: 0, height: 0 });
          break;
        case "control":
          fragments.push({ ...base, kind: "control", x, width: 0, height: item.height });
          break;
        case "open-tag":
        case "close-tag":
          fragments.push({ ...base, kind: item.kind, x, width: item.width, height: line.height });
          x += item.width;
          break;
        case "out-of-flow":
          fragments.push({ ...base, kind: "out-of-flow", x, width: 0, height: 0 });
          break;
      }
    }
  }

  return {
    fragments: Object.freeze(fragments),
    lines: Object.freeze(geometry),
    constraint: space,
    abandonedFloatDrops: abandoned,
  };
}

/**
 * packages/core/src/layout/inline/breakLines.ts — Phase 2: line breaking.
 *
 * Pure: items × constraint × start Y → lines. Width is re-queried at the
 * current line's Y for every unit so lines beside earlier floats start narrow.
 * Floats ride on the current line without consuming width; fragment
 * construction realizes their effect (and the retry loop feeds it back here).
 */

import type { ConstraintSpace } from "../constraintSpace.js";
import { type InlineItem, type LineInfo, isInFlowContent } from "./items.js";

export type BreakLinesOptions = Readonly<{
  /** Minimum height of a line with content (the container's line height). */
  strut?: number;
}>;

type LineDraft = {
  y: number;
  items: InlineItem[];
  startIndex: number;
  used: number;
  height: number;
  hasContent: boolean;
};

/**
 * End (exclusive) of the unbreakable unit starting at `start`: a text item
 * glued to following text, including the markers between them.
 */
function unitEnd(items: readonly InlineItem[], start: number): number {
  let j = start;
  while (j < items.length) {
    const item = items[j];
    j++;
    if (item?.kind !== "text" || !item.noBreakAfter) return j;
    while (j < items.length) {
      const marker = items[j];
      if (marker?.kind !== "open-tag" && marker?.kind !== "close-tag") break;
      j++;
    }
  }
  return j;
}

export function breakLines(
  items: readonly InlineItem[],
  constraint: ConstraintSpace,
  startY: number,
  opts: BreakLinesOptions = {},
): readonly LineInfo[] {
  const strut = opts.strut ?? 0;
  const lines: LineInfo[] = [];
  let line: LineDraft = { y: startY, items: [], startIndex: 0, used: 0, height: 0, hasContent: false };

  function flush(nextIndex: number): void {
    if (line.items.length > 0) {
      const height = line.hasContent ? Math.max(line.height, strut) : line.height;
      lines.push({
        y: line.y,
        items: Object.freeze(line.items),
        startIndex: line.startIndex,
        constraint,
        height,
        hasContent: line.hasContent,
      });
      line = { y: line.y + height, items: [], startIndex: nextIndex, used: 0, height: 0, hasContent: false };
      return;
    }
    line.startIndex = nextIndex;
  }

  function place(item: InlineItem): void {
    line.items.push(item);
    if (item.kind !== "float") line.used += item.width;
    if (isInFlowContent(item)) {
      line.hasContent = true;
      if (item.height > line.height) line.height = item.height;
    }
  }

  let i = 0;
  while (i < items.length) {
    const item = items[i];
    if (!item) {
      i++;
      continue;
    }
    switch (item.kind) {
      case "block-child": {
        flush(i);
        lines.push({
          y: line.y,
          items: Object.freeze([item]),
          startIndex: i,
          constraint,
          height: 0,
          hasContent: false,
        });
        line.startIndex = i + 1;
        i++;
        continue;
      }
      case "control": {
        if (line.items.length === 0) line.startIndex = i;
        place(item);
        flush(i + 1);
        i++;
        continue;
      }
      case "float":
      case "out-of-flow":
      case "open-tag":
      case "close-tag": {
        if (line.items.length === 0) line.startIndex = i;
        place(item);
        i++;
        continue;
      }
      case "text":
      case "atomic": {
        if (item.kind === "text" && item.whitespaceOnly && !line.hasContent) {
          i++;
          continue;
        }
        const end = unitEnd(items, i);
        let width = 0;
        let height = 0;
        let hanging = 0;
        for (let k = i; k < end; k++) {
          const part = items[k];
          if (!part) continue;
          width += part.width;
          if (isInFlowContent(part)) height = Math.max(height, part.height);
          hanging = part.kind === "text" ? part.hangingWidth : 0;
        }
        if (!constraint.noWrap && line.hasContent) {
          const available = constraint.availableInlineSize(line.y, Math.max(line.height, height));
          if (line.used + width - hanging > available) {
            // Opening markers directly before the unit move with it.
            let carried = 0;
            while (line.items.length > 0 && line.items[line.items.length - 1]?.kind === "open-tag") {
              const marker = line.items.pop();
              line.used -= marker?.width ?? 0;
              carried++;
            }
            flush(i - carried);
            i -= carried;
            continue;
          }
        }
        if (line.items.length === 0) line.startIndex = i;
        for (let k = i; k < end; k++) {
          const part = items[k];
          if (part) place(part);
        }
        i = end;
        continue;
      }
    }
  }
  flush(items.length);
  return Object.freeze(lines);
}

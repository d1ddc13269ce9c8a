/**
 * packages/core/src/layout/constraintSpace.ts — Immutable inline layout input.
 *
 * Why: The inline pipeline threads one value through collection, breaking and
 * construction. Each `with*` returns a new space that shares the unchanged
 * fields (the exclusion space is itself immutable, so it is shared, not copied).
 */

import type { TextAlign } from "../style/types.js";
import { type Exclusion, ExclusionSpace, type InlineOffsets } from "./exclusionSpace.js";

export type ConstraintSpaceInit = Readonly<{
  availableWidth: number;
  /** `null` when the block size is indefinite. */
  availableHeight?: number | null;
  exclusionSpace?: ExclusionSpace;
  textAlign?: TextAlign;
  noWrap?: boolean;
}>;

export class ConstraintSpace {
  readonly availableWidth: number;
  readonly availableHeight: number | null;
  readonly exclusionSpace: ExclusionSpace;
  readonly textAlign: TextAlign;
  readonly noWrap: boolean;

  constructor(init: ConstraintSpaceInit) {
    this.availableWidth = init.availableWidth;
    this.availableHeight = init.availableHeight ?? null;
    this.exclusionSpace = init.exclusionSpace ?? ExclusionSpace.EMPTY;
    this.textAlign = init.textAlign ?? "left";
    this.noWrap = init.noWrap ?? false;
    Object.freeze(this);
  }

  private with(patch: Partial<ConstraintSpaceInit>): ConstraintSpace {
    return new ConstraintSpace({
      availableWidth: this.availableWidth,
      availableHeight: this.availableHeight,
      exclusionSpace: this.exclusionSpace,
      textAlign: this.textAlign,
      noWrap: this.noWrap,
      ...patch,
    });
  }

  withExclusion(exclusion: Exclusion): ConstraintSpace {
    return this.with({ exclusionSpace: this.exclusionSpace.add(exclusion) });
  }

  withExclusionSpace(exclusionSpace: ExclusionSpace): ConstraintSpace {
    if (exclusionSpace === this.exclusionSpace) return this;
    return this.with({ exclusionSpace });
  }

  withAvailableWidth(availableWidth: number): ConstraintSpace {
    return this.with({ availableWidth });
  }

  withTextAlign(textAlign: TextAlign): ConstraintSpace {
    return this.with({ textAlign });
  }

  withNoWrap(noWrap: boolean): ConstraintSpace {
    return this.with({ noWrap });
  }

  inlineOffsets(y: number, height: number): InlineOffsets {
    return this.exclusionSpace.availableInlineSize(y, height);
  }

  /** Available width minus both float intrusions. May be negative; callers clamp. */
  availableInlineSize(y: number, height: number): number {
    const { left, right } = this.exclusionSpace.availableInlineSize(y, height);
    return this.availableWidth - left - right;
  }
}

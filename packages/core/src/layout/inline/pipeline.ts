/**
 * packages/core/src/layout/inline/pipeline.ts — Collect → Break → Construct, with retry.
 *
 * Why: Line breaking runs before floats on those lines are placed, so it can
 * over-fill a line that a float later narrows. Construction reports the
 * exclusions it actually produced; when they change any line's available
 * space, collection and breaking run again against that space while
 * construction restarts from the original one. The attempt count is state,
 * not recursion, so termination is bounded by `maxAttempts`. A run that does
 * not settle keeps its last result.
 */

import type { ConstraintSpace } from "../constraintSpace.js";
import type { FloatDropLimits } from "../exclusionSpace.js";
import { breakLines } from "./breakLines.js";
import { type ConstructResult, constructFragments } from "./construct.js";
import type { Fragment, InlineItem, LineGeometry, LineInfo } from "./items.js";

export type InlinePipelineInput = Readonly<{
  /** Phase 1. Re-invoked on every attempt; must be pure. */
  collect: () => readonly InlineItem[];
  constraint: ConstraintSpace;
  startY: number;
  originX: number;
  strut: number;
  maxAttempts: number;
  floatDrop: FloatDropLimits;
}>;

export type InlineLayoutResult = Readonly<{
  items: readonly InlineItem[];
  lines: readonly LineInfo[];
  fragments: readonly Fragment[];
  lineGeometry: readonly LineGeometry[];
  /** Constraint after construction (original plus placed floats). */
  constraint: ConstraintSpace;
  attempts: number;
  converged: boolean;
  abandonedFloatDrops: number;
}>;

type PipelineState =
  | Readonly<{ phase: "collect"; attempt: number; breakSpace: ConstraintSpace }>
  | Readonly<{
      phase: "break";
      attempt: number;
      breakSpace: ConstraintSpace;
      items: readonly InlineItem[];
    }>
  | Readonly<{
      phase: "construct";
      attempt: number;
      breakSpace: ConstraintSpace;
      items: readonly InlineItem[];
      lines: readonly LineInfo[];
    }>
  | Readonly<{ phase: "done"; result: InlineLayoutResult }>;

/**
 * Whether construction left every line with the space the breaker assumed.
 * Compares both offsets so a float switching sides also counts as a change.
 */
export function sameLineSpace(
  lines: readonly LineInfo[],
  assumed: ConstraintSpace,
  actual: ConstraintSpace,
): boolean {
  if (assumed.exclusionSpace === actual.exclusionSpace) return true;
  if (assumed.availableWidth !== actual.availableWidth) return false;
  for (const line of lines) {
    const a = assumed.inlineOffsets(line.y, line.height);
    const b = actual.inlineOffsets(line.y, line.height);
    if (a.left !== b.left || a.right !== b.right) return false;
  }
  return true;
}

function finish(
  state: Extract<PipelineState, { phase: "construct" }>,
  built: ConstructResult,
  converged: boolean,
): PipelineState {
  return {
    phase: "done",
    result: {
      items: state.items,
      lines: state.lines,
      fragments: built.fragments,
      lineGeometry: built.lines,
      constraint: built.constraint,
      attempts: state.attempt + 1,
      converged,
      abandonedFloatDrops: built.abandonedFloatDrops,
    },
  };
}

export function runInlinePipeline(input: InlinePipelineInput): InlineLayoutResult {
  const maxAttempts = Math.max(1, input.maxAttempts);
  let state: PipelineState = { phase: "collect", attempt: 0, breakSpace: input.constraint };

  for (;;) {
    switch (state.phase) {
      case "collect":
        state = { ...state, phase: "break", items: input.collect() };
        break;
      case "break":
        state = {
          ...state,
          phase: "construct",
          lines: breakLines(state.items, state.breakSpace, input.startY, { strut: input.strut }),
        };
        break;
      case "construct": {
        const built = constructFragments(state.lines, input.constraint, {
          originX: input.originX,
          floatDrop: input.floatDrop,
        });
        const converged = sameLineSpace(state.lines, state.breakSpace, built.constraint);
        if (converged || state.attempt + 1 >= maxAttempts) {
          state = finish(state, built, converged);
        } else {
          state = { phase: "collect", attempt: state.attempt + 1, breakSpace: built.constraint };
        }
        break;
      }
      case "done":
        return state.result;
    }
  }
}

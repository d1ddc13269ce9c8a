import { assert, describe, test } from "@boxflow/testkit";
import { ConstraintSpace } from "../constraintSpace.js";
import type { InlineItem } from "../inline/items.js";
import { runInlinePipeline, sameLineSpace } from "../inline/pipeline.js";
import { breakLines } from "../inline/breakLines.js";
import { LIMITS, float, text } from "./inlineFixtures.js";

const SPACE = new ConstraintSpace({ availableWidth: 100 });

function run(items: readonly InlineItem[], maxAttempts = 3) {
  let calls = 0;
  const result = runInlinePipeline({
    collect: () => {
      calls++;
      return items;
    },
    constraint: SPACE,
    startY: 0,
    originX: 0,
    strut: 0,
    maxAttempts,
    floatDrop: LIMITS,
  });
  return { result, calls };
}

describe("runInlinePipeline", () => {
  test("settles on the first attempt when no float changes a line", () => {
    const { result, calls } = run([text(30), text(30)]);
    assert.equal(result.attempts, 1);
    assert.equal(result.converged, true);
    assert.equal(calls, 1);
  });

  test("re-breaks lines against the space the floats produced", () => {
    const { result, calls } = run([text(40), float("left", 50, 24), text(40)]);
    assert.equal(result.attempts, 2);
    assert.equal(result.converged, true);
    assert.equal(calls, 2);
    assert.deepEqual(
      result.fragments.filter((f) => f.kind === "text").map((f) => [f.x, f.y]),
      [
        [50, 0],
        [50, 12],
      ],
    );
  });

  test("keeps the last result when the attempts run out", () => {
    const { result } = run([text(40), float("left", 50, 24), text(40)], 1);
    assert.equal(result.attempts, 1);
    assert.equal(result.converged, false);
    assert.equal(result.lines.length, 1);
  });
});

describe("sameLineSpace", () => {
  const lines = breakLines([text(10)], SPACE, 0);

  test("identical exclusion spaces match", () => {
    assert.equal(sameLineSpace(lines, SPACE, SPACE.withTextAlign("center")), true);
  });

  test("an exclusion below every line does not count", () => {
    const below = SPACE.withExclusion({ side: "left", rect: { x: 0, y: 50, width: 10, height: 10 } });
    assert.equal(sameLineSpace(lines, SPACE, below), true);
  });

  test("an exclusion on a line counts on either side", () => {
    const left = SPACE.withExclusion({ side: "left", rect: { x: 0, y: 0, width: 10, height: 10 } });
    const right = SPACE.withExclusion({ side: "right", rect: { x: 0, y: 0, width: 10, height: 10 } });
    assert.equal(sameLineSpace(lines, SPACE, left), false);
    assert.equal(sameLineSpace(lines, left, right), false);
  });

  test("a different available width counts", () => {
    const narrow = SPACE.withExclusion({ side: "left", rect: { x: 0, y: 50, width: 1, height: 1 } });
    assert.equal(sameLineSpace(lines, SPACE, narrow.withAvailableWidth(90)), false);
  });
});

import { assert, describe, test } from "@boxflow/testkit";
import { ConstraintSpace } from "../constraintSpace.js";
import { breakLines } from "../inline/breakLines.js";
import { constructFragments } from "../inline/construct.js";
import type { InlineItem } from "../inline/items.js";
import type { TextAlign } from "../../style/types.js";
import { LIMITS, atomic, float, text } from "./inlineFixtures.js";

const SPACE = new ConstraintSpace({ availableWidth: 100 });

function build(items: readonly InlineItem[], space = SPACE, limits = LIMITS) {
  return constructFragments(breakLines(items, space, 0), space, { originX: 10, floatDrop: limits });
}

function alignedX(align: TextAlign, item = text(40)): number | undefined {
  return build([item], SPACE.withTextAlign(align)).fragments[0]?.x;
}

describe("constructFragments", () => {
  test("text-align shifts the line by its free space", () => {
    assert.equal(alignedX("left"), 10);
    assert.equal(alignedX("center"), 40);
    assert.equal(alignedX("right"), 70);
  });

  test("hanging space does not count toward alignment", () => {
    assert.equal(alignedX("right", text(46, { hanging: 6 })), 70);
  });

  test("vertical-align places items within the line's height", () => {
    const out = build([
      text(10),
      atomic(10, 30),
      atomic(10, 10, "top"),
      atomic(10, 10, "middle"),
      atomic(10, 10, "bottom"),
    ]);
    assert.deepEqual(
      out.fragments.map((f) => [f.x, f.y]),
      [
        [10, 0],
        [20, 0],
        [30, 0],
        [40, 10],
        [50, 20],
      ],
    );
    assert.deepEqual([out.fragments[4]?.box?.x, out.fragments[4]?.box?.y], [50, 20]);
    assert.equal(out.lines[0]?.height, 30);
  });

  test("a left float is placed first and pushes the line's content", () => {
    const out = build([text(40), float("left", 30, 20), text(20)]);
    assert.deepEqual(
      out.fragments.map((f) => [f.kind, f.itemIndex, f.x, f.y]),
      [
        ["float", 1, 10, 0],
        ["text", 0, 40, 0],
        ["text", 2, 80, 0],
      ],
    );
    assert.equal(out.fragments[0]?.box?.x, 10);
    assert.deepEqual(out.lines[0], { y: 0, height: 12, left: 40, right: 110, hasContent: true });
    assert.equal(out.constraint.exclusionSpace.size, 1);
  });

  test("a right float sits against the right edge", () => {
    const out = build([float("right", 30, 20), text(20)]);
    assert.equal(out.fragments[0]?.x, 80);
    assert.deepEqual(out.constraint.exclusionSpace.exclusions[0], {
      side: "right",
      rect: { x: 0, y: 0, width: 30, height: 20 },
    });
    assert.equal(out.lines[0]?.right, 80);
  });

  test("floats from one line narrow the next", () => {
    const out = build([text(60), float("left", 30, 20), text(60)]);
    const last = out.fragments[out.fragments.length - 1];
    assert.equal(last?.y, 12);
    assert.equal(last?.x, 40);
  });

  test("a float that cannot fit beside an opposite float drops below it", () => {
    const space = SPACE.withExclusion({ side: "left", rect: { x: 0, y: 0, width: 60, height: 30 } });
    const out = build([float("right", 50, 10)], space);
    assert.equal(out.fragments[0]?.y, 30);
    assert.equal(out.abandonedFloatDrops, 0);
  });

  test("an exhausted drop search leaves the float at its line", () => {
    const space = SPACE.withExclusion({ side: "left", rect: { x: 0, y: 0, width: 60, height: 30 } });
    const out = build([float("right", 50, 10)], space, { maxIterations: 0, maxDescent: 1000 });
    assert.equal(out.fragments[0]?.y, 0);
    assert.equal(out.abandonedFloatDrops, 1);
  });

  test("the input constraint is not modified", () => {
    build([float("left", 30, 20), text(10)]);
    assert.equal(SPACE.exclusionSpace.isEmpty, true);
  });
});

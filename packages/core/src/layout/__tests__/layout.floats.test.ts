import { assert, describe, geometriesOf, geometryOf, test } from "@boxflow/testkit";
import { h } from "../../document/h.js";
import { createLayoutEngine } from "../../engine.js";
import { childAt } from "./boxes.js";

const engine = createLayoutEngine({ devMode: false, defaultFontSize: 10 });

const floatBox = (side: "left" | "right", width: number, height: number) =>
  h.div({ float: side, width, height });

describe("floats", () => {
  test("text flows beside a left float", () => {
    const { root } = engine.layout(h.div({ width: 400 }, [floatBox("left", 100, 50), "hello"]));
    assert.deepEqual(geometryOf(childAt(root, 0)), { x: 0, y: 0, width: 100, height: 50 });
    assert.deepEqual(geometryOf(childAt(root, 1)), { x: 100, y: 0, width: 30, height: 12 });
    assert.equal(childAt(root, 1).text, "hello");
  });

  test("same-side floats stack horizontally", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [floatBox("left", 100, 50), floatBox("left", 80, 50), "x"]),
    );
    assert.deepEqual(
      root.children.map((b) => b.x),
      [0, 100, 180],
    );
  });

  test("block-level floats stack and in-flow blocks overlap them", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [floatBox("left", 100, 50), floatBox("left", 80, 50), h.div({ height: 10 })]),
    );
    assert.equal(childAt(root, 1).x, 100);
    assert.deepEqual(geometryOf(childAt(root, 2)), { x: 0, y: 0, width: 400, height: 10 });
  });

  test("a right float sits against the right edge", () => {
    const { root } = engine.layout(h.div({ width: 400 }, [floatBox("right", 100, 50)]));
    assert.equal(childAt(root, 0).x, 300);
  });

  test("a float too wide for the space beside an opposite float drops below it", () => {
    const { root } = engine.layout(
      h.div({ width: 300 }, [floatBox("left", 200, 50), floatBox("right", 150, 50)]),
    );
    assert.deepEqual([childAt(root, 1).x, childAt(root, 1).y], [150, 50]);
  });

  test("float margins are part of the space it takes", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [h.div({ float: "left", width: 50, height: 50, margin: 10 }), floatBox("left", 20, 20)]),
    );
    assert.deepEqual([childAt(root, 0).x, childAt(root, 0).y], [10, 10]);
    assert.equal(childAt(root, 1).x, 70);
  });

  test("an auto-width float shrinks to its content", () => {
    const { root } = engine.layout(h.div({ width: 400 }, [h.div({ float: "left" }, ["abc"])]));
    assert.equal(childAt(root, 0).width, 18);
  });

  test("a shrink-to-fit float keeps the space between text nodes on one line", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [h.div({ float: "left" }, ["hello ", h.b({}, ["world"])])]),
    );
    const float = childAt(root, 0);
    assert.deepEqual([float.width, float.height], [66, 12]);
    assert.deepEqual(float.lineBoxes, [{ y: 0, height: 12, left: 0, right: 66 }]);
  });

  test("line boxes beside a float are shortened", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [floatBox("left", 100, 50), h.p({}, ["hello world"])]),
    );
    const p = childAt(root, 1);
    assert.deepEqual(geometryOf(p), { x: 0, y: 0, width: 400, height: 12 });
    assert.deepEqual(
      p.children.map((b) => [b.text, b.x]),
      [
        ["hello ", 100],
        ["world", 136],
      ],
    );
    assert.deepEqual(p.lineBoxes, [{ y: 0, height: 12, left: 100, right: 400 }]);
  });

  test("text returns to the full width below a float", () => {
    const { root } = engine.layout(
      h.div({ width: 200 }, [floatBox("left", 100, 20), h.p({}, ["aaaaaaaaaa bbbbbbbbbb cccccccccc"])]),
    );
    const p = childAt(root, 1);
    assert.deepEqual(
      p.children.map((b) => [b.x, b.y]),
      [
        [100, 0],
        [100, 12],
        [0, 24],
      ],
    );
    assert.equal(p.height, 36);
  });

  test("clearance moves a block below floats on the cleared side", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [
        floatBox("left", 50, 30),
        h.div({ clear: "right", height: 10 }),
        h.div({ clear: "left", marginTop: 10, height: 10 }),
      ]),
    );
    assert.equal(childAt(root, 1).y, 0);
    assert.equal(childAt(root, 2).y, 30);
  });

  test("a formatting context root grows to contain its floats", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [
        h.div({ overflow: "hidden" }, [floatBox("left", 100, 40)]),
        h.div({}, ["x"]),
      ]),
    );
    assert.equal(childAt(root, 0).height, 40);
    assert.deepEqual([childAt(root, 1).y, childAt(root, 1, 0).x], [40, 0]);
  });

  test("a formatting context root is placed beside floats", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [
        floatBox("left", 100, 50),
        floatBox("right", 50, 20),
        h.div({ overflow: "hidden", height: 10 }),
        h.div({ height: 10 }),
      ]),
    );
    assert.deepEqual(geometriesOf(root.children.slice(2)), [
      { x: 100, y: 0, width: 250, height: 10 },
      { x: 0, y: 10, width: 400, height: 10 },
    ]);
  });

  test("a formatting context root too wide for the space beside floats moves below them", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [floatBox("left", 100, 50), h.div({ overflow: "hidden", width: 350, height: 10 })]),
    );
    assert.deepEqual(geometryOf(childAt(root, 1)), { x: 0, y: 50, width: 350, height: 10 });
    assert.equal(root.height, 60);
  });

  test("a formatting context root accounts for floats along its whole height", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [
        floatBox("left", 300, 20),
        floatBox("right", 150, 30),
        h.div({ overflow: "hidden", height: 30 }),
      ]),
    );
    assert.deepEqual([childAt(root, 1).x, childAt(root, 1).y], [250, 20]);
    assert.deepEqual(geometryOf(childAt(root, 2)), { x: 0, y: 20, width: 250, height: 30 });
  });

  test("a plain block does not grow around its floats", () => {
    const { root } = engine.layout(h.div({ width: 400 }, [h.div({}, [floatBox("left", 100, 40)])]));
    assert.equal(childAt(root, 0).height, 0);
    assert.equal(root.height, 40);
  });

  test("a float inside an inline element belongs to that element's box", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [h.span({}, ["a", floatBox("left", 10, 10)])]),
    );
    const span = childAt(root, 0);
    assert.deepEqual(
      span.children.map((b) => [b.kind, b.x]),
      [
        ["text", 10],
        ["block", 0],
      ],
    );
    assert.deepEqual([span.x, span.width], [10, 6]);
  });
});

import { assert, describe, geometriesOf, geometryOf, test } from "@boxflow/testkit";
import { h } from "../../document/h.js";
import { createLayoutEngine } from "../../engine.js";
import { childAt } from "./boxes.js";

const engine = createLayoutEngine({ devMode: false, defaultFontSize: 10 });

const container = (children: Parameters<typeof h.div>[1]) =>
  h.div({ position: "relative", width: 400, height: 300 }, children);

describe("absolute and fixed positioning", () => {
  test("left and top offsets place against the positioned ancestor", () => {
    const { root } = engine.layout(
      container([h.div({ position: "absolute", top: 10, left: 20, width: 50, height: 50 })]),
    );
    assert.deepEqual(geometryOf(childAt(root, 0)), { x: 20, y: 10, width: 50, height: 50 });
  });

  test("right and bottom offsets place from the far edges", () => {
    const { root } = engine.layout(
      container([h.div({ position: "absolute", right: 10, bottom: 10, width: 50, height: 50 })]),
    );
    assert.deepEqual([childAt(root, 0).x, childAt(root, 0).y], [340, 240]);
  });

  test("opposing offsets stretch an auto size", () => {
    const { root } = engine.layout(
      container([h.div({ position: "absolute", left: 10, right: 10, top: 20, bottom: 30 })]),
    );
    assert.deepEqual(geometryOf(childAt(root, 0)), { x: 10, y: 20, width: 380, height: 250 });
  });

  test("the containing block is the ancestor's padding box", () => {
    const { root } = engine.layout(
      h.div({ position: "relative", width: 100, height: 100, padding: 10, borderWidth: 5 }, [
        h.div({ position: "absolute", top: 0, left: 0, width: 10, height: 10 }),
      ]),
    );
    assert.deepEqual([childAt(root, 0).x, childAt(root, 0).y], [5, 5]);
  });

  test("static ancestors are skipped and the box attaches to its containing block", () => {
    const { root } = engine.layout(
      container([
        h.div({ marginLeft: 30 }, [h.div({ position: "absolute", top: 0, left: 0, width: 10, height: 10 })]),
      ]),
    );
    assert.equal(childAt(root, 0).children.length, 0);
    assert.deepEqual([childAt(root, 1).x, childAt(root, 1).y], [0, 0]);
  });

  test("without offsets the box keeps its static position and shrinks to fit", () => {
    const { root } = engine.layout(
      h.div({}, [h.div({ height: 30 }), h.div({ position: "absolute" }, ["x"])]),
    );
    assert.deepEqual(geometryOf(childAt(root, 1)), { x: 0, y: 30, width: 6, height: 12 });
    assert.equal(root.height, 30);
  });

  test("an absolute element in a line takes its static position from the line", () => {
    const { root } = engine.layout(
      h.div({ position: "relative", width: 200 }, ["ab", h.span({ position: "absolute" }, ["x"])]),
    );
    const placed = root.children[root.children.length - 1];
    assert.deepEqual([placed?.x, placed?.y, placed?.position], [12, 0, "absolute"]);
  });

  test("fixed boxes are placed against the viewport", () => {
    const { root } = engine.layout(
      container([h.div({ position: "fixed", right: 0, bottom: 0, width: 10, height: 10 })]),
      { viewportWidth: 800, viewportHeight: 600 },
    );
    assert.deepEqual([childAt(root, 0).x, childAt(root, 0).y], [790, 590]);
  });

  test("a fixed box inside a float sizes against the viewport and follows the float", () => {
    const { root } = engine.layout(
      h.div({ width: 400 }, [
        h.div({ float: "right", width: 100 }, [h.div({ position: "fixed", width: "50%", height: 10 })]),
      ]),
    );
    assert.equal(childAt(root, 0).children.length, 0);
    assert.deepEqual(geometryOf(childAt(root, 1)), { x: 300, y: 0, width: 400, height: 10 });
  });

  test("a fixed box inside an absolute box is still placed against the viewport", () => {
    const { root } = engine.layout(
      container([
        h.div({ position: "absolute", top: 20, left: 30, width: 50, height: 50 }, [
          h.div({ position: "fixed", bottom: 0, left: 0, width: 10, height: 10 }),
        ]),
      ]),
    );
    assert.equal(childAt(root, 0).children.length, 0);
    assert.deepEqual([childAt(root, 1).x, childAt(root, 1).y], [0, 590]);
  });

  test("a fixed box inside an inline-block is queued once", () => {
    const { root } = engine.layout(
      h.div({ width: 200 }, [
        "a ",
        h.span({ display: "inline-block" }, [h.div({ position: "fixed", top: 5, left: 5, width: 5, height: 5 })]),
        " b",
      ]),
    );
    const fixed = root.children.filter((b) => b.position === "fixed");
    assert.deepEqual(geometriesOf(fixed), [{ x: 5, y: 5, width: 5, height: 5 }]);
  });
});

import { assert, describe, test } from "@boxflow/testkit";
import { h } from "../../document/h.js";
import { computeStyle } from "../../style/computeStyle.js";
import type { StyleDeclaration } from "../../style/types.js";
import { resolveDisplay } from "../boxModel.js";
import { collapsesThrough, effectiveTopMargins } from "../marginChain.js";
import { collapseMarginList, collapseMargins, shouldCollapseMargins } from "../margins.js";

const styleOf = (node: { style: StyleDeclaration }, parent = computeStyle({})) =>
  computeStyle(node.style, parent);

function collapses(decl: StyleDeclaration): boolean {
  const style = computeStyle(decl);
  return shouldCollapseMargins(style, resolveDisplay(style));
}

describe("margin collapsing", () => {
  test("collapse table", () => {
    assert.equal(collapseMargins(30, 20), 30);
    assert.equal(collapseMargins(-20, -10), -20);
    assert.equal(collapseMargins(30, -10), 20);
    assert.equal(collapseMargins(-10, 30), 20);
    assert.equal(collapseMargins(0, 0), 0);
  });

  test("lists collapse to max positive plus min negative", () => {
    assert.equal(collapseMarginList([]), 0);
    assert.equal(collapseMarginList([10, 30, 20]), 30);
    assert.equal(collapseMarginList([10, -5, 30, -15]), 15);
    assert.equal(collapseMarginList([-5, -15]), -15);
  });

  test("floats, absolutes, inline-blocks and clipped boxes never collapse", () => {
    assert.equal(collapses({ display: "block" }), true);
    assert.equal(collapses({ display: "block", position: "relative" }), true);
    assert.equal(collapses({ display: "block", float: "left" }), false);
    assert.equal(collapses({ display: "block", position: "absolute" }), false);
    assert.equal(collapses({ display: "block", position: "fixed" }), false);
    assert.equal(collapses({ display: "inline-block" }), false);
    assert.equal(collapses({ display: "flex" }), false);
    assert.equal(collapses({ display: "block", overflow: "hidden" }), false);
  });
});

describe("margin chain queries", () => {
  test("first child's top margin joins an unbordered parent's", () => {
    const node = h.div({ marginTop: 10 }, [h.p({ marginTop: 25 }, ["x"])]);
    assert.deepEqual(effectiveTopMargins(styleOf, node, styleOf(node), 400), [10, 25]);
  });

  test("padding or a formatting context stops the chain", () => {
    const padded = h.div({ marginTop: 10, paddingTop: 1 }, [h.p({ marginTop: 25 })]);
    assert.deepEqual(effectiveTopMargins(styleOf, padded, styleOf(padded), 400), [10]);
    const clipped = h.div({ marginTop: 10, overflow: "hidden" }, [h.p({ marginTop: 25 })]);
    assert.deepEqual(effectiveTopMargins(styleOf, clipped, styleOf(clipped), 400), [10]);
  });

  test("a first child with clipped overflow ends the chain", () => {
    const node = h.div({ marginTop: 10 }, [h.p({ marginTop: 25, overflow: "hidden" }, ["x"])]);
    assert.deepEqual(effectiveTopMargins(styleOf, node, styleOf(node), 400), [10]);
  });

  test("empty leading children pass both their margins through", () => {
    const node = h.div({}, [h.div({ marginTop: 5, marginBottom: 40 }), h.p({ marginTop: 15 }, ["x"])]);
    assert.deepEqual(effectiveTopMargins(styleOf, node, styleOf(node), 400), [0, 5, 40, 15]);
  });

  test("a cleared child ends the chain", () => {
    const node = h.div({}, [h.p({ marginTop: 15, clear: "both" }, ["x"])]);
    assert.deepEqual(effectiveTopMargins(styleOf, node, styleOf(node), 400), [0]);
  });

  test("collapse-through needs an empty, unbordered, auto-height box", () => {
    const empty = h.div({ marginTop: 5 });
    assert.equal(collapsesThrough(styleOf, empty, styleOf(empty)), true);
    const nested = h.div({}, [h.div(), h.div({ position: "absolute" }, ["x"])]);
    assert.equal(collapsesThrough(styleOf, nested, styleOf(nested)), true);
    const text = h.div({}, ["x"]);
    assert.equal(collapsesThrough(styleOf, text, styleOf(text)), false);
    const tall = h.div({ height: 1 });
    assert.equal(collapsesThrough(styleOf, tall, styleOf(tall)), false);
    const bordered = h.div({ borderBottomWidth: 1 });
    assert.equal(collapsesThrough(styleOf, bordered, styleOf(bordered)), false);
  });
});

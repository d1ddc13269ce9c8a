import { assert, describe, test } from "@boxflow/testkit";
import { h } from "../../document/h.js";
import { computeStyle } from "../../style/computeStyle.js";
import { type IntrinsicEnv, intrinsicSizes } from "../intrinsic.js";
import { fixedAdvanceMeasurer } from "../textMeasure.js";

const PARENT = computeStyle({ fontSize: 10 });

const env: IntrinsicEnv = {
  styleOf: (node, parent) => computeStyle(node.style, parent),
  measureText: fixedAdvanceMeasurer,
  naturalImageSize: () => ({ width: 40, height: 30 }),
};

const sizes = (node: Parameters<typeof intrinsicSizes>[1]) => intrinsicSizes(env, node, PARENT);

describe("intrinsic sizes", () => {
  test("text: widest word and whole run", () => {
    assert.deepEqual(sizes(h.text("aaa  bb ")), { minContent: 18, maxContent: 36 });
    assert.deepEqual(sizes(h.div({ whiteSpace: "nowrap" }, ["aaa bb"])), { minContent: 36, maxContent: 36 });
  });

  test("inline elements join the run with their edges", () => {
    assert.deepEqual(sizes(h.div({}, ["aa ", h.span({ paddingLeft: 4 }, ["bbb"])])), {
      minContent: 22,
      maxContent: 40,
    });
  });

  test("whitespace collapses across text nodes and is kept between them", () => {
    assert.deepEqual(sizes(h.div({}, ["hello ", h.b({}, ["world"])])), { minContent: 30, maxContent: 66 });
    assert.deepEqual(sizes(h.div({}, ["a ", h.b({}, [" b "]), " "])), { minContent: 6, maxContent: 18 });
  });

  test("a word split across elements is one unbreakable unit", () => {
    assert.deepEqual(sizes(h.div({}, ["aa", h.b({}, ["bbb"]), "c dd"])), { minContent: 36, maxContent: 54 });
  });

  test("atomic inlines are unbreakable with their margins", () => {
    assert.deepEqual(sizes(h.div({}, [h.span({ display: "inline-block", width: 30, marginLeft: 5 })])), {
      minContent: 35,
      maxContent: 35,
    });
    assert.deepEqual(sizes(h.img({ src: "a.png" })), { minContent: 40, maxContent: 40 });
  });

  test("line breaks and blocks end a run", () => {
    assert.deepEqual(sizes(h.div({}, ["aaa", h.br(), "bbbbb"])), { minContent: 30, maxContent: 30 });
    assert.deepEqual(sizes(h.div({}, [h.span({ float: "left", width: 20 }), "aa"])), {
      minContent: 20,
      maxContent: 20,
    });
  });

  test("border-box edges are added and limits clamp the content", () => {
    assert.deepEqual(sizes(h.div({ paddingLeft: 3, borderWidth: 1 }, ["a"])), { minContent: 11, maxContent: 11 });
    assert.deepEqual(sizes(h.div({ maxWidth: 20 }, ["aaaaaa"])), { minContent: 20, maxContent: 20 });
  });

  test("hidden and out-of-flow content counts for nothing", () => {
    assert.deepEqual(sizes(h.div({ display: "none" }, ["aaaa"])), { minContent: 0, maxContent: 0 });
    assert.deepEqual(sizes(h.div({}, [h.span({ position: "absolute" }, ["aaaa"])])), {
      minContent: 0,
      maxContent: 0,
    });
  });
});

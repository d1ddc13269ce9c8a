import { assert, describe, geometryOf, test } from "@boxflow/testkit";
import { createLayoutEngine } from "@boxflow/core";
import { fromHtml } from "../fromHtml.js";

const engine = createLayoutEngine({ devMode: false, defaultFontSize: 10 });

describe("markup layouts", () => {
  test("a sized box with margins", () => {
    const { root } = engine.layout(fromHtml('<div style="width: 100px; height: 100px; margin: 20px"></div>'));
    assert.deepEqual(geometryOf(root), { x: 20, y: 20, width: 100, height: 100 });
  });

  test("sibling margins collapse", () => {
    const { root } = engine.layout(
      fromHtml(
        `<div>
          <div style="height: 10px; margin-bottom: 30px"></div>
          <div style="height: 10px; margin-top: 20px"></div>
        </div>`,
      ),
    );
    const [first, second] = root.children;
    assert.equal((second?.y ?? 0) - ((first?.y ?? 0) + (first?.height ?? 0)), 30);
  });

  test("text beside a float", () => {
    const { root } = engine.layout(
      fromHtml('<div style="width: 400px"><div style="float: left; width: 100px; height: 50px"></div>hello</div>'),
    );
    const text = root.children[1];
    assert.deepEqual([text?.text, text?.x, text?.y], ["hello", 100, 0]);
  });

  test("a paragraph with bold text wraps inside a narrow column", () => {
    const { root } = engine.layout(fromHtml("<div style=\"width: 60px\"><p>aaa <b>bbb</b> ccc</p></div>"));
    const p = root.children[0];
    assert.deepEqual(
      p?.lineBoxes?.map((l) => l.y),
      [0, 12],
    );
    assert.equal(p?.height, 24);
  });

  test("vertical-align from a style attribute", () => {
    const { root } = engine.layout(
      fromHtml(
        '<div style="width: 200px">a<span style="display: inline-block; width: 20px; height: 30px"></span>' +
          '<span style="display: inline-block; width: 10px; height: 10px; vertical-align: bottom"></span></div>',
      ),
    );
    const last = root.children[2];
    assert.deepEqual([last?.x, last?.y], [26, 20]);
  });
});

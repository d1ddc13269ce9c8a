import { assert, describe, test } from "@boxflow/testkit";
import { computeStyle } from "../computeStyle.js";
import { INITIAL_STYLE, initialStyleWithFontSize } from "../initial.js";

function reported(decl: Parameters<typeof computeStyle>[0]): Array<[string, unknown]> {
  const issues: Array<[string, unknown]> = [];
  computeStyle(decl, INITIAL_STYLE, (property, value) => issues.push([property, value]));
  return issues;
}

describe("computeStyle", () => {
  test("an empty declaration yields the initial style", () => {
    assert.deepEqual(computeStyle({}), INITIAL_STYLE);
    assert.deepEqual(computeStyle(undefined), INITIAL_STYLE);
    assert.equal(Object.isFrozen(computeStyle({})), true);
  });

  test("text properties inherit and box properties do not", () => {
    const parent = computeStyle({
      fontSize: 20,
      textAlign: "center",
      whiteSpace: "nowrap",
      width: 100,
      verticalAlign: "middle",
    });
    const child = computeStyle({}, parent);
    assert.deepEqual(
      [child.fontSize, child.textAlign, child.whiteSpace, child.width, child.verticalAlign],
      [20, "center", "nowrap", "auto", "baseline"],
    );
  });

  test("edge shorthands expand in top, right, bottom, left order", () => {
    const two = computeStyle({ margin: [1, 2] });
    assert.deepEqual([two.marginTop, two.marginRight, two.marginBottom, two.marginLeft], [1, 2, 1, 2]);
    const three = computeStyle({ padding: [1, 2, 3] });
    assert.deepEqual(
      [three.paddingTop, three.paddingRight, three.paddingBottom, three.paddingLeft],
      [1, 2, 3, 2],
    );
    const one = computeStyle({ borderWidth: 4 });
    assert.equal(one.borderLeftWidth, 4);
  });

  test("longhands override shorthands", () => {
    const s = computeStyle({ margin: 5, marginLeft: "auto" });
    assert.deepEqual([s.marginTop, s.marginLeft], [5, "auto"]);
  });

  test("percentages are kept for layout to resolve", () => {
    assert.equal(computeStyle({ width: "50%" }).width, "50%");
  });

  test("invalid values fall back and are reported", () => {
    const s = computeStyle({ width: -10, fontSize: 0, zIndex: 1.5, paddingTop: "-5%" });
    assert.deepEqual(
      [s.width, s.fontSize, s.zIndex, s.paddingTop],
      ["auto", INITIAL_STYLE.fontSize, "auto", 0],
    );
    assert.deepEqual(reported({ width: -10, lineHeight: 0, height: Number.NaN }), [
      ["width", -10],
      ["height", Number.NaN],
      ["lineHeight", 0],
    ]);
  });

  test("negative margins are allowed", () => {
    assert.equal(computeStyle({ marginTop: -20 }).marginTop, -20);
    assert.deepEqual(reported({ marginTop: -20 }), []);
  });

  test("the root style can carry a different font size", () => {
    assert.equal(initialStyleWithFontSize(16), INITIAL_STYLE);
    assert.equal(initialStyleWithFontSize(10).fontSize, 10);
  });
});

import { assert, describe, test } from "@boxflow/testkit";
import { parseInlineStyle, parseLengthPercentage, parsePx } from "../inlineStyle.js";

describe("parseInlineStyle", () => {
  test("lengths, percentages and edge shorthands", () => {
    assert.deepEqual(parseInlineStyle("width: 100px; height: 50%; margin: 10px 20px"), {
      width: 100,
      height: "50%",
      margin: [10, 20],
    });
    assert.deepEqual(parseInlineStyle("padding: 1px 2px 3px 4px"), { padding: [1, 2, 3, 4] });
    assert.deepEqual(parseInlineStyle("margin: 0 auto"), { margin: [0, "auto"] });
  });

  test("a later shorthand resets earlier longhands", () => {
    assert.deepEqual(parseInlineStyle("margin-left: 5px; margin: 10px"), { margin: 10 });
    assert.deepEqual(parseInlineStyle("margin: 10px; margin-left: 5px"), { margin: 10, marginLeft: 5 });
  });

  test("border shorthands contribute only their width", () => {
    assert.deepEqual(parseInlineStyle("border: 2px solid red"), { borderWidth: 2 });
    assert.deepEqual(parseInlineStyle("border: none"), { borderWidth: 0 });
    assert.deepEqual(parseInlineStyle("border: solid"), { borderWidth: 3 });
    assert.deepEqual(parseInlineStyle("border-top: thick dashed"), { borderTopWidth: 5 });
    assert.deepEqual(parseInlineStyle("border-width: thin 2px"), { borderWidth: [1, 2] });
  });

  test("keywords and text properties", () => {
    assert.deepEqual(
      parseInlineStyle(
        "display: inline-block; position: relative; float: right; clear: both; overflow: hidden; " +
          "text-align: center; white-space: nowrap; z-index: 3",
      ),
      {
        display: "inline-block",
        position: "relative",
        float: "right",
        clear: "both",
        overflow: "hidden",
        textAlign: "center",
        whiteSpace: "nowrap",
        zIndex: 3,
      },
    );
    assert.deepEqual(parseInlineStyle("font-weight: 700; font-size: 12px"), { fontWeight: "bold", fontSize: 12 });
    assert.deepEqual(parseInlineStyle("font-weight: 400"), { fontWeight: "normal" });
    assert.deepEqual(parseInlineStyle("line-height: 20px"), { lineHeight: 20 });
    assert.deepEqual(parseInlineStyle("vertical-align: middle"), { verticalAlign: "middle" });
    assert.deepEqual(parseInlineStyle("vertical-align: 3px"), {});
  });

  test("unknown properties and unparseable values are dropped", () => {
    assert.deepEqual(
      parseInlineStyle("color: red; width: wide; line-height: 1.5; font-weight: heavy; height: auto !important"),
      { height: "auto" },
    );
    assert.deepEqual(parseInlineStyle("margin: 1px 2px 3px 4px 5px"), {});
    assert.deepEqual(parseInlineStyle(""), {});
  });

  test("property names and values are case-insensitive", () => {
    assert.deepEqual(parseInlineStyle("WIDTH: 10PX; Display: BLOCK"), { width: 10, display: "block" });
  });
});

describe("length parsing", () => {
  test("px and unitless numbers", () => {
    assert.equal(parsePx("12.5px"), 12.5);
    assert.equal(parsePx("-3"), -3);
    assert.equal(parsePx(".5px"), 0.5);
    assert.equal(parsePx("1em"), null);
  });

  test("percentages keep their sign", () => {
    assert.equal(parseLengthPercentage("-10%"), "-10%");
    assert.equal(parseLengthPercentage("25.5%"), "25.5%");
    assert.equal(parseLengthPercentage("8px"), 8);
  });
});

import { assert, describe, test } from "@boxflow/testkit";
import { h } from "../../document/h.js";
import type { DocNode } from "../../document/types.js";
import { computeStyle } from "../../style/computeStyle.js";
import type { StyleDeclaration } from "../../style/types.js";
import { ConstraintSpace } from "../constraintSpace.js";
import { collectInlineItems } from "../inline/collect.js";
import type { InlineItem } from "../inline/items.js";
import { COLLECT_ENV } from "./inlineFixtures.js";

const SPACE = new ConstraintSpace({ availableWidth: 200 });

function collect(
  children: readonly DocNode[],
  container: StyleDeclaration = {},
  firstLetter?: StyleDeclaration,
): readonly InlineItem[] {
  const style = computeStyle({ fontSize: 10, ...container });
  return collectInlineItems(children, style, SPACE, COLLECT_ENV, { firstLetter });
}

function texts(items: readonly InlineItem[]): string[] {
  const out: string[] = [];
  for (const item of items) if (item.kind === "text") out.push(item.text);
  return out;
}

describe("collectInlineItems", () => {
  test("text splits into words that keep their trailing space", () => {
    const items = collect([h.text("ab  cd")]);
    assert.deepEqual(texts(items), ["ab ", "cd"]);
    assert.deepEqual(
      items.map((item) => [item.width, item.height]),
      [
        [18, 12],
        [12, 12],
      ],
    );
    const first = items[0];
    assert.equal(first?.kind === "text" ? first.hangingWidth : -1, 6);
  });

  test("whitespace collapses across text nodes", () => {
    assert.deepEqual(texts(collect([h.text("a "), h.text(" b")])), ["a ", "b"]);
    assert.deepEqual(texts(collect([h.text("  a")])), ["a"]);
  });

  test("inline elements become open and close markers carrying their edges", () => {
    const items = collect([h.span({ paddingLeft: 4, marginRight: 3 }, ["x"])]);
    assert.deepEqual(
      items.map((item) => [item.kind, item.width]),
      [
        ["open-tag", 4],
        ["text", 6],
        ["close-tag", 3],
      ],
    );
  });

  test("words split only by markers are glued", () => {
    const items = collect([h.text("ab"), h.b({}, ["cd"]), h.text(" ef")]);
    const glued = items.map((item) => (item.kind === "text" ? `${item.text}:${item.noBreakAfter}` : item.kind));
    assert.deepEqual(glued, ["ab:true", "open-tag", "cd:false", "close-tag", " :false", "ef:false"]);
  });

  test("each element kind maps to its item kind", () => {
    const items = collect([
      h.img({ src: "a.png" }),
      h.span({ float: "right" }),
      h.br(),
      h.div({}, ["block"]),
      h.span({ position: "absolute" }),
      h.span({ display: "none" }, ["hidden"]),
    ]);
    assert.deepEqual(
      items.map((item) => item.kind),
      ["atomic", "float", "control", "block-child", "out-of-flow"],
    );
    const floated = items[1];
    assert.equal(floated?.kind === "float" ? floated.side : null, "right");
    assert.deepEqual([floated?.width, floated?.height], [30, 20]);
    assert.equal(items[2]?.height, 12);
  });

  test("an inline wrapping only blocks adds no markers", () => {
    const items = collect([h.span({}, [h.div({}, ["x"]), " "])]);
    assert.deepEqual(
      items.map((item) => item.kind),
      ["block-child"],
    );
  });

  test("nowrap keeps each text node as one item", () => {
    assert.deepEqual(texts(collect([h.text("ab cd")], { whiteSpace: "nowrap" })), ["ab cd"]);
  });

  test("the first letter is styled separately and glued to its word", () => {
    const items = collect([h.text("Hello")], {}, { fontSize: 20 });
    assert.deepEqual(
      items.map((item) => (item.kind === "text" ? [item.text, item.width, item.noBreakAfter] : [])),
      [
        ["H", 12, true],
        ["ello", 24, false],
      ],
    );
  });
});

import { assert, describe, test } from "@boxflow/testkit";
import {
  collapseAfter,
  collapseWhitespace,
  isWhitespaceOnly,
  splitFirstLetter,
  splitWords,
} from "../inline/textRuns.js";

describe("text runs", () => {
  test("whitespace runs collapse to one space", () => {
    assert.equal(collapseWhitespace("a \n\t b"), "a b");
    assert.equal(isWhitespaceOnly(" \n "), true);
    assert.equal(isWhitespaceOnly(" a "), false);
  });

  test("a leading space after a space is dropped", () => {
    assert.equal(collapseAfter("  hi  ", true), "hi ");
    assert.equal(collapseAfter("  hi  ", false), " hi ");
  });

  test("words keep their trailing space", () => {
    assert.deepEqual(splitWords("a bc d "), ["a ", "bc ", "d "]);
    assert.deepEqual(splitWords(" a"), [" ", "a"]);
    assert.deepEqual(splitWords(""), []);
  });

  test("first letter takes surrounding punctuation", () => {
    assert.deepEqual(splitFirstLetter("Hello"), ["H", "ello"]);
    assert.deepEqual(splitFirstLetter("\"Quote\""), ["\"Q", "uote\""]);
    assert.deepEqual(splitFirstLetter("A. b"), ["A.", " b"]);
    assert.equal(splitFirstLetter(" x"), null);
  });
});

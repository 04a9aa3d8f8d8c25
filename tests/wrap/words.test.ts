import { describe, expect, it } from "@jest/globals";

import { splitWords } from "../../src/wrap/words.js";

describe("splitWords", () => {
  it("keeps surrounding whitespace with each word", () => {
    expect(splitWords("  foo bar ")).toEqual([
      { start: 0, end: 6, word: "  foo " },
      { start: 6, end: 10, word: "bar " },
    ]);
  });

  it("counts code points for offsets", () => {
    expect(splitWords("😽 x")).toEqual([
      { start: 0, end: 2, word: "😽 " },
      { start: 2, end: 3, word: "x" },
    ]);
  });

  it("returns nothing for blank input", () => {
    expect(splitWords("")).toEqual([]);
    expect(splitWords("   ")).toEqual([]);
  });
});

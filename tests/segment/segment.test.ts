import { describe, expect, it } from "@jest/globals";

import {
  segmentsCellLength,
  segmentsToAnsi,
  splitSegmentLines,
} from "../../src/segment/segment.js";
import { Style } from "../../src/style/style.js";

const bold = Style.parse("bold");

describe("segmentsCellLength", () => {
  it("sums the cell widths of every segment", () => {
    expect(segmentsCellLength([{ text: "ab" }, { text: "あ", style: bold }])).toBe(
      4,
    );
  });
});

describe("segmentsToAnsi", () => {
  it("paints styled segments only", () => {
    expect(
      segmentsToAnsi([{ text: "a", style: bold }, { text: "b" }], {
        colorLevel: 1,
      }),
    ).toBe("\u001b[1ma\u001b[22mb");
  });
});

describe("splitSegmentLines", () => {
  it("splits on newlines and keeps styles on both halves", () => {
    expect(
      splitSegmentLines([{ text: "ab\ncd", style: bold }, { text: "e" }]),
    ).toEqual([
      [{ text: "ab", style: bold }],
      [{ text: "cd", style: bold }, { text: "e" }],
    ]);
  });

  it("does not emit a trailing empty line", () => {
    expect(splitSegmentLines([{ text: "a\n" }])).toEqual([[{ text: "a" }]]);
  });

  it("keeps interior empty lines", () => {
    expect(splitSegmentLines([{ text: "a\n\nb" }])).toEqual([
      [{ text: "a" }],
      [],
      [{ text: "b" }],
    ]);
  });
});

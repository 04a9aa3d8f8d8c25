import { describe, expect, it } from "@jest/globals";

import { Style } from "../../src/style/style.js";
import { Lines } from "../../src/text/lines.js";
import { Span } from "../../src/text/span.js";
import { Text } from "../../src/text/text.js";

const bold = Style.parse("bold");

function linesOf(...plains: string[]): Lines {
  return new Lines(plains.map((plain) => new Text(plain)));
}

describe("Lines", () => {
  it("behaves as a list of text", () => {
    const lines = linesOf("a", "b");
    lines.push(new Text("c"));

    expect(lines.length).toBe(3);
    expect(lines.at(-1)?.plain).toBe("c");
    expect(lines.pop()?.plain).toBe("c");
    expect([...lines].map((line) => line.plain)).toEqual(["a", "b"]);
  });

  it("extends with many lines", () => {
    const lines = new Lines().extend(
      Array.from({ length: 200000 }, () => new Text("x")),
    );
    lines.push(new Text("y"), new Text("z"));

    expect(lines.length).toBe(200002);
    expect(lines.at(-1)?.plain).toBe("z");
  });

  it("renders every line in order", () => {
    const lines = linesOf("a", "b");

    expect(lines.render().map((segment) => segment.text)).toEqual([
      "a",
      "\n",
      "b",
      "\n",
    ]);
  });
});

describe("Lines.justify", () => {
  it("pads left-justified lines", () => {
    expect(linesOf("ab", "abcdef").justify(4, "left").plains()).toEqual([
      "ab  ",
      "abcd",
    ]);
  });

  it("centers lines, giving the odd cell to the right", () => {
    expect(linesOf("ab", "ab ").justify(5, "center").plains()).toEqual([
      " ab  ",
      " ab  ",
    ]);
  });

  it("right-aligns lines after stripping trailing spaces", () => {
    expect(linesOf("ab ").justify(5, "right").plains()).toEqual(["   ab"]);
  });

  it("stretches every line but the last to the full width", () => {
    expect(linesOf("a b c", "end").justify(9, "full").plains()).toEqual([
      "a   b   c",
      "end      ",
    ]);
  });

  it("gives spare spaces to the rightmost gaps", () => {
    expect(linesOf("a b c", "end").justify(10, "full").plains()).toEqual([
      "a   b    c",
      "end       ",
    ]);
  });

  it("moves spans with the inserted spaces", () => {
    const lines = new Lines([
      new Text("a b c", {
        spans: [new Span(0, 3, bold), new Span(4, 5, bold)],
      }),
      new Text("end"),
    ]).justify(9, "full");

    expect(lines.at(0)?.spans.map((span) => [span.start, span.end])).toEqual([
      [0, 5],
      [8, 9],
    ]);
  });

  it("pads full-justified lines without gaps", () => {
    expect(linesOf("abc", "end").justify(5, "full").plains()).toEqual([
      "abc  ",
      "end  ",
    ]);
  });
});

import { describe, expect, it } from "@jest/globals";

import { renderText } from "../../src/render/text.js";
import { Style } from "../../src/style/style.js";
import { Span } from "../../src/text/span.js";
import { Text } from "../../src/text/text.js";

const quiet = { env: {}, detectColorLevel: () => 0 as const };

describe("renderText", () => {
  it("wraps to the given width", () => {
    expect(
      renderText(new Text("foo bar baz"), {
        width: 3,
        colorLevel: 0,
        environment: quiet,
      }),
    ).toBe("foo\nbar\nbaz\n");
  });

  it("paints spans with ANSI sequences", () => {
    const text = new Text("Hello World", {
      spans: [new Span(0, 5, Style.parse("bold"))],
    });

    expect(
      renderText(text, { width: 20, colorLevel: 1, environment: quiet }),
    ).toBe("\u001b[1mHello\u001b[22m World\n");
  });

  it("takes the width and tab size from the environment", () => {
    expect(
      renderText(new Text("a\tb c"), {
        environment: {
          env: { COLUMNS: "4", TERMSPAN_TAB_SIZE: "2" },
          detectColorLevel: () => 0,
        },
      }),
    ).toBe("a  b\nc\n");
  });

  it("justifies and truncates", () => {
    expect(
      renderText(new Text("Hello World"), {
        width: 8,
        colorLevel: 0,
        noWrap: true,
        overflow: "ellipsis",
        environment: quiet,
      }),
    ).toBe("Hello W…\n");
    expect(
      renderText(new Text("ab"), {
        width: 4,
        colorLevel: 0,
        justify: "right",
        environment: quiet,
      }),
    ).toBe("  ab\n");
  });

  it("leaves the source text untouched", () => {
    const text = new Text("foo bar");
    renderText(text, { width: 3, colorLevel: 0, environment: quiet });

    expect(text.end).toBe("\n");
    expect(text.plain).toBe("foo bar");
  });
});

import { describe, expect, it } from "@jest/globals";

import { parseColor } from "../../src/style/colors.js";
import { StyleSyntaxError } from "../../src/style/errors.js";
import { Style } from "../../src/style/style.js";

describe("Style.parse", () => {
  it("reads attributes and colors", () => {
    const style = Style.parse("bold red on white");

    expect(style.get("bold")).toBe(true);
    expect(style.color).toEqual({ kind: "standard", name: "red", bright: false });
    expect(style.bgcolor).toEqual({
      kind: "standard",
      name: "white",
      bright: false,
    });
    expect(style.toString()).toBe("bold red on white");
  });

  it("accepts attribute aliases and negation", () => {
    expect(Style.parse("b i").toString()).toBe("bold italic");
    expect(Style.parse("not bold").get("bold")).toBe(false);
    expect(Style.parse("STRIKETHROUGH inverse").toString()).toBe(
      "reverse strike",
    );
  });

  it("normalizes color spellings", () => {
    expect(Style.parse("grey").toString()).toBe("bright_black");
    expect(Style.parse("#FF8800").toString()).toBe("#ff8800");
    expect(Style.parse("on bright_blue").toString()).toBe("on bright_blue");
  });

  it("parses empty and none definitions to the null style", () => {
    expect(Style.parse("").isNull).toBe(true);
    expect(Style.parse("  none ")).toBe(Style.null());
    expect(Style.null().toString()).toBe("none");
  });

  it("rejects unknown words", () => {
    expect(() => Style.parse("bold wobble")).toThrow(StyleSyntaxError);
    expect(() => Style.parse("bold wobble")).toThrow(
      'Invalid style "bold wobble": unknown word "wobble".',
    );
    expect(() => Style.parse("red on")).toThrow(
      'Invalid style "red on": expected a color after "on".',
    );
    expect(() => Style.parse("not red")).toThrow(
      'Invalid style "not red": unknown attribute "red".',
    );
  });

  it("rejects unknown colors passed as options", () => {
    expect(() => new Style({ color: "purple" })).toThrow(
      'Invalid style "purple": unknown color "purple".',
    );
  });
});

describe("parseColor", () => {
  it("returns undefined for non-colors", () => {
    expect(parseColor("bright_wobble")).toBeUndefined();
    expect(parseColor("#12345")).toBeUndefined();
  });
});

describe("Style.add", () => {
  it("lets the right-hand side override what it sets", () => {
    const combined = Style.parse("bold red").add(Style.parse("not bold blue"));

    expect(combined.toString()).toBe("not bold blue");
  });

  it("inherits what the right-hand side leaves unset", () => {
    const combined = Style.parse("italic on black").add(Style.parse("red"));

    expect(combined.toString()).toBe("italic red on black");
  });

  it("returns the other operand when one side is null", () => {
    const bold = Style.parse("bold");

    expect(Style.null().add(bold)).toBe(bold);
    expect(bold.add(Style.null())).toBe(bold);
    expect(bold.add(undefined)).toBe(bold);
  });

  it("combines a list left to right", () => {
    const combined = Style.combine([
      Style.parse("bold"),
      Style.parse("red"),
      Style.parse("not bold"),
    ]);

    expect(combined.toString()).toBe("not bold red");
    expect(Style.combine([]).isNull).toBe(true);
  });
});

describe("Style.equals", () => {
  it("compares by value", () => {
    expect(Style.parse("bold red").equals(new Style({ bold: true, color: "red" })))
      .toBe(true);
    expect(Style.parse("bold").equals(Style.parse("italic"))).toBe(false);
    expect(Style.null().equals(undefined)).toBe(true);
  });
});

describe("Style.render", () => {
  it("wraps text in SGR sequences", () => {
    expect(Style.parse("bold").render("Hi", { colorLevel: 1 })).toBe(
      "\u001b[1mHi\u001b[22m",
    );
    expect(Style.parse("bold red").render("Hi", { colorLevel: 1 })).toBe(
      "\u001b[1m\u001b[31mHi\u001b[39m\u001b[22m",
    );
    expect(Style.parse("on blue").render("Hi", { colorLevel: 1 })).toBe(
      "\u001b[44mHi\u001b[49m",
    );
  });

  it("uses true color at level 3", () => {
    expect(Style.parse("#ff8800").render("Hi", { colorLevel: 3 })).toBe(
      "\u001b[38;2;255;136;0mHi\u001b[39m",
    );
  });

  it("leaves text untouched without color support or style", () => {
    expect(Style.parse("bold").render("Hi", { colorLevel: 0 })).toBe("Hi");
    expect(Style.null().render("Hi", { colorLevel: 3 })).toBe("Hi");
    expect(Style.parse("not bold").render("Hi", { colorLevel: 1 })).toBe("Hi");
  });
});

import { describe, expect, it } from "@jest/globals";

import { Style } from "../../src/style/style.js";
import { UnknownThemeStyleError } from "../../src/theme/errors.js";
import { Theme } from "../../src/theme/theme.js";

describe("Theme", () => {
  it("includes the default styles", () => {
    const theme = Theme.default();

    expect(theme.get("repr.number")?.toString()).toBe("bold cyan");
    expect(theme.get("missing")).toBeUndefined();
  });

  it("accepts styles and definitions", () => {
    const theme = new Theme(
      { accent: Style.parse("underline"), muted: "dim" },
      { inherit: false },
    );

    expect(theme.names).toEqual(["accent", "muted"]);
    expect(theme.get("muted")?.toString()).toBe("dim");
  });

  it("resolves names first, then style definitions", () => {
    const theme = new Theme({ accent: "bold blue" });

    expect(theme.resolve("accent").toString()).toBe("bold blue");
    expect(theme.resolve("italic red").toString()).toBe("italic red");
    expect(() => theme.resolve("wobble")).toThrow(UnknownThemeStyleError);
    expect(() => theme.resolve("wobble")).toThrow(
      'Unknown theme style "wobble".',
    );
  });

  it("extends without changing the original", () => {
    const base = new Theme({ accent: "bold" }, { inherit: false });
    const extended = base.extend({ accent: "italic", extra: "red" });

    expect(extended.names).toEqual(["accent", "extra"]);
    expect(extended.get("accent")?.toString()).toBe("italic");
    expect(base.get("accent")?.toString()).toBe("bold");
  });
});

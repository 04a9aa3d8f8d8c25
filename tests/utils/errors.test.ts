import { describe, expect, test } from "@jest/globals";

import { StyleSyntaxError } from "../../src/style/errors.js";
import { HintedError, toErrorMessage } from "../../src/utils/errors.js";

describe("HintedError", () => {
  test("keeps the headline, details and hints", () => {
    const cause = new Error("root");
    const error = new HintedError("Something failed", {
      detailLines: ["first detail"],
      hintLines: ["try again"],
      cause,
    });

    expect(error.message).toBe("Something failed");
    expect(error.headline).toBe("Something failed");
    expect(error.detailLines).toEqual(["first detail"]);
    expect(error.hintLines).toEqual(["try again"]);
    expect(error.cause).toBe(cause);
  });
});

describe("DisplayableError", () => {
  test("displays its message and hint", () => {
    const error = new StyleSyntaxError("blod", 'unknown word "blod"');

    expect(error.messageForDisplay()).toBe(
      'Invalid style "blod": unknown word "blod".',
    );
    expect(error.definition).toBe("blod");
    expect(error.hintLines).toHaveLength(1);
  });
});

describe("toErrorMessage", () => {
  test("reads errors and stringifies other values", () => {
    expect(toErrorMessage(new Error("boom"))).toBe("boom");
    expect(toErrorMessage(42)).toBe("42");
  });
});

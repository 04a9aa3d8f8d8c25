import { describe, expect, it, jest } from "@jest/globals";

import {
  formatYamlErrorDetail,
  parseYamlDocument,
  type YamlParseErrorDetail,
} from "../../../src/configs/shared/yaml.js";

describe("parseYamlDocument", () => {
  it("returns the empty value for blank content", () => {
    const result = parseYamlDocument("\n   \t", {
      emptyValue: { sentinel: true },
      formatError: () => new Error("should not parse"),
    });

    expect(result).toEqual({ sentinel: true });
  });

  it("parses mappings", () => {
    expect(
      parseYamlDocument("styles:\n  info: cyan\n", {
        formatError: () => new Error("should not fail"),
      }),
    ).toEqual({ styles: { info: "cyan" } });
  });

  it("passes parse locations to the error formatter", () => {
    const formatError = jest.fn<(detail: YamlParseErrorDetail) => Error>(
      () => new Error("yaml failed"),
    );

    expect(() =>
      parseYamlDocument("styles:\n  info: [", { formatError }),
    ).toThrow("yaml failed");

    expect(formatError).toHaveBeenCalledTimes(1);
    const detail = formatError.mock.calls[0]?.[0];
    expect(detail?.line).toBeGreaterThanOrEqual(1);
    expect(detail?.column).toBeGreaterThanOrEqual(1);
  });
});

describe("formatYamlErrorDetail", () => {
  it("prefixes the location when known", () => {
    expect(
      formatYamlErrorDetail({ reason: "bad indentation", line: 2, column: 5 }),
    ).toBe("(line 2, column 5): bad indentation");
  });

  it("falls back to the message", () => {
    expect(formatYamlErrorDetail({ message: "boom" })).toBe("boom");
    expect(formatYamlErrorDetail({})).toBe("unknown error");
  });
});

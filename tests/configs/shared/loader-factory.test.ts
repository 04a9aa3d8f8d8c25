import { describe, expect, jest, test } from "@jest/globals";

import {
  type BaseConfigLoaderOptions,
  createConfigLoader,
} from "../../../src/configs/shared/loader-factory.js";

const TEST_ROOT = "/repo";
const DEFAULT_PATH = `${TEST_ROOT}/config.yaml`;

const baseLoader = createConfigLoader<string, BaseConfigLoaderOptions>({
  resolveFilePath: (root, options) => options.filePath ?? `${root}/config.yaml`,
  handleMissing: ({ filePath }) => `missing ${filePath}`,
  parse: (content, { root }) => `${root}: ${content.trim()}`,
});

function errnoError(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(code), { code });
}

describe("createConfigLoader", () => {
  test("returns the fallback when the file is missing", () => {
    const result = baseLoader({
      root: TEST_ROOT,
      readFile: () => {
        throw errnoError("ENOENT");
      },
    });

    expect(result).toBe(`missing ${DEFAULT_PATH}`);
  });

  test("rethrows other read failures", () => {
    expect(() =>
      baseLoader({
        root: TEST_ROOT,
        readFile: () => {
          throw errnoError("EACCES");
        },
      }),
    ).toThrow("EACCES");
  });

  test("reads through the injected readFile", () => {
    const readFile = jest.fn<(path: string) => string>(() => "  contents ");

    const result = baseLoader({ root: TEST_ROOT, readFile });

    expect(readFile).toHaveBeenCalledWith(DEFAULT_PATH);
    expect(result).toBe("/repo: contents");
  });

  test("prefers an explicit file path", () => {
    const readFile = jest.fn<(path: string) => string>(() => "x");

    baseLoader({ root: TEST_ROOT, filePath: "/tmp/other.yaml", readFile });

    expect(readFile).toHaveBeenCalledWith("/tmp/other.yaml");
  });
});

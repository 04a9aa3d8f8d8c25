import { join } from "node:path";

import {
  type BaseConfigLoaderOptions,
  createConfigLoader,
} from "../configs/shared/loader-factory.js";
import {
  formatYamlErrorDetail,
  parseYamlDocument,
} from "../configs/shared/yaml.js";
import { StyleSyntaxError } from "../style/errors.js";
import { toErrorMessage } from "../utils/errors.js";
import { ThemeConfigError } from "./errors.js";
import { Theme } from "./theme.js";
import { themeDocumentSchema } from "./types.js";

export const THEME_DIRECTORY = ".termspan" as const;
export const THEME_FILENAME = "theme.yaml" as const;

export type LoadThemeOptions = BaseConfigLoaderOptions;

export function resolveThemePath(root: string): string {
  return join(root, THEME_DIRECTORY, THEME_FILENAME);
}

const themeLoader = createConfigLoader<Theme, LoadThemeOptions>({
  resolveFilePath: (root, options) =>
    options.filePath ?? resolveThemePath(root),
  handleMissing: () => Theme.default(),
  parse: (content, { filePath }) => parseTheme(content, filePath),
});

/**
 * Loads `.termspan/theme.yaml` under `root` (or `filePath`). A missing file
 * yields the default theme.
 */
export function loadTheme(options: LoadThemeOptions = {}): Theme {
  return themeLoader(options);
}

function parseTheme(content: string, filePath: string): Theme {
  const document = parseYamlDocument(content, {
    formatError: (detail) =>
      new ThemeConfigError(filePath, formatYamlErrorDetail(detail)),
  });

  const result = themeDocumentSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join(".") : "";
    const message = issue?.message ?? "Invalid theme value";
    throw new ThemeConfigError(
      filePath,
      path.length > 0 ? `${path}: ${message}` : message,
    );
  }

  const { inherit = true, styles = {} } = result.data;
  try {
    return new Theme(styles, { inherit });
  } catch (error) {
    if (error instanceof StyleSyntaxError) {
      throw new ThemeConfigError(filePath, toErrorMessage(error));
    }
    throw error;
  }
}

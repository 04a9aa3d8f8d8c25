import { DisplayableError, type HintedErrorOptions } from "../utils/errors.js";

export class ThemeConfigError extends DisplayableError {
  public readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super(`Invalid theme file at ${filePath}: ${detail}`, {
      hintLines: [
        "Map style names to definitions under `styles`, e.g. `warning: bold yellow`.",
      ],
    });
    this.name = "ThemeConfigError";
    this.filePath = filePath;
  }
}

export class UnknownThemeStyleError extends DisplayableError {
  public readonly styleName: string;

  constructor(styleName: string, options: HintedErrorOptions = {}) {
    super(`Unknown theme style "${styleName}".`, options);
    this.name = "UnknownThemeStyleError";
    this.styleName = styleName;
  }
}

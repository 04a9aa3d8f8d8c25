import { Style } from "../style/style.js";
import { DEFAULT_STYLES } from "./defaults.js";
import { UnknownThemeStyleError } from "./errors.js";

export interface ThemeOptions {
  /** Start from the default styles. Defaults to true. */
  inherit?: boolean;
}

/** A named collection of styles. */
export class Theme {
  private readonly styles: ReadonlyMap<string, Style>;

  constructor(
    styles: Readonly<Record<string, Style | string>> = {},
    options: ThemeOptions = {},
  ) {
    const resolved = new Map<string, Style>();
    if (options.inherit ?? true) {
      for (const [name, definition] of Object.entries(DEFAULT_STYLES)) {
        resolved.set(name, Style.parse(definition));
      }
    }
    for (const [name, style] of Object.entries(styles)) {
      resolved.set(name, typeof style === "string" ? Style.parse(style) : style);
    }
    this.styles = resolved;
  }

  static default(): Theme {
    return new Theme();
  }

  get names(): string[] {
    return [...this.styles.keys()].sort();
  }

  has(name: string): boolean {
    return this.styles.has(name);
  }

  get(name: string): Style | undefined {
    return this.styles.get(name);
  }

  /**
   * Looks up a theme name, falling back to parsing `value` as a style
   * definition. Throws when it is neither.
   */
  resolve(value: string): Style {
    const named = this.styles.get(value);
    if (named) {
      return named;
    }
    try {
      return Style.parse(value);
    } catch (error) {
      throw new UnknownThemeStyleError(value, { cause: error });
    }
  }

  /** Returns a new theme with `styles` layered over this one. */
  extend(styles: Readonly<Record<string, Style | string>>): Theme {
    return new Theme(
      { ...Object.fromEntries(this.styles), ...styles },
      { inherit: false },
    );
  }
}

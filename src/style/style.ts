import {
  applyBackground,
  applyForeground,
  type Color,
  type ColorLevel,
  colorToString,
  getPainter,
  type Painter,
  parseColor,
} from "./colors.js";
import { StyleSyntaxError } from "./errors.js";

export const STYLE_ATTRIBUTES = [
  "bold",
  "dim",
  "italic",
  "underline",
  "reverse",
  "conceal",
  "strike",
] as const;

export type StyleAttribute = (typeof STYLE_ATTRIBUTES)[number];

export type StyleAttributes = Partial<Record<StyleAttribute, boolean>>;

export interface StyleOptions extends StyleAttributes {
  color?: Color | string;
  bgcolor?: Color | string;
}

export interface StyleRenderOptions {
  colorLevel?: ColorLevel;
}

const ATTRIBUTE_ALIASES = new Map<string, StyleAttribute>([
  ["b", "bold"],
  ["d", "dim"],
  ["i", "italic"],
  ["u", "underline"],
  ["r", "reverse"],
  ["c", "conceal"],
  ["s", "strike"],
  ["strikethrough", "strike"],
  ["inverse", "reverse"],
  ["hidden", "conceal"],
]);

const NULL_DEFINITION = "none";

const MODIFIERS: Record<StyleAttribute, (painter: Painter) => Painter> = {
  bold: (p) => p.bold,
  dim: (p) => p.dim,
  italic: (p) => p.italic,
  underline: (p) => p.underline,
  reverse: (p) => p.inverse,
  conceal: (p) => p.hidden,
  strike: (p) => p.strikethrough,
};

const ATTRIBUTE_NAMES: ReadonlySet<string> = new Set(STYLE_ATTRIBUTES);

function isStyleAttribute(value: string): value is StyleAttribute {
  return ATTRIBUTE_NAMES.has(value);
}

function parseAttributeName(word: string): StyleAttribute | undefined {
  const alias = ATTRIBUTE_ALIASES.get(word);
  if (alias) {
    return alias;
  }
  return isStyleAttribute(word) ? word : undefined;
}

function resolveColor(
  value: Color | string | undefined,
  field: string,
): Color | undefined {
  if (value === undefined || typeof value !== "string") {
    return value;
  }
  const color = parseColor(value);
  if (!color) {
    throw new StyleSyntaxError(value, `unknown ${field} "${value}"`);
  }
  return color;
}

/**
 * An immutable set of terminal text attributes. Every attribute is
 * tri-state: enabled, explicitly disabled, or unset. Combining two styles
 * lets the right-hand side override what it sets and inherit the rest.
 */
export class Style {
  private static readonly NULL = new Style();

  public readonly attributes: Readonly<StyleAttributes>;
  public readonly color: Color | undefined;
  public readonly bgcolor: Color | undefined;

  constructor(options: StyleOptions = {}) {
    const attributes: StyleAttributes = {};
    for (const attribute of STYLE_ATTRIBUTES) {
      const value = options[attribute];
      if (value !== undefined) {
        attributes[attribute] = value;
      }
    }
    this.attributes = Object.freeze(attributes);
    this.color = resolveColor(options.color, "color");
    this.bgcolor = resolveColor(options.bgcolor, "background color");
  }

  static null(): Style {
    return Style.NULL;
  }

  /**
   * Parses a style definition such as `"bold not italic red on #202020"`.
   * The empty string and `"none"` parse to the null style.
   */
  static parse(definition: string): Style {
    const words = definition.trim().toLowerCase().split(/\s+/u);
    const [first] = words;
    if (words.length === 1 && (first === "" || first === NULL_DEFINITION)) {
      return Style.NULL;
    }

    const options: StyleOptions = {};
    for (let index = 0; index < words.length; index += 1) {
      const word = words[index] ?? "";

      if (word === "on") {
        const next = words[index + 1];
        if (next === undefined) {
          throw new StyleSyntaxError(definition, 'expected a color after "on"');
        }
        const bgcolor = parseColor(next);
        if (!bgcolor) {
          throw new StyleSyntaxError(
            definition,
            `unknown background color "${next}"`,
          );
        }
        options.bgcolor = bgcolor;
        index += 1;
        continue;
      }

      if (word === "not") {
        const next = words[index + 1];
        const attribute =
          next === undefined ? undefined : parseAttributeName(next);
        if (!attribute) {
          throw new StyleSyntaxError(
            definition,
            next === undefined
              ? 'expected an attribute after "not"'
              : `unknown attribute "${next}"`,
          );
        }
        options[attribute] = false;
        index += 1;
        continue;
      }

      const attribute = parseAttributeName(word);
      if (attribute) {
        options[attribute] = true;
        continue;
      }

      const color = parseColor(word);
      if (!color) {
        throw new StyleSyntaxError(definition, `unknown word "${word}"`);
      }
      options.color = color;
    }

    return new Style(options);
  }

  static combine(styles: readonly Style[]): Style {
    return styles.reduce<Style>(
      (combined, style) => combined.add(style),
      Style.NULL,
    );
  }

  get isNull(): boolean {
    return (
      this.color === undefined &&
      this.bgcolor === undefined &&
      Object.keys(this.attributes).length === 0
    );
  }

  get(attribute: StyleAttribute): boolean | undefined {
    return this.attributes[attribute];
  }

  add(other: Style | undefined): Style {
    if (!other || other.isNull) {
      return this;
    }
    if (this.isNull) {
      return other;
    }
    return new Style({
      ...this.attributes,
      ...other.attributes,
      color: other.color ?? this.color,
      bgcolor: other.bgcolor ?? this.bgcolor,
    });
  }

  equals(other: Style | undefined): boolean {
    if (!other) {
      return this.isNull;
    }
    return this === other || this.toString() === other.toString();
  }

  /**
   * Paints `text` with this style. Color level 0 returns the text unchanged.
   */
  render(text: string, options: StyleRenderOptions = {}): string {
    const level = options.colorLevel ?? 1;
    if (text.length === 0 || this.isNull || level === 0) {
      return text;
    }

    let painter = getPainter(level);
    for (const attribute of STYLE_ATTRIBUTES) {
      if (this.attributes[attribute] === true) {
        painter = MODIFIERS[attribute](painter);
      }
    }
    if (this.color) {
      painter = applyForeground(painter, this.color);
    }
    if (this.bgcolor) {
      painter = applyBackground(painter, this.bgcolor);
    }
    return painter(text);
  }

  toString(): string {
    const words: string[] = [];
    for (const attribute of STYLE_ATTRIBUTES) {
      const value = this.attributes[attribute];
      if (value === true) {
        words.push(attribute);
      } else if (value === false) {
        words.push(`not ${attribute}`);
      }
    }
    if (this.color) {
      words.push(colorToString(this.color));
    }
    if (this.bgcolor) {
      words.push(`on ${colorToString(this.bgcolor)}`);
    }
    return words.length > 0 ? words.join(" ") : NULL_DEFINITION;
  }
}

import chalk from "chalk";

export const STANDARD_COLORS = [
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
] as const;

export type StandardColor = (typeof STANDARD_COLORS)[number];

export type Color =
  | { kind: "default" }
  | { kind: "standard"; name: StandardColor; bright: boolean }
  | { kind: "hex"; hex: string };

/** Color support of the output device, as chalk counts it. */
export type ColorLevel = 0 | 1 | 2 | 3;

export type Painter = chalk.Chalk;

interface ColorPainters {
  normal: (painter: Painter) => Painter;
  bright: (painter: Painter) => Painter;
  background: (painter: Painter) => Painter;
  brightBackground: (painter: Painter) => Painter;
}

const PALETTE: Record<StandardColor, ColorPainters> = {
  black: {
    normal: (p) => p.black,
    bright: (p) => p.blackBright,
    background: (p) => p.bgBlack,
    brightBackground: (p) => p.bgBlackBright,
  },
  red: {
    normal: (p) => p.red,
    bright: (p) => p.redBright,
    background: (p) => p.bgRed,
    brightBackground: (p) => p.bgRedBright,
  },
  green: {
    normal: (p) => p.green,
    bright: (p) => p.greenBright,
    background: (p) => p.bgGreen,
    brightBackground: (p) => p.bgGreenBright,
  },
  yellow: {
    normal: (p) => p.yellow,
    bright: (p) => p.yellowBright,
    background: (p) => p.bgYellow,
    brightBackground: (p) => p.bgYellowBright,
  },
  blue: {
    normal: (p) => p.blue,
    bright: (p) => p.blueBright,
    background: (p) => p.bgBlue,
    brightBackground: (p) => p.bgBlueBright,
  },
  magenta: {
    normal: (p) => p.magenta,
    bright: (p) => p.magentaBright,
    background: (p) => p.bgMagenta,
    brightBackground: (p) => p.bgMagentaBright,
  },
  cyan: {
    normal: (p) => p.cyan,
    bright: (p) => p.cyanBright,
    background: (p) => p.bgCyan,
    brightBackground: (p) => p.bgCyanBright,
  },
  white: {
    normal: (p) => p.white,
    bright: (p) => p.whiteBright,
    background: (p) => p.bgWhite,
    brightBackground: (p) => p.bgWhiteBright,
  },
};

const HEX_COLOR = /^#[0-9a-f]{6}$/u;

const STANDARD_COLOR_NAMES: ReadonlySet<string> = new Set(STANDARD_COLORS);

function isStandardColor(value: string): value is StandardColor {
  return STANDARD_COLOR_NAMES.has(value);
}

/**
 * Parses a color word such as `red`, `bright_blue`, `grey` or `#ff8800`.
 * Returns undefined when the word is not a color.
 */
export function parseColor(value: string): Color | undefined {
  const name = value.trim().toLowerCase();

  if (name === "default") {
    return { kind: "default" };
  }
  if (name === "grey" || name === "gray") {
    return { kind: "standard", name: "black", bright: true };
  }
  if (HEX_COLOR.test(name)) {
    return { kind: "hex", hex: name };
  }
  if (isStandardColor(name)) {
    return { kind: "standard", name, bright: false };
  }
  if (name.startsWith("bright_")) {
    const base = name.slice("bright_".length);
    if (isStandardColor(base)) {
      return { kind: "standard", name: base, bright: true };
    }
  }
  return undefined;
}

export function colorToString(color: Color): string {
  switch (color.kind) {
    case "default":
      return "default";
    case "hex":
      return color.hex;
    case "standard":
      return color.bright ? `bright_${color.name}` : color.name;
  }
}

export function applyForeground(painter: Painter, color: Color): Painter {
  switch (color.kind) {
    case "default":
      return painter;
    case "hex":
      return painter.hex(color.hex);
    case "standard": {
      const painters = PALETTE[color.name];
      return color.bright ? painters.bright(painter) : painters.normal(painter);
    }
  }
}

export function applyBackground(painter: Painter, color: Color): Painter {
  switch (color.kind) {
    case "default":
      return painter;
    case "hex":
      return painter.bgHex(color.hex);
    case "standard": {
      const painters = PALETTE[color.name];
      return color.bright
        ? painters.brightBackground(painter)
        : painters.background(painter);
    }
  }
}

const painterCache = new Map<ColorLevel, Painter>();

export function getPainter(level: ColorLevel): Painter {
  const cached = painterCache.get(level);
  if (cached) {
    return cached;
  }
  const painter = new chalk.Instance({ level });
  painterCache.set(level, painter);
  return painter;
}

export function detectColorLevel(): ColorLevel {
  return chalk.level;
}

import stringWidth from "string-width";

export type CellWidth = 0 | 1 | 2;

const ASCII_PRINTABLE = /^[\x20-\x7e]*$/u;

const MAX_CACHED_CODE_POINTS = 4096;

/**
 * Code point ranges that occupy no terminal cell but that string-width
 * counts as narrow: zero-width spaces and joiners, bidi marks, combining
 * marks outside U+0300..U+036F, and variation selectors.
 */
const ZERO_WIDTH_RANGES: readonly (readonly [number, number])[] = [
  [0x00ad, 0x00ad],
  [0x0483, 0x0489],
  [0x0591, 0x05bd],
  [0x1ab0, 0x1aff],
  [0x1dc0, 0x1dff],
  [0x200b, 0x200f],
  [0x2028, 0x202e],
  [0x2060, 0x2064],
  [0x20d0, 0x20ff],
  [0xfe00, 0xfe0f],
  [0xfe20, 0xfe2f],
  [0xfeff, 0xfeff],
  [0xe0100, 0xe01ef],
];

const widthCache = new Map<number, CellWidth>();

function isZeroWidth(codePoint: number): boolean {
  return ZERO_WIDTH_RANGES.some(
    ([low, high]) => codePoint >= low && codePoint <= high,
  );
}

function measureCodePoint(codePoint: number): CellWidth {
  if (isZeroWidth(codePoint)) {
    return 0;
  }
  const width = stringWidth(String.fromCodePoint(codePoint));
  if (width <= 0) {
    return 0;
  }
  return width >= 2 ? 2 : 1;
}

/**
 * Number of terminal cells a single character occupies. Only the first code
 * point of `char` is considered.
 */
export function cellWidth(char: string): CellWidth {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) {
    return 0;
  }
  if (codePoint >= 0x20 && codePoint < 0x7f) {
    return 1;
  }

  const cached = widthCache.get(codePoint);
  if (cached !== undefined) {
    return cached;
  }

  const width = measureCodePoint(codePoint);
  if (widthCache.size >= MAX_CACHED_CODE_POINTS) {
    widthCache.clear();
  }
  widthCache.set(codePoint, width);
  return width;
}

export function cellLen(text: string): number {
  if (ASCII_PRINTABLE.test(text)) {
    return text.length;
  }
  let total = 0;
  for (const char of text) {
    total += cellWidth(char);
  }
  return total;
}

/**
 * Crops or pads `text` so that it occupies exactly `total` cells. A wide
 * character that would straddle the boundary is replaced by spaces.
 */
export function fitToWidth(text: string, total: number): string {
  if (total <= 0) {
    return "";
  }

  const currentLength = cellLen(text);
  if (currentLength === total) {
    return text;
  }
  if (currentLength < total) {
    return text + " ".repeat(total - currentLength);
  }

  let result = "";
  let position = 0;
  for (const char of text) {
    const width = cellWidth(char);
    if (position + width > total) {
      result += " ".repeat(total - position);
      break;
    }
    result += char;
    position += width;
  }
  return result;
}

/**
 * Greedily packs characters into chunks no wider than `width` cells.
 */
export function chunkByWidth(text: string, width: number): string[] {
  if (width <= 0) {
    return [];
  }

  const chunks: string[] = [];
  let current = "";
  let currentWidth = 0;
  for (const char of text) {
    const charWidth = cellWidth(char);
    if (currentWidth + charWidth > width && current.length > 0) {
      chunks.push(current);
      current = "";
      currentWidth = 0;
    }
    current += char;
    currentWidth += charWidth;
  }
  if (current.length > 0) {
    chunks.push(current);
  }
  return chunks;
}

export function isSingleCell(text: string): boolean {
  if (ASCII_PRINTABLE.test(text)) {
    return true;
  }
  for (const char of text) {
    if (cellWidth(char) !== 1) {
      return false;
    }
  }
  return true;
}

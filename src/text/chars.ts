// Offsets into plain text are code point indexes, not UTF-16 indexes.

const CONTROL_CODES = /[\x07\x08\x0b\x0c\x0d]/gu;

/** Removes bell, backspace, vertical tab, form feed and carriage return. */
export function stripControlCodes(text: string): string {
  return text.replace(CONTROL_CODES, "");
}

export function charLength(text: string): number {
  let count = 0;
  for (const _char of text) {
    count += 1;
  }
  return count;
}

export function charSlice(text: string, start: number, end?: number): string {
  return Array.from(text).slice(start, end).join("");
}

export function clampOffset(offset: number, length: number): number {
  return Math.min(Math.max(offset, 0), length);
}

/**
 * Resolves an offset the way `Array.prototype.slice` does: negative values
 * count back from `length`, and the result is clamped to `[0, length]`.
 */
export function resolveOffset(offset: number, length: number): number {
  return clampOffset(offset < 0 ? length + offset : offset, length);
}

/** Index of the first element of a sorted array greater than `value`. */
export function upperBound(sorted: readonly number[], value: number): number {
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    if ((sorted[middle] ?? 0) <= value) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  return low;
}

/** Checks that `char` is exactly one code point, as padding and guides need. */
export function singleCharacter(char: string): string {
  if (charLength(char) !== 1) {
    throw new RangeError(
      `Expected a single character, received ${JSON.stringify(char)}.`,
    );
  }
  return char;
}

export interface WordToken {
  /** Code point offset of the first character. */
  start: number;
  /** Code point offset one past the last character. */
  end: number;
  word: string;
}

const WHITESPACE = /^\s$/u;

function isWhitespace(char: string): boolean {
  return WHITESPACE.test(char);
}

/**
 * Splits text into words, each made of optional leading whitespace, at least
 * one non-whitespace character and optional trailing whitespace. Offsets are
 * code point indexes, so surrogate pairs count as one character.
 */
export function splitWords(text: string): WordToken[] {
  const chars = Array.from(text);
  const tokens: WordToken[] = [];
  let index = 0;

  while (index < chars.length) {
    const start = index;
    while (index < chars.length && isWhitespace(chars[index] ?? "")) {
      index += 1;
    }
    if (index === chars.length) {
      break;
    }
    while (index < chars.length && !isWhitespace(chars[index] ?? "")) {
      index += 1;
    }
    while (index < chars.length && isWhitespace(chars[index] ?? "")) {
      index += 1;
    }
    tokens.push({
      start,
      end: index,
      word: chars.slice(start, index).join(""),
    });
  }

  return tokens;
}

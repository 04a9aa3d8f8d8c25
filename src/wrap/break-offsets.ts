import { cellLen, chunkByWidth } from "../cells/width.js";
import { splitWords } from "./words.js";

/**
 * Returns the code point offsets at which `text` must be cut so that every
 * line fits in `width` cells. Words carry their trailing whitespace, which
 * may hang past the budget. With `fold`, a word wider than `width` is broken
 * into width-sized chunks; without it the word is moved to its own line and
 * left to overflow.
 */
export function breakOffsets(
  text: string,
  width: number,
  fold = true,
): number[] {
  if (width <= 0) {
    return [];
  }

  const offsets: number[] = [];
  let consumed = 0;

  for (const { start, word } of splitWords(text)) {
    const wordLength = cellLen(word.trimEnd());
    const remaining = Math.max(width - consumed, 0);

    if (wordLength <= remaining) {
      consumed += cellLen(word);
      continue;
    }

    if (wordLength > width) {
      if (!fold) {
        if (start > 0) {
          offsets.push(start);
        }
        consumed = cellLen(word);
        continue;
      }

      const chunks = chunkByWidth(word, width);
      let chunkStart = start;
      chunks.forEach((chunk, index) => {
        if (chunkStart > 0) {
          offsets.push(chunkStart);
        }
        if (index === chunks.length - 1) {
          consumed = cellLen(chunk);
        } else {
          chunkStart += Array.from(chunk).length;
        }
      });
      continue;
    }

    if (consumed > 0 && start > 0) {
      offsets.push(start);
    }
    consumed = cellLen(word);
  }

  return offsets;
}

import { cellLen } from "../cells/width.js";
import type { ColorLevel } from "../style/colors.js";
import type { Style } from "../style/style.js";

/** A run of text sharing one fully resolved style. */
export interface Segment {
  readonly text: string;
  readonly style?: Style;
}

export interface SegmentRenderOptions {
  colorLevel?: ColorLevel;
}

export function segmentsCellLength(segments: Iterable<Segment>): number {
  let total = 0;
  for (const segment of segments) {
    total += cellLen(segment.text);
  }
  return total;
}

/**
 * Paints every segment with its style and concatenates the result.
 */
export function segmentsToAnsi(
  segments: Iterable<Segment>,
  options: SegmentRenderOptions = {},
): string {
  let output = "";
  for (const { text, style } of segments) {
    output += style ? style.render(text, options) : text;
  }
  return output;
}

/**
 * Splits a segment stream into lines at each `"\n"`. Newlines are dropped and
 * styles carry over to both halves of a split segment.
 */
export function splitSegmentLines(segments: Iterable<Segment>): Segment[][] {
  const lines: Segment[][] = [];
  let current: Segment[] = [];

  for (const segment of segments) {
    if (!segment.text.includes("\n")) {
      current.push(segment);
      continue;
    }
    const parts = segment.text.split("\n");
    parts.forEach((part, index) => {
      if (index > 0) {
        lines.push(current);
        current = [];
      }
      if (part.length > 0) {
        current.push(
          segment.style ? { text: part, style: segment.style } : { text: part },
        );
      }
    });
  }

  if (current.length > 0) {
    lines.push(current);
  }
  return lines;
}

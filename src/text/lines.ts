import type { Segment } from "../segment/segment.js";
import { Span } from "./span.js";
import type { Text } from "./text.js";
import type { JustifyMethod, OverflowMethod } from "./types.js";

/** An ordered sequence of lines, as produced by splitting or wrapping. */
export class Lines implements Iterable<Text> {
  private readonly items: Text[];

  constructor(lines: Iterable<Text> = []) {
    this.items = Array.from(lines);
  }

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<Text> {
    return this.items[Symbol.iterator]();
  }

  at(index: number): Text | undefined {
    return this.items.at(index);
  }

  push(...lines: Text[]): this {
    return this.extend(lines);
  }

  extend(lines: Iterable<Text>): this {
    for (const line of lines) {
      this.items.push(line);
    }
    return this;
  }

  pop(): Text | undefined {
    return this.items.pop();
  }

  toArray(): Text[] {
    return [...this.items];
  }

  plains(): string[] {
    return this.items.map((line) => line.plain);
  }

  render(): Segment[] {
    return this.items.flatMap((line) => line.render());
  }

  /** Aligns every line within `width` cells, in place. */
  justify(
    width: number,
    method: JustifyMethod = "default",
    overflow: OverflowMethod = "fold",
  ): this {
    switch (method) {
      case "default":
      case "left":
        for (const line of this.items) {
          line.truncate(width, { overflow, pad: true });
        }
        break;
      case "center":
        for (const line of this.items) {
          line.rstrip().truncate(width, { overflow });
          const shortfall = width - line.cellLength;
          if (shortfall > 0) {
            const left = Math.floor(shortfall / 2);
            line.padLeft(left).padRight(shortfall - left);
          }
        }
        break;
      case "right":
        for (const line of this.items) {
          line.rstrip().truncate(width, { overflow });
          line.padLeft(width - line.cellLength);
        }
        break;
      case "full":
        this.items.forEach((line, index) => {
          if (index === this.items.length - 1) {
            line.truncate(width, { overflow, pad: true });
            return;
          }
          justifyFull(line, width, overflow);
        });
        break;
    }
    return this;
  }
}

/**
 * Stretches a line to `width` cells by widening the gaps between
 * space-separated words. Spare spaces go to the rightmost gaps first.
 */
function justifyFull(
  line: Text,
  width: number,
  overflow: OverflowMethod,
): void {
  line.rstrip();
  const plain = line.plain;
  const gaps = plain.split(" ").length - 1;
  const currentWidth = line.cellLength;
  if (gaps === 0 || currentWidth >= width) {
    line.truncate(width, { overflow, pad: true });
    return;
  }

  const extra = width - currentWidth;
  const extras = new Array<number>(gaps).fill(Math.floor(extra / gaps));
  let spare = extra % gaps;
  for (let gap = gaps - 1; spare > 0; gap -= 1, spare -= 1) {
    extras[gap] = (extras[gap] ?? 0) + 1;
  }

  // Offsets of each original space and the padding inserted after it.
  const insertions: [number, number][] = [];
  let stretched = "";
  let offset = 0;
  let gap = 0;
  for (const char of plain) {
    stretched += char;
    if (char === " ") {
      const added = extras[gap] ?? 0;
      stretched += " ".repeat(added);
      insertions.push([offset, added]);
      gap += 1;
    }
    offset += 1;
  }

  const shift = (position: number): number =>
    insertions.reduce(
      (total, [spaceOffset, added]) =>
        spaceOffset < position ? total + added : total,
      position,
    );
  const spans = line.spans.map(
    (span) => new Span(shift(span.start), shift(span.end), span.style),
  );
  line.setPlain(stretched).replaceSpans(spans);
}

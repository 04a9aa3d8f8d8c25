import { Style } from "../style/style.js";

/** A style applied to the half-open code point range `[start, end)`. */
export class Span {
  constructor(
    public readonly start: number,
    public readonly end: number,
    public readonly style: Style = Style.null(),
  ) {}

  get isEmpty(): boolean {
    return this.end <= this.start;
  }

  /**
   * Splits the span at `offset`. When the offset falls outside the span the
   * right-hand part is undefined.
   */
  split(offset: number): [Span, Span | undefined] {
    if (offset < this.start || offset >= this.end) {
      return [this, undefined];
    }
    return [
      new Span(this.start, offset, this.style),
      new Span(offset, this.end, this.style),
    ];
  }

  move(offset: number): Span {
    if (offset === 0) {
      return this;
    }
    return new Span(this.start + offset, this.end + offset, this.style);
  }

  rightCrop(offset: number): Span {
    if (offset >= this.end) {
      return this;
    }
    return new Span(this.start, Math.min(offset, this.end), this.style);
  }

  extend(cells: number): Span {
    if (cells <= 0) {
      return this;
    }
    return new Span(this.start, this.end + cells, this.style);
  }

  equals(other: Span): boolean {
    return (
      this.start === other.start &&
      this.end === other.end &&
      this.style.equals(other.style)
    );
  }

  toString(): string {
    return `Span(${this.start}, ${this.end}, ${JSON.stringify(this.style.toString())})`;
  }
}

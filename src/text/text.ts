import { cellLen, fitToWidth } from "../cells/width.js";
import type { Segment } from "../segment/segment.js";
import { Style } from "../style/style.js";
import { breakOffsets } from "../wrap/break-offsets.js";
import {
  charLength,
  charSlice,
  clampOffset,
  resolveOffset,
  singleCharacter,
  stripControlCodes,
  upperBound,
} from "./chars.js";
import { Lines } from "./lines.js";
import { Span } from "./span.js";
import {
  DEFAULT_OVERFLOW,
  DEFAULT_TAB_SIZE,
  type JustifyMethod,
  type Measurement,
  type OverflowMethod,
} from "./types.js";

const ELLIPSIS = "…";

export interface TextOptions {
  style?: Style;
  justify?: JustifyMethod;
  overflow?: OverflowMethod;
  noWrap?: boolean;
  /** Appended by `render()`. Defaults to a newline. */
  end?: string;
  tabSize?: number;
  spans?: readonly Span[];
}

export type TextPart = string | readonly [string, Style] | Text;

export type TextToken = readonly [string, Style | undefined];

export interface TruncateOptions {
  overflow?: OverflowMethod;
  pad?: boolean;
}

export interface SplitOptions {
  includeSeparator?: boolean;
  allowBlank?: boolean;
}

export interface WrapOptions {
  justify?: JustifyMethod;
  overflow?: OverflowMethod;
  tabSize?: number;
  noWrap?: boolean;
}

export interface HighlightWordsOptions {
  caseSensitive?: boolean;
}

export interface IndentGuideOptions {
  /** Columns per indentation level; detected from the text when unset. */
  indentSize?: number;
  /** A single character drawn at each level. Defaults to `│`. */
  character?: string;
  style?: Style;
}

interface SweepEvent {
  offset: number;
  leaving: boolean;
  index: number;
}

interface StyledRun {
  start: number;
  end: number;
  style: Style;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function toGlobalPattern(pattern: RegExp | string, extraFlags = ""): RegExp {
  const source = typeof pattern === "string" ? pattern : pattern.source;
  let flags = typeof pattern === "string" ? "u" : pattern.flags;
  for (const flag of `g${extraFlags}`) {
    if (!flags.includes(flag)) {
      flags += flag;
    }
  }
  return new RegExp(source, flags);
}

function greatestCommonDivisor(a: number, b: number): number {
  return b === 0 ? a : greatestCommonDivisor(b, a % b);
}

/** Code points of leading whitespace. */
function indentWidth(line: string): number {
  return charLength(line) - charLength(line.trimStart());
}

const DEFAULT_GUIDE_CHARACTER = "│";
const DEFAULT_GUIDE_STYLE = "dim green";

/**
 * Text with styled ranges. The plain string is free of control codes; every
 * span lies within `[0, length]` and later spans render on top of earlier
 * ones where they overlap.
 */
export class Text {
  private plainText: string;
  private charCount: number;
  private spanList: Span[];

  public style: Style;
  public justify: JustifyMethod | undefined;
  public overflow: OverflowMethod | undefined;
  public noWrap: boolean | undefined;
  public end: string;
  public tabSize: number | undefined;

  constructor(text = "", options: TextOptions = {}) {
    this.plainText = stripControlCodes(text);
    this.charCount = charLength(this.plainText);
    this.style = options.style ?? Style.null();
    this.justify = options.justify;
    this.overflow = options.overflow;
    this.noWrap = options.noWrap;
    this.end = options.end ?? "\n";
    this.tabSize = options.tabSize;
    this.spanList = [];
    if (options.spans) {
      this.replaceSpans(options.spans);
    }
  }

  static empty(): Text {
    return new Text();
  }

  /** Creates text whose style is a full-range span rather than the base style. */
  static styled(text: string, style: Style, options: TextOptions = {}): Text {
    const styled = new Text(text, { ...options, spans: undefined });
    styled.stylize(style);
    return styled;
  }

  static assemble(parts: Iterable<TextPart>, options: TextOptions = {}): Text {
    const text = new Text("", options);
    for (const part of parts) {
      if (part instanceof Text) {
        text.appendText(part);
      } else if (typeof part === "string") {
        text.appendString(part);
      } else {
        const [content, style] = part;
        text.appendString(content, style);
      }
    }
    return text;
  }

  get plain(): string {
    return this.plainText;
  }

  get spans(): readonly Span[] {
    return this.spanList;
  }

  /** Length in code points. */
  get length(): number {
    return this.charCount;
  }

  get cellLength(): number {
    return cellLen(this.plainText);
  }

  /**
   * Replaces the plain text, dropping spans that start past the new end and
   * clamping those that run over it.
   */
  setPlain(value: string): this {
    const plain = stripControlCodes(value);
    if (plain === this.plainText) {
      return this;
    }
    this.plainText = plain;
    this.charCount = charLength(plain);
    this.trimSpans();
    return this;
  }

  replaceSpans(spans: Iterable<Span>): this {
    this.spanList = Array.from(spans);
    this.trimSpans();
    return this;
  }

  copy(): Text {
    const copy = this.blankCopy(this.plainText);
    copy.spanList = [...this.spanList];
    return copy;
  }

  /** Same formatting settings, new plain text, no spans. */
  blankCopy(plain = ""): Text {
    return new Text(plain, {
      style: this.style,
      justify: this.justify,
      overflow: this.overflow,
      noWrap: this.noWrap,
      end: this.end,
      tabSize: this.tabSize,
    });
  }

  equals(other: Text): boolean {
    return (
      this.plainText === other.plainText &&
      this.spanList.length === other.spanList.length &&
      this.spanList.every((span, index) => {
        const otherSpan = other.spanList[index];
        return otherSpan !== undefined && span.equals(otherSpan);
      })
    );
  }

  contains(value: string | Text): boolean {
    const needle = typeof value === "string" ? value : value.plain;
    return this.plainText.includes(needle);
  }

  toString(): string {
    return this.plainText;
  }

  appendString(value: string, style?: Style): this {
    const plain = stripControlCodes(value);
    if (plain.length === 0) {
      return this;
    }
    const offset = this.charCount;
    const added = charLength(plain);
    this.plainText += plain;
    this.charCount += added;
    if (style && !style.isNull) {
      this.spanList.push(new Span(offset, offset + added, style));
    }
    return this;
  }

  appendText(text: Text): this {
    if (text.length === 0) {
      return this;
    }
    const offset = this.charCount;
    const spans = [...text.spanList];
    this.plainText += text.plainText;
    this.charCount += text.charCount;
    for (const span of spans) {
      this.spanList.push(span.move(offset));
    }
    return this;
  }

  append(value: string | Text, style?: Style): this {
    if (typeof value === "string") {
      return this.appendString(value, style);
    }
    const added = value.length;
    this.appendText(value);
    if (style && !style.isNull && added > 0) {
      this.stylize(style, this.charCount - added);
    }
    return this;
  }

  appendTokens(tokens: Iterable<TextToken>): this {
    for (const [content, style] of tokens) {
      this.appendString(content, style);
    }
    return this;
  }

  /** Applies `style` on top of existing spans over `[start, end)`. */
  stylize(style: Style, start = 0, end?: number): this {
    const range = this.resolveRange(start, end);
    if (range) {
      this.spanList.push(new Span(range[0], range[1], style));
    }
    return this;
  }

  /** Applies `style` underneath existing spans over `[start, end)`. */
  stylizeBefore(style: Style, start = 0, end?: number): this {
    const range = this.resolveRange(start, end);
    if (range) {
      this.spanList.unshift(new Span(range[0], range[1], style));
    }
    return this;
  }

  copyStyles(other: Text): this {
    for (const span of other.spanList) {
      this.spanList.push(span);
    }
    this.trimSpans();
    return this;
  }

  /** Inserts `count` copies of `char`, a single code point, at the start. */
  padLeft(count: number, char = " "): this {
    const fill = singleCharacter(char);
    if (count <= 0) {
      return this;
    }
    this.plainText = fill.repeat(count) + this.plainText;
    this.charCount += count;
    this.spanList = this.spanList.map((span) => span.move(count));
    return this;
  }

  padRight(count: number, char = " "): this {
    const fill = singleCharacter(char);
    if (count <= 0) {
      return this;
    }
    this.plainText += fill.repeat(count);
    this.charCount += count;
    return this;
  }

  pad(count: number, char = " "): this {
    return this.padLeft(count, char).padRight(count, char);
  }

  align(method: JustifyMethod, width: number, char = " "): this {
    singleCharacter(char);
    const excess = width - this.cellLength;
    if (excess <= 0) {
      return this;
    }
    switch (method) {
      case "center": {
        const left = Math.floor(excess / 2);
        return this.padLeft(left, char).padRight(excess - left, char);
      }
      case "right":
        return this.padLeft(excess, char);
      case "default":
      case "left":
      case "full":
        return this.padRight(excess, char);
    }
  }

  /**
   * Fits the text into `maxWidth` cells using the overflow policy. With
   * `pad`, text narrower than `maxWidth` is padded with spaces.
   */
  truncate(maxWidth: number, options: TruncateOptions = {}): this {
    const overflow = options.overflow ?? DEFAULT_OVERFLOW;
    const pad = options.pad ?? false;
    const width = this.cellLength;

    if (width > maxWidth) {
      switch (overflow) {
        case "ellipsis":
          if (maxWidth <= 0) {
            return this.setPlain("");
          }
          this.setPlain(fitToWidth(this.plainText, maxWidth - 1));
          this.appendString(ELLIPSIS);
          break;
        case "crop":
        case "fold":
          this.setPlain(fitToWidth(this.plainText, maxWidth));
          break;
        case "ignore":
          break;
      }
    }

    if (pad) {
      const padded = this.cellLength;
      if (padded < maxWidth) {
        this.padRight(maxWidth - padded);
      }
    }
    return this;
  }

  rightCrop(amount: number): this {
    if (amount <= 0) {
      return this;
    }
    if (amount >= this.charCount) {
      return this.setPlain("");
    }
    return this.setPlain(charSlice(this.plainText, 0, this.charCount - amount));
  }

  rstrip(): this {
    return this.setPlain(this.plainText.trimEnd());
  }

  /**
   * Removes trailing whitespace found at or past character `size`, leaving
   * any whitespace before it in place.
   */
  rstripEnd(size: number): this {
    if (this.charCount <= size) {
      return this;
    }
    const tail = charSlice(this.plainText, size);
    const trimmed = tail.trimEnd();
    if (trimmed.length === tail.length) {
      return this;
    }
    return this.setPlain(
      charSlice(this.plainText, 0, size + charLength(trimmed)),
    );
  }

  setLength(length: number): this {
    if (length < this.charCount) {
      return this.rightCrop(this.charCount - length);
    }
    return this.padRight(length - this.charCount);
  }

  removeSuffix(suffix: string): this {
    if (suffix.length === 0 || !this.plainText.endsWith(suffix)) {
      return this;
    }
    return this.rightCrop(charLength(suffix));
  }

  /** Pads with spaces, stretching spans that reach the end over them. */
  extendStyle(spaces: number): this {
    if (spaces <= 0) {
      return this;
    }
    const end = this.charCount;
    this.spanList = this.spanList.map((span) =>
      span.end >= end ? span.extend(spaces) : span,
    );
    return this.padRight(spaces);
  }

  /**
   * Replaces each tab with `tabSize` spaces. Span offsets after a tab move
   * forward by `tabSize - 1`.
   */
  expandTabs(tabSize?: number): this {
    if (!this.plainText.includes("\t")) {
      return this;
    }
    const size = Math.max(tabSize ?? this.tabSize ?? DEFAULT_TAB_SIZE, 0);

    const offsetMap: number[] = [];
    let position = 0;
    for (const char of this.plainText) {
      offsetMap.push(position);
      position += char === "\t" ? size : 1;
    }
    offsetMap.push(position);

    const remap = (offset: number): number => offsetMap[offset] ?? position;
    const spans = this.spanList
      .map((span) => new Span(remap(span.start), remap(span.end), span.style))
      .filter((span) => !span.isEmpty);

    this.plainText = this.plainText.replace(/\t/g, " ".repeat(size));
    this.charCount = position;
    this.spanList = spans;
    return this;
  }

  /** Styles every match of `pattern`; returns the number of matches styled. */
  highlightRegex(pattern: RegExp | string, style: Style): number {
    let count = 0;
    for (const match of this.plainText.matchAll(toGlobalPattern(pattern))) {
      const [matched] = match;
      if (match.index === undefined || matched.length === 0) {
        continue;
      }
      const start = charLength(this.plainText.slice(0, match.index));
      this.stylize(style, start, start + charLength(matched));
      count += 1;
    }
    return count;
  }

  highlightWords(
    words: Iterable<string>,
    style: Style,
    options: HighlightWordsOptions = {},
  ): number {
    const flags = options.caseSensitive === false ? "gi" : "g";
    let count = 0;
    for (const word of words) {
      if (word.length === 0) {
        continue;
      }
      count += this.highlightRegex(
        new RegExp(`\\b${escapeRegExp(word)}\\b`, flags),
        style,
      );
    }
    return count;
  }

  /**
   * Styles the named capture groups of every match with the style
   * `resolveStyle` returns for the group name. Groups with no style, or that
   * matched nothing, are skipped. Returns the number of groups styled.
   */
  highlightRegexWithGroups(
    pattern: RegExp | string,
    resolveStyle: (groupName: string) => Style | undefined,
  ): number {
    const plain = this.plainText;
    let count = 0;
    for (const match of plain.matchAll(toGlobalPattern(pattern, "d"))) {
      const groups = match.indices?.groups;
      if (!groups) {
        continue;
      }
      for (const [name, range] of Object.entries(groups)) {
        if (!range || range[0] === range[1]) {
          continue;
        }
        const style = resolveStyle(name);
        if (!style) {
          continue;
        }
        const start = charLength(plain.slice(0, range[0]));
        this.stylize(
          style,
          start,
          start + charLength(plain.slice(range[0], range[1])),
        );
        count += 1;
      }
    }
    return count;
  }

  /**
   * Cuts the text at `offsets` into `offsets.length + 1` pieces. Each span is
   * copied, in piece-local coordinates, into every piece it overlaps.
   */
  divide(offsets: Iterable<number>): Lines {
    const cuts = Array.from(offsets, (offset) =>
      clampOffset(offset, this.charCount),
    ).sort((a, b) => a - b);
    if (cuts.length === 0) {
      return new Lines([this.copy()]);
    }

    const boundaries = [0, ...cuts, this.charCount];
    const chars = Array.from(this.plainText);
    const pieces: Text[] = [];
    for (let index = 0; index + 1 < boundaries.length; index += 1) {
      const start = boundaries[index] ?? 0;
      const end = boundaries[index + 1] ?? start;
      pieces.push(this.blankCopy(chars.slice(start, end).join("")));
    }

    for (const span of this.spanList) {
      if (span.isEmpty) {
        continue;
      }
      let index = Math.min(
        Math.max(upperBound(boundaries, span.start) - 1, 0),
        pieces.length - 1,
      );
      for (; index < pieces.length; index += 1) {
        const pieceStart = boundaries[index] ?? 0;
        const pieceEnd = boundaries[index + 1] ?? pieceStart;
        if (pieceStart >= span.end) {
          break;
        }
        const start = Math.max(span.start, pieceStart);
        const end = Math.min(span.end, pieceEnd);
        if (start < end) {
          pieces[index]?.spanList.push(
            new Span(start - pieceStart, end - pieceStart, span.style),
          );
        }
      }
    }

    return new Lines(pieces);
  }

  /**
   * Splits on a literal separator. Separators stay attached to the end of
   * each piece with `includeSeparator`; otherwise they are discarded. Unless
   * `allowBlank` is set, a trailing empty piece left by a final separator is
   * dropped.
   */
  split(separator = "\n", options: SplitOptions = {}): Lines {
    const { includeSeparator = false, allowBlank = false } = options;
    const plain = this.plainText;
    if (separator.length === 0 || !plain.includes(separator)) {
      return new Lines([this.copy()]);
    }

    const separatorLength = charLength(separator);
    const offsets: number[] = [];
    let searchFrom = 0;
    let charOffset = 0;
    for (
      let found = plain.indexOf(separator);
      found !== -1;
      found = plain.indexOf(separator, searchFrom)
    ) {
      charOffset += charLength(plain.slice(searchFrom, found));
      if (!includeSeparator) {
        offsets.push(charOffset);
      }
      charOffset += separatorLength;
      offsets.push(charOffset);
      searchFrom = found + separator.length;
    }

    const divided = this.divide(offsets);
    const lines = includeSeparator
      ? divided
      : new Lines(divided.toArray().filter((line) => line.plain !== separator));

    if (!allowBlank && plain.endsWith(separator)) {
      lines.pop();
    }
    return lines;
  }

  /** Code point range `[start, end)`; negative offsets count from the end. */
  slice(start: number, end: number = this.charCount): Text {
    const from = resolveOffset(start, this.charCount);
    const to = resolveOffset(end, this.charCount);
    if (from >= to) {
      return this.blankCopy("");
    }
    return this.divide([from, to]).at(1) ?? this.blankCopy("");
  }

  charAt(index: number): Text {
    if (index < 0 || index >= this.charCount) {
      return this.blankCopy("");
    }
    return this.slice(index, index + 1);
  }

  /**
   * Plain substring of up to `length` characters from `offset`, or undefined
   * when `offset` is past the end.
   */
  getTextAt(offset: number, length: number): string | undefined {
    if (offset < 0 || offset >= this.charCount) {
      return undefined;
    }
    return charSlice(this.plainText, offset, offset + Math.max(length, 0));
  }

  /** Concatenates `texts` with this text as the separator. */
  join(texts: Iterable<Text | string>): Text {
    const joined = this.blankCopy("");
    let first = true;
    for (const item of texts) {
      if (!first) {
        joined.appendText(this);
      }
      joined.append(item);
      first = false;
    }
    return joined;
  }

  /** Splits on newlines and crops or pads every line to exactly `width`. */
  fit(width: number): Lines {
    const lines = this.split("\n", { allowBlank: true });
    for (const line of lines) {
      line.truncate(width, { overflow: "crop", pad: true });
    }
    return lines;
  }

  measure(): Measurement {
    if (this.charCount === 0) {
      return { minimum: 0, maximum: 0 };
    }
    let maximum = 0;
    for (const line of this.plainText.split("\n")) {
      maximum = Math.max(maximum, cellLen(line));
    }
    let minimum = 0;
    for (const token of this.plainText.split(/\s+/u)) {
      minimum = Math.max(minimum, cellLen(token));
    }
    return { minimum, maximum };
  }

  /**
   * Indentation step of the text: the greatest common divisor of the
   * leading whitespace of its non-blank lines, or 1 when none is indented.
   */
  detectIndentation(): number {
    let step = 0;
    for (const line of this.plainText.split("\n")) {
      if (line.trim().length === 0) {
        continue;
      }
      const indent = indentWidth(line);
      if (indent > 0) {
        step = greatestCommonDivisor(step, indent);
      }
    }
    return step === 0 ? 1 : step;
  }

  /**
   * Returns a copy in which the leading whitespace of each non-blank line
   * becomes spaces, with a styled guide character at the start of every
   * complete indentation level. Line lengths are unchanged, so existing
   * spans keep their offsets and render above the guides.
   */
  withIndentGuides(options: IndentGuideOptions = {}): Text {
    const guide = singleCharacter(options.character ?? DEFAULT_GUIDE_CHARACTER);
    const guideStyle = options.style ?? Style.parse(DEFAULT_GUIDE_STYLE);
    const indentSize = Math.max(
      options.indentSize ?? this.detectIndentation(),
      1,
    );

    const spans: Span[] = [];
    let lineStart = 0;
    const lines = this.plainText.split("\n").map((line) => {
      const start = lineStart;
      lineStart += charLength(line) + 1;
      const indent = indentWidth(line);
      if (indent === 0 || line.trim().length === 0) {
        return line;
      }
      let prefix = "";
      for (let column = 0; column < indent; column += 1) {
        if (column % indentSize === 0 && column + indentSize <= indent) {
          prefix += guide;
          spans.push(
            new Span(start + column, start + column + 1, guideStyle),
          );
        } else {
          prefix += " ";
        }
      }
      return prefix + line.trimStart();
    });

    const guided = this.blankCopy(lines.join("\n"));
    for (const span of this.spanList) {
      spans.push(span);
    }
    return guided.replaceSpans(spans);
  }

  getStyleAtOffset(offset: number): Style {
    const covering = this.layeredSpans().filter(
      (span) => span.start <= offset && offset < span.end,
    );
    return Style.combine([this.style, ...covering.map((span) => span.style)]);
  }

  /**
   * Resolves overlapping spans into minimal non-overlapping spans whose
   * styles already include the base style. Ranges that resolve to the null
   * style are omitted.
   */
  flattenSpans(): Span[] {
    if (!this.spanList.some((span) => !span.isEmpty)) {
      return [];
    }
    return this.styledRuns()
      .filter((run) => !run.style.isNull)
      .map((run) => new Span(run.start, run.end, run.style));
  }

  /**
   * Emits segments for the text. Without spans the whole text and its
   * terminator carry the base style; otherwise each styled run becomes a
   * segment and the terminator is unstyled.
   */
  render(): Segment[] {
    const segments: Segment[] = [];
    const emit = (text: string, style: Style): void => {
      segments.push(style.isNull ? { text } : { text, style });
    };

    if (this.spanList.length === 0) {
      emit(this.plainText, this.style);
      if (this.end.length > 0) {
        emit(this.end, this.style);
      }
      return segments;
    }

    const chars = Array.from(this.plainText);
    for (const run of this.styledRuns()) {
      emit(chars.slice(run.start, run.end).join(""), run.style);
    }
    if (this.end.length > 0) {
      segments.push({ text: this.end });
    }
    return segments;
  }

  /**
   * Word-wraps to `width` cells. Newlines always break; long words fold.
   * Unset options fall back to this text's own settings.
   */
  wrap(width: number, options: WrapOptions = {}): Lines {
    const justify = options.justify ?? this.justify;
    const overflow = options.overflow ?? this.overflow ?? DEFAULT_OVERFLOW;
    const tabSize = options.tabSize ?? this.tabSize ?? DEFAULT_TAB_SIZE;
    const noWrap = options.noWrap ?? this.noWrap ?? false;

    const wrapped = new Lines();
    for (const line of this.split("\n", { allowBlank: true })) {
      line.expandTabs(tabSize);
      if (noWrap) {
        wrapped.push(line);
        continue;
      }
      for (const piece of line.divide(breakOffsets(line.plain, width, true))) {
        piece.rstripEnd(width);
        wrapped.push(piece);
      }
    }

    if (justify) {
      wrapped.justify(width, justify, overflow);
    }
    for (const line of wrapped) {
      if (line.cellLength > width) {
        line.truncate(width, { overflow });
      }
    }
    return wrapped;
  }

  /**
   * Sweeps span entry and exit events in offset order, keeping the active
   * spans in entry order. Each run between two event offsets gets the base
   * style combined with the active span styles.
   */
  private styledRuns(): StyledRun[] {
    const events: SweepEvent[] = [];
    this.spanList.forEach((span, index) => {
      if (span.isEmpty) {
        return;
      }
      events.push({ offset: span.start, leaving: false, index });
      events.push({ offset: span.end, leaving: true, index });
    });
    events.sort(
      (a, b) => a.offset - b.offset || Number(a.leaving) - Number(b.leaving),
    );

    const length = this.charCount;
    const active: number[] = [];
    const styleCache = new Map<string, Style>();
    const activeStyle = (): Style => {
      const key = active.join(",");
      let style = styleCache.get(key);
      if (!style) {
        style = Style.combine([
          this.style,
          ...active.map((index) => this.spanList[index]?.style ?? Style.null()),
        ]);
        styleCache.set(key, style);
      }
      return style;
    };

    const runs: StyledRun[] = [];
    let lastOffset = 0;
    for (const event of events) {
      const offset = Math.min(event.offset, length);
      if (offset > lastOffset) {
        runs.push({ start: lastOffset, end: offset, style: activeStyle() });
        lastOffset = offset;
      }
      if (event.leaving) {
        const position = active.indexOf(event.index);
        if (position !== -1) {
          active.splice(position, 1);
        }
      } else {
        active.push(event.index);
      }
    }
    if (lastOffset < length) {
      runs.push({ start: lastOffset, end: length, style: activeStyle() });
    }
    return runs;
  }

  private resolveRange(
    start: number,
    end: number | undefined,
  ): [number, number] | undefined {
    const length = this.charCount;
    if (length === 0) {
      return undefined;
    }
    const from = resolveOffset(start, length);
    const to = end === undefined ? length : resolveOffset(end, length);
    return from < to ? [from, to] : undefined;
  }

  /** Spans ordered by start, ties kept in insertion order. */
  private layeredSpans(): Span[] {
    return this.spanList
      .filter((span) => !span.isEmpty)
      .sort((a, b) => a.start - b.start);
  }

  private trimSpans(): void {
    const length = this.charCount;
    this.spanList = this.spanList.flatMap((span) => {
      if (span.start >= length || span.isEmpty) {
        return [];
      }
      const start = Math.max(span.start, 0);
      const end = Math.min(span.end, length);
      if (start === span.start && end === span.end) {
        return [span];
      }
      return start < end ? [new Span(start, end, span.style)] : [];
    });
  }
}

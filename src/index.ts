export {
  cellLen,
  cellWidth,
  type CellWidth,
  chunkByWidth,
  fitToWidth,
  isSingleCell,
} from "./cells/width.js";
export {
  resolveRenderEnvironment,
  type ResolveRenderEnvironmentOptions,
  TAB_SIZE_VARIABLE,
} from "./configs/environment/loader.js";
export { DEFAULT_WIDTH, type RenderEnvironment } from "./configs/environment/types.js";
export { renderText, type RenderTextOptions } from "./render/text.js";
export {
  type Segment,
  type SegmentRenderOptions,
  segmentsCellLength,
  segmentsToAnsi,
  splitSegmentLines,
} from "./segment/segment.js";
export {
  type Color,
  type ColorLevel,
  detectColorLevel,
  parseColor,
} from "./style/colors.js";
export { StyleSyntaxError } from "./style/errors.js";
export {
  Style,
  STYLE_ATTRIBUTES,
  type StyleAttribute,
  type StyleOptions,
} from "./style/style.js";
export { Lines } from "./text/lines.js";
export { Span } from "./text/span.js";
export {
  type IndentGuideOptions,
  type SplitOptions,
  Text,
  type TextOptions,
  type TextPart,
  type TruncateOptions,
  type WrapOptions,
} from "./text/text.js";
export {
  DEFAULT_OVERFLOW,
  DEFAULT_TAB_SIZE,
  type JustifyMethod,
  justifyMethodSchema,
  type Measurement,
  type OverflowMethod,
  overflowMethodSchema,
} from "./text/types.js";
export { ThemeConfigError, UnknownThemeStyleError } from "./theme/errors.js";
export { loadTheme, type LoadThemeOptions } from "./theme/loader.js";
export { Theme } from "./theme/theme.js";
export { breakOffsets } from "./wrap/break-offsets.js";
export { splitWords, type WordToken } from "./wrap/words.js";

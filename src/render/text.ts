import {
  resolveRenderEnvironment,
  type ResolveRenderEnvironmentOptions,
} from "../configs/environment/loader.js";
import { DEFAULT_WIDTH } from "../configs/environment/types.js";
import { segmentsToAnsi } from "../segment/segment.js";
import type { ColorLevel } from "../style/colors.js";
import type { Text } from "../text/text.js";
import type { JustifyMethod, OverflowMethod } from "../text/types.js";

export interface RenderTextOptions {
  width?: number;
  colorLevel?: ColorLevel;
  justify?: JustifyMethod;
  overflow?: OverflowMethod;
  tabSize?: number;
  noWrap?: boolean;
  /** Where width, tab size and color level come from when not given. */
  environment?: ResolveRenderEnvironmentOptions;
}

/**
 * Wraps `text` to the target width and paints each line, returning one
 * newline-terminated string. The source text is left untouched.
 */
export function renderText(text: Text, options: RenderTextOptions = {}): string {
  const needsEnvironment =
    options.width === undefined ||
    options.colorLevel === undefined ||
    (options.tabSize === undefined && text.tabSize === undefined);
  const environment = needsEnvironment
    ? resolveRenderEnvironment(options.environment)
    : undefined;

  const width = options.width ?? environment?.width ?? DEFAULT_WIDTH;
  const colorLevel = options.colorLevel ?? environment?.colorLevel ?? 0;
  const tabSize = options.tabSize ?? text.tabSize ?? environment?.tabSize;

  const lines = text.wrap(width, {
    justify: options.justify,
    overflow: options.overflow,
    tabSize,
    noWrap: options.noWrap,
  });

  let output = "";
  for (const line of lines) {
    line.end = "";
    output += `${segmentsToAnsi(line.render(), { colorLevel })}\n`;
  }
  return output;
}

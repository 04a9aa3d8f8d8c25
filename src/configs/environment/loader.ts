import process from "node:process";

import type { z } from "zod";

import { type ColorLevel, detectColorLevel } from "../../style/colors.js";
import { DEFAULT_TAB_SIZE } from "../../text/types.js";
import { logWarning } from "../../utils/log.js";
import {
  columnsSchema,
  DEFAULT_WIDTH,
  forceColorSchema,
  type RenderEnvironment,
  tabSizeSchema,
} from "./types.js";

export const TAB_SIZE_VARIABLE = "TERMSPAN_TAB_SIZE" as const;

export interface ResolveRenderEnvironmentOptions {
  env?: NodeJS.ProcessEnv;
  detectColorLevel?: () => ColorLevel;
}

function readVariable<T>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T | undefined {
  const raw = env[name];
  if (raw === undefined) {
    return undefined;
  }
  const result = schema.safeParse(raw.trim());
  if (!result.success) {
    logWarning(`Ignoring invalid ${name} value "${raw}".`);
    return undefined;
  }
  return result.data;
}

function resolveColorLevel(
  env: NodeJS.ProcessEnv,
  detect: () => ColorLevel,
): ColorLevel {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") {
    return 0;
  }
  return readVariable(env, "FORCE_COLOR", forceColorSchema) ?? detect();
}

/**
 * Reads rendering defaults from the environment: `COLUMNS` for the width,
 * `TERMSPAN_TAB_SIZE` for tab expansion, and `NO_COLOR` / `FORCE_COLOR` for
 * the color level. Invalid values are reported and replaced by defaults.
 */
export function resolveRenderEnvironment(
  options: ResolveRenderEnvironmentOptions = {},
): RenderEnvironment {
  const env = options.env ?? process.env;
  return {
    width: readVariable(env, "COLUMNS", columnsSchema) ?? DEFAULT_WIDTH,
    tabSize:
      readVariable(env, TAB_SIZE_VARIABLE, tabSizeSchema) ?? DEFAULT_TAB_SIZE,
    colorLevel: resolveColorLevel(
      env,
      options.detectColorLevel ?? detectColorLevel,
    ),
  };
}

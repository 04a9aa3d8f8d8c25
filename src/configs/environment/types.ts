import { z } from "zod";

import type { ColorLevel } from "../../style/colors.js";

export const DEFAULT_WIDTH = 80;

export const columnsSchema = z.coerce.number().int().positive();

export const tabSizeSchema = z.coerce.number().int().positive();

export const forceColorSchema = z
  .enum(["", "true", "false", "0", "1", "2", "3"])
  .transform((value): ColorLevel => {
    switch (value) {
      case "false":
      case "0":
        return 0;
      case "2":
        return 2;
      case "3":
        return 3;
      case "":
      case "true":
      case "1":
        return 1;
    }
  });

export interface RenderEnvironment {
  /** Column budget for wrapping. */
  width: number;
  tabSize: number;
  colorLevel: ColorLevel;
}

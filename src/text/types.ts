import { z } from "zod";

export const justifyMethodSchema = z.enum([
  "default",
  "left",
  "center",
  "right",
  "full",
]);

export type JustifyMethod = z.infer<typeof justifyMethodSchema>;

export const overflowMethodSchema = z.enum([
  "fold",
  "crop",
  "ellipsis",
  "ignore",
]);

export type OverflowMethod = z.infer<typeof overflowMethodSchema>;

export const DEFAULT_OVERFLOW: OverflowMethod = "fold";

export const DEFAULT_TAB_SIZE = 8;

export interface Measurement {
  /** Width of the widest unbreakable token. */
  minimum: number;
  /** Width of the widest line. */
  maximum: number;
}

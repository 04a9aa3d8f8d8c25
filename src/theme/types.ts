import { z } from "zod";

export const themeDocumentSchema = z
  .object({
    inherit: z.boolean().optional(),
    styles: z.record(z.string(), z.string()).optional(),
  })
  .strict();

export type ThemeDocument = z.infer<typeof themeDocumentSchema>;

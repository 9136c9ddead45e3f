import { z } from "zod";

export const DEFAULT_TONE = "neutral";

export const textRequestSchema = z.object({
  text: z.string({ required_error: "`text` is required" }).min(1, "`text` is required")
});

export const rewriteRequestSchema = textRequestSchema.extend({
  tone: z
    .string()
    .nullish()
    .transform((tone) => tone || DEFAULT_TONE)
});

import type { ChatMessage } from "@textkit/shared";
import { z } from "zod";

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
}

export const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string().optional(),
        content: z
          .string()
          .nullish()
          .transform((content) => content ?? "")
      })
    })
  )
});

import type { NextFunction, Request, Response, Router } from "express";
import { textRequestSchema, type SummarizeResponse } from "@textkit/shared";
import { summarizePrompt } from "../lib/prompts.js";
import { methodNotAllowed } from "../middleware/methodNotAllowed.js";
import type { LLMProvider } from "../providers/index.js";

export function mountSummarizeRoute(router: Router, provider: LLMProvider): void {
  router
    .route("/summarize")
    .post(async (req: Request, res: Response<SummarizeResponse>, next: NextFunction) => {
      try {
        const input = textRequestSchema.parse(req.body);
        const summary = await provider.complete(summarizePrompt(input.text));
        res.json({ summary });
      } catch (error) {
        next(error);
      }
    })
    .all(methodNotAllowed("POST"));
}

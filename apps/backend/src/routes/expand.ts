import type { NextFunction, Request, Response, Router } from "express";
import { textRequestSchema, type ExpandResponse } from "@textkit/shared";
import { expandPrompt } from "../lib/prompts.js";
import { methodNotAllowed } from "../middleware/methodNotAllowed.js";
import type { LLMProvider } from "../providers/index.js";

export function mountExpandRoute(router: Router, provider: LLMProvider): void {
  router
    .route("/expand")
    .post(async (req: Request, res: Response<ExpandResponse>, next: NextFunction) => {
      try {
        const input = textRequestSchema.parse(req.body);
        const text = await provider.complete(expandPrompt(input.text));
        res.json({ text });
      } catch (error) {
        next(error);
      }
    })
    .all(methodNotAllowed("POST"));
}

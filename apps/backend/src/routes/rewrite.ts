import type { NextFunction, Request, Response, Router } from "express";
import { rewriteRequestSchema, type RewriteResponse } from "@textkit/shared";
import { rewritePrompt } from "../lib/prompts.js";
import { methodNotAllowed } from "../middleware/methodNotAllowed.js";
import type { LLMProvider } from "../providers/index.js";

export function mountRewriteRoute(router: Router, provider: LLMProvider): void {
  router
    .route("/rewrite")
    .post(async (req: Request, res: Response<RewriteResponse>, next: NextFunction) => {
      try {
        const input = rewriteRequestSchema.parse(req.body);
        const text = await provider.complete(rewritePrompt(input.text, input.tone));
        res.json({ text });
      } catch (error) {
        next(error);
      }
    })
    .all(methodNotAllowed("POST"));
}

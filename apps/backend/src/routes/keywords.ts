import type { NextFunction, Request, Response, Router } from "express";
import { textRequestSchema, type KeywordsResponse } from "@textkit/shared";
import { keywordsPrompt } from "../lib/prompts.js";
import { parseStringList, toStringList } from "../lib/stringList.js";
import { methodNotAllowed } from "../middleware/methodNotAllowed.js";
import type { LLMProvider } from "../providers/index.js";

export function mountKeywordsRoute(router: Router, provider: LLMProvider): void {
  router
    .route("/keywords")
    .post(async (req: Request, res: Response<KeywordsResponse>, next: NextFunction) => {
      try {
        const input = textRequestSchema.parse(req.body);
        const reply = await provider.complete(keywordsPrompt(input.text));
        res.json({ keywords: toStringList(parseStringList(reply)) });
      } catch (error) {
        next(error);
      }
    })
    .all(methodNotAllowed("POST"));
}

import type { NextFunction, Request, Response, Router } from "express";
import { textRequestSchema, type TitlesResponse } from "@textkit/shared";
import { titlesPrompt } from "../lib/prompts.js";
import { parseStringList, toStringList } from "../lib/stringList.js";
import { methodNotAllowed } from "../middleware/methodNotAllowed.js";
import type { LLMProvider } from "../providers/index.js";

export function mountTitlesRoute(router: Router, provider: LLMProvider): void {
  router
    .route("/titles")
    .post(async (req: Request, res: Response<TitlesResponse>, next: NextFunction) => {
      try {
        const input = textRequestSchema.parse(req.body);
        const reply = await provider.complete(titlesPrompt(input.text));
        res.json({ titles: toStringList(parseStringList(reply)) });
      } catch (error) {
        next(error);
      }
    })
    .all(methodNotAllowed("POST"));
}

import type { NextFunction, Request, Response, Router } from "express";
import { textRequestSchema, type QuestionsResponse } from "@textkit/shared";
import { questionsPrompt } from "../lib/prompts.js";
import { parseStringList, toStringList } from "../lib/stringList.js";
import { methodNotAllowed } from "../middleware/methodNotAllowed.js";
import type { LLMProvider } from "../providers/index.js";

export function mountQuestionsRoute(router: Router, provider: LLMProvider): void {
  router
    .route("/questions")
    .post(async (req: Request, res: Response<QuestionsResponse>, next: NextFunction) => {
      try {
        const input = textRequestSchema.parse(req.body);
        const reply = await provider.complete(questionsPrompt(input.text));
        res.json({ questions: toStringList(parseStringList(reply)) });
      } catch (error) {
        next(error);
      }
    })
    .all(methodNotAllowed("POST"));
}

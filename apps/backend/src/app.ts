import cors from "cors";
import express, { type Express } from "express";
import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import type { HealthResponse } from "@textkit/shared";
import type { Logger } from "./logger.js";
import { createErrorHandler, notFound } from "./middleware/errorHandler.js";
import { requestId } from "./middleware/requestId.js";
import { requestLogger } from "./middleware/requestLogger.js";
import type { LLMProvider } from "./providers/index.js";
import { mountExpandRoute } from "./routes/expand.js";
import { mountKeywordsRoute } from "./routes/keywords.js";
import { mountQuestionsRoute } from "./routes/questions.js";
import { mountRewriteRoute } from "./routes/rewrite.js";
import { mountSummarizeRoute } from "./routes/summarize.js";
import { mountTitlesRoute } from "./routes/titles.js";

const DEFAULT_PUBLIC_DIR = fileURLToPath(new URL("../public", import.meta.url));

export interface AppOptions {
  provider: LLMProvider;
  logger: Logger;
  publicDir?: string;
}

export function createApp({ provider, logger, publicDir = DEFAULT_PUBLIC_DIR }: AppOptions): Express {
  const app = express();

  app.use(requestLogger(logger));
  app.use(requestId);
  app.use(
    cors({
      // Requests without an Origin get no CORS handling, so OPTIONS reaches the 405 handlers.
      origin(origin, callback) {
        callback(null, origin !== undefined && /^https?:\/\/localhost(:\d+)?$/.test(origin));
      }
    })
  );
  // Bodies are read as JSON whatever their Content-Type (curl -d sends form-urlencoded).
  app.use(express.json({ limit: "1mb", type: () => true }));

  const api = express.Router();
  mountSummarizeRoute(api, provider);
  mountKeywordsRoute(api, provider);
  mountRewriteRoute(api, provider);
  mountQuestionsRoute(api, provider);
  mountTitlesRoute(api, provider);
  mountExpandRoute(api, provider);

  app.get("/", (_req, res) => {
    res.sendFile(resolve(publicDir, "index.html"));
  });
  app.all("/health", (_req, res) => {
    const body: HealthResponse = { status: "ok" };
    res.json(body);
  });
  app.use(api);
  app.use(notFound);
  app.use(createErrorHandler(logger));

  return app;
}

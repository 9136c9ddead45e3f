import type { NextFunction, Request, Response } from "express";
import type { ErrorResponse } from "@textkit/shared";
import { ZodError } from "zod";
import { HttpError } from "../errors.js";
import type { Logger } from "../logger.js";
import { LLMError, UpstreamError } from "../providers/index.js";

export function notFound(_req: Request, res: Response<ErrorResponse>): void {
  res.status(404).json({ error: "Not Found", requestId: res.locals.requestId });
}

// body-parser rejects with http-errors carrying `type: "entity.*"` and a 4xx status.
function bodyParserFailure(err: unknown): { status: number; type: string; message: string } | undefined {
  if (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    err.type.startsWith("entity.") &&
    "status" in err &&
    typeof err.status === "number"
  ) {
    return { status: err.status, type: err.type, message: err.message };
  }
  return undefined;
}

export function createErrorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response<ErrorResponse>, _next: NextFunction): void => {
    const requestId: string | undefined = res.locals.requestId;

    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.message, requestId });
      return;
    }

    const bodyFailure = bodyParserFailure(err);
    if (bodyFailure) {
      const error = bodyFailure.type === "entity.parse.failed" ? "invalid JSON body" : bodyFailure.message;
      res.status(bodyFailure.status).json({ error, requestId });
      return;
    }

    if (err instanceof ZodError) {
      res.status(400).json({
        error: "invalid request body",
        requestId,
        issues: err.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
      });
      return;
    }

    if (err instanceof LLMError) {
      logger.error(
        {
          err,
          requestId,
          path: req.path,
          status: err instanceof UpstreamError ? err.status : undefined,
          upstreamBody: err instanceof UpstreamError ? err.body : undefined
        },
        "LLM call failed"
      );
      res.status(500).json({ error: "LLM error", requestId });
      return;
    }

    logger.error({ err, requestId, path: req.path }, "unhandled error");
    res.status(500).json({ error: "Internal Server Error", requestId });
  };
}

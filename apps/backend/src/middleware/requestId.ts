import type { NextFunction, Request, Response } from "express";
import { randomUUID } from "node:crypto";

const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

// Caller-supplied ids are echoed back and logged, so anything outside a
// conservative charset is replaced with a fresh UUID.
export function requestId(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header("x-request-id");
  const id = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();
  res.setHeader("x-request-id", id);
  res.locals.requestId = id;
  next();
}

import type { NextFunction, Request, Response } from "express";
import { HttpError } from "../errors.js";

export function methodNotAllowed(...allowed: string[]) {
  return (_req: Request, res: Response, next: NextFunction): void => {
    res.setHeader("Allow", allowed.join(", "));
    next(new HttpError(405, "Method Not Allowed"));
  };
}

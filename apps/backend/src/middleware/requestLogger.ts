import type { RequestHandler } from "express";
import morgan from "morgan";
import type { Logger } from "../logger.js";

/** Logs method and URL as soon as a request arrives, before any handler runs. */
export function requestLogger(logger: Logger): RequestHandler {
  return morgan(":method :url", {
    immediate: true,
    stream: {
      write: (line: string) => {
        logger.info(line.trim());
      }
    }
  });
}

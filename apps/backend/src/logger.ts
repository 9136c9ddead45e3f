import { pino, type Logger, type LoggerOptions } from "pino";

// Configure via env:
// - LOG_LEVEL: pino level (default: 'info')
// - LOG_PRETTY: 'true' to route output through pino-pretty
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const options: LoggerOptions = { level: env.LOG_LEVEL || "info" };
  if (env.LOG_PRETTY === "true") {
    options.transport = {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard" }
    };
  }
  return pino(options);
}

export type { Logger };

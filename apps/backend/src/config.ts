import { z } from "zod";

const envSchema = z.object({
  OPENAI_API_KEY: z.string({ required_error: "OPENAI_API_KEY env var is required" }).min(1, "OPENAI_API_KEY env var is required"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  MODEL: z.string().min(1).default("gpt-4o-mini")
});

export interface AppConfig {
  apiKey: string;
  port: number;
  model: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return {
    apiKey: parsed.data.OPENAI_API_KEY,
    port: parsed.data.PORT,
    model: parsed.data.MODEL
  };
}

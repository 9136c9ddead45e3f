import type { AppConfig } from "../config.js";
import type { LLMProvider } from "./LLMProvider.js";
import { OpenAIProvider } from "./OpenAIProvider.js";

export type { LLMProvider } from "./LLMProvider.js";
export * from "./errors.js";

export function createProvider(config: AppConfig): LLMProvider {
  return new OpenAIProvider(config.apiKey, config.model);
}

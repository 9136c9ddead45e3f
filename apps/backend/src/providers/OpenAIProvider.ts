import type { LLMProvider } from "./LLMProvider.js";
import { chatResponseSchema, type ChatRequest } from "./chatSchema.js";
import { DecodeError, EmptyResponseError, NetworkError, UpstreamError } from "./errors.js";

export const CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";
export const SYSTEM_PROMPT = "You are a helpful text-processing assistant.";

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Single-attempt chat-completion client. No retry, timeout or cancellation:
 * the caller's request waits for whatever the upstream does.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = "openai";

  constructor(
    private readonly apiKey: string,
    private readonly model: string
  ) {}

  async complete(prompt: string): Promise<string> {
    const request: ChatRequest = {
      model: this.model,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt }
      ]
    };

    let response: Response;
    let text: string;
    try {
      response = await fetch(CHAT_COMPLETIONS_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify(request)
      });
      text = await response.text();
    } catch (error) {
      throw new NetworkError(errorText(error), { cause: error });
    }

    if (response.status >= 400) {
      throw new UpstreamError(response.status, text);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(errorText(error), { cause: error });
    }

    const parsed = chatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DecodeError(parsed.error.message, { cause: parsed.error });
    }

    const [first] = parsed.data.choices;
    if (!first) {
      throw new EmptyResponseError();
    }
    return first.message.content;
  }
}

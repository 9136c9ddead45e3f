export interface LLMProvider {
  readonly name: string;
  /** Sends one prompt as the user message and resolves with the first choice's text. */
  complete(prompt: string): Promise<string>;
}

export class LLMError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LLMError";
  }
}

export class NetworkError extends LLMError {
  constructor(message: string, options?: ErrorOptions) {
    super(`LLM request failed before a response: ${message}`, options);
    this.name = "NetworkError";
  }
}

export class UpstreamError extends LLMError {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`LLM request failed with status ${status}`);
    this.name = "UpstreamError";
  }
}

export class DecodeError extends LLMError {
  constructor(message: string, options?: ErrorOptions) {
    super(`LLM response could not be decoded: ${message}`, options);
    this.name = "DecodeError";
  }
}

export class EmptyResponseError extends LLMError {
  constructor() {
    super("LLM response contained no choices");
    this.name = "EmptyResponseError";
  }
}

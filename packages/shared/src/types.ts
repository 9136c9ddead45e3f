export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface TextRequest {
  text: string;
}

export interface RewriteRequest {
  text: string;
  /** Free-text style descriptor, "neutral" when omitted. */
  tone?: string;
}

export interface SummarizeResponse {
  summary: string;
}

export interface KeywordsResponse {
  keywords: string[];
}

export interface RewriteResponse {
  text: string;
}

export interface QuestionsResponse {
  questions: string[];
}

export interface TitlesResponse {
  titles: string[];
}

export interface ExpandResponse {
  text: string;
}

export interface HealthResponse {
  status: "ok";
}

export interface ErrorResponse {
  error: string;
  requestId?: string;
  issues?: { path: string; message: string }[];
}

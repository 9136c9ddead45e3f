export function summarizePrompt(text: string): string {
  return `Summarize the following text in 3–5 bullet points. Be concise and clear.\n\n${text}`;
}

export function keywordsPrompt(text: string): string {
  return [
    "Extract 5–10 key keywords from the text below.",
    'Return ONLY a JSON array of strings. Example: ["keyword1","keyword2"].',
    "",
    "Text:",
    text
  ].join("\n");
}

export function rewritePrompt(text: string, tone: string): string {
  return `Rewrite the following text in a ${tone} tone. Preserve the original meaning. Respond with ONLY the rewritten text.\n\n${text}`;
}

export function questionsPrompt(text: string): string {
  return [
    "From the text below, generate 5–10 clear, helpful questions.",
    'Return ONLY a JSON array of strings. Example: ["Question 1?", "Question 2?"].',
    "",
    "Text:",
    text
  ].join("\n");
}

export function titlesPrompt(text: string): string {
  return [
    "Generate 5 concise, engaging title ideas for the text below.",
    'Return ONLY a JSON array of strings. Example: ["Title 1", "Title 2"].',
    "",
    "Text:",
    text
  ].join("\n");
}

export function expandPrompt(text: string): string {
  return [
    "Expand and elaborate on the following text.",
    "Add helpful explanations and details but keep it clear and readable.",
    "Respond with ONLY the expanded text.",
    "",
    "Text:",
    text
  ].join("\n");
}

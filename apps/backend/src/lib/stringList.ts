import { z } from "zod";

const stringArraySchema = z.array(z.string());

export type StringListResult = { kind: "parsed"; items: string[] } | { kind: "fallback"; text: string };

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Models are asked for a JSON array of strings but do not always comply;
 * anything else comes back as a fallback carrying the reply verbatim.
 */
export function parseStringList(reply: string): StringListResult {
  const json = parseJson(reply);
  if (json.ok) {
    const items = stringArraySchema.safeParse(json.value);
    if (items.success) {
      return { kind: "parsed", items: items.data };
    }
  }
  return { kind: "fallback", text: reply };
}

export function toStringList(result: StringListResult): string[] {
  return result.kind === "parsed" ? result.items : [result.text];
}

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CHAT_COMPLETIONS_URL, OpenAIProvider, SYSTEM_PROMPT } from "../src/providers/OpenAIProvider.js";
import { DecodeError, EmptyResponseError, NetworkError, UpstreamError } from "../src/providers/errors.js";

function chatReply(content: string | null): string {
  return JSON.stringify({ choices: [{ message: { role: "assistant", content } }] });
}

describe("OpenAIProvider", () => {
  const fetchMock = vi.fn<typeof fetch>();
  const provider = new OpenAIProvider("test-secret", "test-model");

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a system and a user message with bearer auth", async () => {
    fetchMock.mockResolvedValue(new Response(chatReply("done"), { status: 200 }));

    await provider.complete("do the thing");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(CHAT_COMPLETIONS_URL);
    expect(init?.method).toBe("POST");
    const headers = new Headers(init?.headers);
    expect(headers.get("authorization")).toBe("Bearer test-secret");
    expect(headers.get("content-type")).toBe("application/json");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: "do the thing" }
      ]
    });
  });

  it("returns the first choice's content untouched", async () => {
    fetchMock.mockResolvedValue(
      new Response(
        JSON.stringify({
          choices: [{ message: { role: "assistant", content: "  first\n" } }, { message: { role: "assistant", content: "second" } }]
        }),
        { status: 200 }
      )
    );

    await expect(provider.complete("p")).resolves.toBe("  first\n");
  });

  it("accepts a reply whose role it does not know", async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ choices: [{ message: { role: "tool", content: "ok" } }] }), { status: 200 })
    );

    await expect(provider.complete("p")).resolves.toBe("ok");
  });

  it("treats null content as an empty reply", async () => {
    fetchMock.mockResolvedValue(new Response(chatReply(null), { status: 200 }));

    await expect(provider.complete("p")).resolves.toBe("");
  });

  it("raises UpstreamError with status and body on an error status", async () => {
    fetchMock.mockResolvedValue(new Response('{"error":"quota exceeded"}', { status: 429 }));

    const error = await provider.complete("p").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(UpstreamError);
    if (error instanceof UpstreamError) {
      expect(error.status).toBe(429);
      expect(error.body).toBe('{"error":"quota exceeded"}');
    }
  });

  it("raises DecodeError on a non-JSON body", async () => {
    fetchMock.mockResolvedValue(new Response("<html>", { status: 200 }));

    await expect(provider.complete("p")).rejects.toBeInstanceOf(DecodeError);
  });

  it("raises DecodeError when the body has the wrong shape", async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ choices: "nope" }), { status: 200 }));

    await expect(provider.complete("p")).rejects.toBeInstanceOf(DecodeError);
  });

  it("raises EmptyResponseError when there are no choices", async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ choices: [] }), { status: 200 }));

    await expect(provider.complete("p")).rejects.toBeInstanceOf(EmptyResponseError);
  });

  it("raises NetworkError when fetch rejects", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));

    await expect(provider.complete("p")).rejects.toBeInstanceOf(NetworkError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

import { describe, expect, it } from "vitest";

import { ConfigError, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ OPENAI_API_KEY: "test-secret" })).toEqual({
      apiKey: "test-secret",
      port: 8080,
      model: "gpt-4o-mini"
    });
  });

  it("reads port and model overrides", () => {
    expect(loadConfig({ OPENAI_API_KEY: "test-secret", PORT: "9000", MODEL: "gpt-4o" })).toEqual({
      apiKey: "test-secret",
      port: 9000,
      model: "gpt-4o"
    });
  });

  it("requires the API key", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ OPENAI_API_KEY: "" })).toThrow("OPENAI_API_KEY env var is required");
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-secret", PORT: "http" })).toThrow(ConfigError);
  });
});

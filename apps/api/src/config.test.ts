import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { ConfigError } from "./errors";

describe("loadConfig", () => {
  it("fails fast without an API key", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ ANTHROPIC_API_KEY: "  " })).toThrow(
      "Invalid environment configuration: ANTHROPIC_API_KEY: ANTHROPIC_API_KEY is required."
    );
  });

  it("fills defaults around the credential", () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: "test-key" });
    expect(config.llm).toEqual({
      apiKey: "test-key",
      baseUrl: "https://api.anthropic.com/v1",
      apiVersion: "2023-06-01",
      model: "claude-sonnet-4-6",
      temperature: 0,
      timeoutMs: 45000,
    });
    expect(config.maxTokens).toEqual({ evaluation: 2000, swot: 1200, questions: 3000, alternatives: 1200 });
    expect(config.retryLimit).toBe(1);
    expect(config.server).toEqual({ port: 3001, host: "0.0.0.0" });
    expect(config.logLevel).toBe("info");
  });

  it("reads overrides and trims the base URL", () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: "test-key",
      ANTHROPIC_BASE_URL: "http://localhost:9999/v1/",
      ANTHROPIC_TIMEOUT_MS: "5000",
      LLM_RETRY_LIMIT: "0",
      PORT: "8080",
    });
    expect(config.llm.baseUrl).toBe("http://localhost:9999/v1");
    expect(config.llm.timeoutMs).toBe(5000);
    expect(config.retryLimit).toBe(0);
    expect(config.server.port).toBe(8080);
  });

  it("refuses more than one retry", () => {
    expect(() => loadConfig({ ANTHROPIC_API_KEY: "test-key", LLM_RETRY_LIMIT: "3" })).toThrow(ConfigError);
  });
});

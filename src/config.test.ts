import path from "path";
import { describe, expect, it } from "vitest";
import { DEFAULT_READY_MARKER, loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config.port).toBe(8000);
    expect(config.llm).toMatchObject({
      provider: "openai",
      temperature: 0.15,
      maxTokens: 4000,
      timeoutMs: 120_000,
      maxRetries: 2,
      openai: { model: "gpt-4.1-mini" },
    });
    expect(config.sessions).toEqual({
      idleTimeoutMs: 1_800_000,
      sweepIntervalMs: 60_000,
      maxHistory: 100,
      readyMarker: DEFAULT_READY_MARKER,
    });
    expect(config.corsOrigins).toBe("*");
    expect(config.defaultSlides).toBe(3);
    expect(path.basename(config.templatesPath)).toBe("templates.json");
  });

  it("coerces values and splits origins", () => {
    const config = loadConfig({
      PORT: "9100",
      DECK_LLM_PROVIDER: "anthropic",
      ANTHROPIC_API_KEY: " test-secret ",
      DECK_CORS_ORIGINS: "http://a.test, http://b.test",
      DECK_MAX_SLIDES: "5",
      DECK_DEFAULT_SLIDES: "8",
    });
    expect(config.port).toBe(9100);
    expect(config.llm.provider).toBe("anthropic");
    expect(config.llm.anthropic.apiKey).toBe("test-secret");
    expect(config.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
    expect(config.defaultSlides).toBe(5);
  });

  it("fails fast on invalid values", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(/^Invalid configuration: PORT:/);
    expect(() => loadConfig({ DECK_LLM_PROVIDER: "carrier-pigeon" })).toThrow(/DECK_LLM_PROVIDER/);
  });
});

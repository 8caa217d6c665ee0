import { describe, expect, it } from "vitest";
import { ANALYSIS_PROMPT, DEFAULT_MODEL, loadConfig } from "./config";

describe("loadConfig", () => {
  it("fills in the fixed request settings", () => {
    const config = loadConfig({ OPENROUTER_API_KEY: "test-secret" });

    expect(config).toEqual({
      apiKey: "test-secret",
      baseURL: "https://openrouter.ai/api/v1",
      model: DEFAULT_MODEL,
      prompt: ANALYSIS_PROMPT,
      temperature: 0.1,
      maxTokens: 1000,
      timeoutMs: 60_000,
      referer: "",
      title: "Food Safety Analyzer",
    });
  });

  it("treats a blank key as missing", () => {
    expect(loadConfig({ OPENROUTER_API_KEY: "   " }).apiKey).toBeUndefined();
    expect(loadConfig({}).apiKey).toBeUndefined();
  });

  it("reads attribution headers and a model override", () => {
    const config = loadConfig({
      OPENROUTER_API_KEY: "test-secret",
      HTTP_REFERER: "https://example.test",
      X_TITLE: "Lunch Check",
      FOOD_SAFETY_MODEL: "test/mock-model",
    });

    expect(config.referer).toBe("https://example.test");
    expect(config.title).toBe("Lunch Check");
    expect(config.model).toBe("test/mock-model");
  });

  it("returns a frozen value", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});

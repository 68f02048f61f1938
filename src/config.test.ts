import { describe, expect, it } from "vitest";
import { DEFAULT_GEMINI_MODEL } from "./ai/client.js";
import { DEFAULT_SCHEMA } from "./catalog.js";
import { loadConfig } from "./config.js";
import { AZURE_TRANSLATOR_URL } from "./translation/azure-translator.js";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      card: { schema: DEFAULT_SCHEMA, version: "1.2" },
      translator: { provider: "none" },
      port: 3000,
    });
  });

  it("reads card defaults and the port", () => {
    const config = loadConfig({ CARD_VERSION: " 1.5 ", CARD_SCHEMA: "urn:cards", PORT: "8080" });
    expect(config.card).toEqual({ schema: "urn:cards", version: "1.5" });
    expect(config.port).toBe(8080);
  });

  it("configures Azure with its defaults", () => {
    expect(loadConfig({ TRANSLATOR_PROVIDER: "Azure", AZURE_TRANSLATOR_KEY: "test-secret" }).translator).toEqual({
      provider: "azure",
      key: "test-secret",
      region: "global",
      baseUrl: AZURE_TRANSLATOR_URL,
    });
  });

  it("configures Gemini with the default model", () => {
    expect(loadConfig({ TRANSLATOR_PROVIDER: "gemini", GEMINI_API_KEY: "test-secret" }).translator).toEqual({
      provider: "gemini",
      apiKey: "test-secret",
      model: DEFAULT_GEMINI_MODEL,
    });
  });

  it("names the missing key for the chosen provider", () => {
    expect(() => loadConfig({ TRANSLATOR_PROVIDER: "azure", AZURE_TRANSLATOR_KEY: "  " })).toThrow(
      "Missing AZURE_TRANSLATOR_KEY. It is required when TRANSLATOR_PROVIDER=azure.",
    );
    expect(() => loadConfig({ TRANSLATOR_PROVIDER: "gemini" })).toThrow("Missing GEMINI_API_KEY.");
  });

  it("rejects unknown providers and bad ports", () => {
    expect(() => loadConfig({ TRANSLATOR_PROVIDER: "deepl" })).toThrow(
      "Unknown TRANSLATOR_PROVIDER 'deepl'. Use azure, gemini or none.",
    );
    expect(() => loadConfig({ PORT: "http" })).toThrow("Invalid PORT 'http'.");
  });
});

import { TranslatorConfig } from "../config.js";
import { TranslationService } from "../translator.js";
import { AzureTranslator } from "./azure-translator.js";
import { GeminiTranslator } from "./gemini-translator.js";

export { AzureTranslator, AZURE_TRANSLATOR_URL, loadSupportedLanguages, parseTranslateResponse } from "./azure-translator.js";
export { GeminiTranslator } from "./gemini-translator.js";

/** Returns undefined when translation is switched off. */
export function createTranslationService(config: TranslatorConfig): TranslationService | undefined {
  switch (config.provider) {
    case "azure":
      return new AzureTranslator({ key: config.key, region: config.region, baseUrl: config.baseUrl });
    case "gemini":
      return new GeminiTranslator({ apiKey: config.apiKey, model: config.model });
    case "none":
      return undefined;
  }
}

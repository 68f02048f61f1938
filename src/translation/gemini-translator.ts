import { AIClient } from "../ai/client.js";
import { buildTranslationPrompt } from "../ai/prompts.js";
import { TranslationRequestOptions, TranslationService } from "../translator.js";
import { isStringArray, stripCodeFences } from "../utils.js";

/** Minimal surface of the Gemini client used here. */
export interface ContentGenerator {
    generateContent(prompt: string, signal?: AbortSignal): Promise<string>;
}

export class GeminiTranslator implements TranslationService {
    private readonly client: ContentGenerator;

    constructor(client: ContentGenerator | { apiKey: string; model?: string }) {
        this.client = "generateContent" in client ? client : new AIClient(client.apiKey, client.model);
    }

    async translate(texts: string[], targetLanguage: string, options: TranslationRequestOptions = {}): Promise<string[]> {
        if (texts.length === 0) {
            return [];
        }

        const rawResponse = await this.client.generateContent(buildTranslationPrompt(texts, targetLanguage), options.signal);
        const cleanJson = stripCodeFences(rawResponse);

        let result: unknown;
        try {
            result = JSON.parse(cleanJson);
        } catch (err) {
            throw new Error(`Failed to parse Gemini translation response: ${err}\nResponse was: ${cleanJson}`);
        }

        if (!isStringArray(result)) {
            throw new Error("Gemini translation response is not an array of strings.");
        }

        if (result.length !== texts.length) {
            throw new Error(`Gemini returned ${result.length} translations for ${texts.length} texts.`);
        }

        return result;
    }
}

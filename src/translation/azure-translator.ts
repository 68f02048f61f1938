import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { UnsupportedLanguageError } from "../errors.js";
import { TranslationRequestOptions, TranslationService } from "../translator.js";
import { chunk, isRecord, isStringArray } from "../utils.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const AZURE_TRANSLATOR_URL = "https://api.cognitive.microsofttranslator.com/translate?api-version=3.0";

// ─── Supported Languages ────────────────────────────────────

let supportedLanguages: Set<string> | undefined;

export function loadSupportedLanguages(): Set<string> {
  if (supportedLanguages) {
    return supportedLanguages;
  }

  const file = path.join(__dirname, "..", "..", "src", "data", "translator-languages.json");
  const payload: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (!isStringArray(payload)) {
    throw new Error(`Invalid language list in ${file}: expected an array of language codes.`);
  }

  supportedLanguages = new Set(payload);
  return supportedLanguages;
}

// ─── Response Parsing ───────────────────────────────────────

interface AzureTranslation {
  text: string;
  to?: string;
}

function firstTranslation(entry: unknown): AzureTranslation | undefined {
  if (!isRecord(entry) || !Array.isArray(entry.translations)) {
    return undefined;
  }

  const [first]: unknown[] = entry.translations;
  if (!isRecord(first) || typeof first.text !== "string") {
    return undefined;
  }

  return { text: first.text, to: typeof first.to === "string" ? first.to : undefined };
}

export function parseTranslateResponse(payload: unknown, expected: number): string[] {
  if (!Array.isArray(payload)) {
    throw new Error("Unexpected Azure Translator response: expected an array.");
  }

  if (payload.length !== expected) {
    throw new Error(`Azure Translator returned ${payload.length} results for ${expected} texts.`);
  }

  return payload.map((entry, index) => {
    const translation = firstTranslation(entry);
    if (!translation) {
      throw new Error(`Azure Translator result ${index} has no translation text.`);
    }
    return translation.text;
  });
}

// ─── AzureTranslator ────────────────────────────────────────

export interface AzureTranslatorOptions {
  key: string;
  region?: string;
  baseUrl?: string;
  /** Texts per request; the service accepts at most 100. */
  batchSize?: number;
}

export class AzureTranslator implements TranslationService {
  static readonly MAX_BATCH = 100;

  private readonly region: string;
  private readonly baseUrl: string;
  private readonly batchSize: number;

  constructor(private readonly options: AzureTranslatorOptions) {
    this.region = options.region ?? "global";
    this.baseUrl = options.baseUrl ?? AZURE_TRANSLATOR_URL;
    this.batchSize = Math.min(options.batchSize ?? AzureTranslator.MAX_BATCH, AzureTranslator.MAX_BATCH);
  }

  async translate(texts: string[], targetLanguage: string, options: TranslationRequestOptions = {}): Promise<string[]> {
    if (!loadSupportedLanguages().has(targetLanguage)) {
      throw new UnsupportedLanguageError(targetLanguage, "Azure Translator");
    }

    if (texts.length === 0) {
      return [];
    }

    const batches = chunk(texts, this.batchSize);
    const results = await Promise.all(batches.map((batch) => this._post(batch, targetLanguage, options.signal)));
    return results.flat();
  }

  private async _post(batch: string[], targetLanguage: string, signal?: AbortSignal): Promise<string[]> {
    const url = `${this.baseUrl}&to=${encodeURIComponent(targetLanguage)}`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Ocp-Apim-Subscription-Key": this.options.key,
        "Ocp-Apim-Subscription-Region": this.region,
        "Content-Type": "application/json; charset=UTF-8",
      },
      body: JSON.stringify(batch.map((text) => ({ Text: text }))),
      signal,
    });

    if (!response.ok) {
      const message = await response.text();
      throw new Error(`Azure Translator request failed (${response.status}): ${message}`);
    }

    const payload: unknown = await response.json();
    return parseTranslateResponse(payload, batch.length);
  }
}

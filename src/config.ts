import dotenv from "dotenv";
import { DEFAULT_GEMINI_MODEL } from "./ai/client.js";
import { DEFAULT_SCHEMA, DEFAULT_VERSION } from "./catalog.js";
import { AZURE_TRANSLATOR_URL } from "./translation/azure-translator.js";

dotenv.config();

export type TranslatorConfig =
  | { provider: "none" }
  | { provider: "azure"; key: string; region: string; baseUrl: string }
  | { provider: "gemini"; apiKey: string; model: string };

export type TranslatorProvider = TranslatorConfig["provider"];

export interface AppConfig {
  card: {
    schema: string;
    version: string;
  };
  translator: TranslatorConfig;
  port: number;
}

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function requireValue(env: Env, name: string, reason: string): string {
  const value = read(env, name);
  if (!value) {
    throw new Error(`Missing ${name}. ${reason} Add it in your environment or .env file.`);
  }
  return value;
}

function loadTranslatorConfig(env: Env): TranslatorConfig {
  const provider = (read(env, "TRANSLATOR_PROVIDER") ?? "none").toLowerCase();

  switch (provider) {
    case "none":
      return { provider: "none" };
    case "azure":
      return {
        provider: "azure",
        key: requireValue(env, "AZURE_TRANSLATOR_KEY", "It is required when TRANSLATOR_PROVIDER=azure."),
        region: read(env, "AZURE_TRANSLATOR_REGION") ?? "global",
        baseUrl: read(env, "AZURE_TRANSLATOR_URL") ?? AZURE_TRANSLATOR_URL,
      };
    case "gemini":
      return {
        provider: "gemini",
        apiKey: requireValue(env, "GEMINI_API_KEY", "It is required when TRANSLATOR_PROVIDER=gemini."),
        model: read(env, "GEMINI_MODEL") ?? DEFAULT_GEMINI_MODEL,
      };
    default:
      throw new Error(`Unknown TRANSLATOR_PROVIDER '${provider}'. Use azure, gemini or none.`);
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const port = Number.parseInt(read(env, "PORT") ?? "3000", 10);
  if (!Number.isInteger(port) || port < 0) {
    throw new Error(`Invalid PORT '${env.PORT}'.`);
  }

  return {
    card: {
      schema: read(env, "CARD_SCHEMA") ?? DEFAULT_SCHEMA,
      version: read(env, "CARD_VERSION") ?? DEFAULT_VERSION,
    },
    translator: loadTranslatorConfig(env),
    port,
  };
}

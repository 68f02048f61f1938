export { CardBuilder, Checkpoint, ascend, resetToTop } from "./builder.js";
export type { AddOptions, BatchDirective, BatchEntry, RenderOptions } from "./builder.js";
export {
  CATALOG,
  DEFAULT_SCHEMA,
  DEFAULT_VERSION,
  ROOT_KIND,
  getKindDefinition,
  isActionKind,
  reservedFields,
} from "./catalog.js";
export type { CardKind } from "./catalog.js";
export { combineCards } from "./combine.js";
export { loadConfig } from "./config.js";
export type { AppConfig, TranslatorConfig, TranslatorProvider } from "./config.js";
export * from "./elements.js";
export {
  AttributeTypeError,
  CardError,
  ContainerMismatchError,
  InvalidCheckpointError,
  NodeAlreadyAttachedError,
  ReservedAttributeError,
  TranslationServiceError,
  UnknownSampleError,
  UnsupportedLanguageError,
} from "./errors.js";
export { CardNode } from "./node.js";
export type { AttributeInput, AttributeValue, NodeOptions } from "./node.js";
export { buildSample, listSamples, SAMPLES } from "./samples.js";
export { serializeCard, serializeNode, toJson } from "./serializer.js";
export type { JsonOptions } from "./serializer.js";
export { AzureTranslator, GeminiTranslator, createTranslationService } from "./translation/index.js";
export { collectTranslatableText, translateCard } from "./translator.js";
export type { TextSlot, TranslationRequestOptions, TranslationService } from "./translator.js";
export type * from "./types.js";
export { routeChild } from "./validator.js";

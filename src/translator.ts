import { TranslationServiceError, UnsupportedLanguageError } from "./errors.js";
import { CardNode } from "./node.js";
import { errorMessage, isStringArray } from "./utils.js";

export interface TranslationRequestOptions {
  signal?: AbortSignal;
}

/** Batch text translation: one ordered list in, one list of the same length back. */
export interface TranslationService {
  translate(texts: string[], targetLanguage: string, options?: TranslationRequestOptions): Promise<string[]>;
}

export interface TextSlot {
  node: CardNode;
  attribute: string;
  text: string;
}

function visit(node: CardNode, slots: TextSlot[]): void {
  if (node.translatable) {
    for (const attribute of node.translatableAttributes()) {
      const text = node.getAttribute(attribute);
      if (typeof text === "string") {
        slots.push({ node, attribute, text });
      }
    }
  }

  for (const value of node.attributes.values()) {
    if (value instanceof CardNode) {
      visit(value, slots);
    }
  }

  node.items?.forEach((child) => visit(child, slots));
  node.actions?.forEach((child) => visit(child, slots));
}

/** Pre-order list of every text attribute that a translation pass would rewrite. */
export function collectTranslatableText(root: CardNode): TextSlot[] {
  const slots: TextSlot[] = [];
  visit(root, slots);
  return slots;
}

/**
 * Translates every translatable text in the tree with a single service call.
 * Nothing is written unless the whole batch comes back intact.
 * Resolves to the number of attributes rewritten.
 */
export async function translateCard(
  root: CardNode,
  targetLanguage: string,
  service: TranslationService,
  options: TranslationRequestOptions = {},
): Promise<number> {
  const slots = collectTranslatableText(root);
  if (slots.length === 0) {
    return 0;
  }

  let translated: unknown;
  try {
    translated = await service.translate(
      slots.map((slot) => slot.text),
      targetLanguage,
      { signal: options.signal },
    );
  } catch (err) {
    // Caller error, not a service failure
    if (err instanceof UnsupportedLanguageError) {
      throw err;
    }
    throw new TranslationServiceError(`Translation to '${targetLanguage}' failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (options.signal?.aborted) {
    throw new TranslationServiceError("Translation was aborted before results were applied.");
  }

  if (!isStringArray(translated) || translated.length !== slots.length) {
    const received = Array.isArray(translated) ? `${translated.length} entries` : typeof translated;
    throw new TranslationServiceError(
      `Translation service returned ${received}; expected ${slots.length} strings.`,
    );
  }

  const results: string[] = translated;
  slots.forEach((slot, index) => {
    slot.node.setAttribute(slot.attribute, results[index]);
  });

  return slots.length;
}

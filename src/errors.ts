import { ContainerRole } from "./types.js";

export class CardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ContainerMismatchError extends CardError {
  constructor(
    readonly targetKind: string,
    readonly container: ContainerRole,
  ) {
    const hint =
      container === "actions"
        ? "Add an ActionSet first, or move the cursor to an element that holds actions."
        : "Use upOneLevel() or backToTop() to move the cursor out of the current element.";
    super(`${targetKind} has no ${container === "actions" ? "action" : "item"} container. ${hint}`);
  }
}

export class InvalidCheckpointError extends CardError {
  constructor() {
    super("Checkpoint was not produced by this card's saveLevel().");
  }
}

export class NodeAlreadyAttachedError extends CardError {
  constructor(readonly kind: string) {
    super(`${kind} is already part of a card; create a new element or clone() it.`);
  }
}

export class AttributeTypeError extends CardError {
  constructor(
    readonly kind: string,
    readonly attribute: string,
    readonly expected: string,
  ) {
    super(`${kind}.${attribute} expects a ${expected} value.`);
  }
}

export class ReservedAttributeError extends CardError {
  constructor(
    readonly kind: string,
    readonly attribute: string,
  ) {
    super(`${kind}.${attribute} is an output field of the card and cannot be set as an attribute.`);
  }
}

export class TranslationServiceError extends CardError {}

export class UnsupportedLanguageError extends CardError {
  constructor(
    readonly language: string,
    readonly provider: string,
  ) {
    super(`Language '${language}' is not supported by ${provider}.`);
  }
}

export class UnknownSampleError extends CardError {
  constructor(
    readonly sample: string,
    readonly available: string[],
  ) {
    super(`Sample '${sample}' not found. Available: ${available.join(", ")}`);
  }
}

import { AttributeType, KindDefinition } from "./types.js";

export const DEFAULT_SCHEMA = "http://adaptivecards.io/schemas/adaptive-card.json";
export const DEFAULT_VERSION = "1.2";

// ─── Shared Attribute Groups ────────────────────────────────

const ELEMENT = {
  id: "string",
  isVisible: "boolean",
  separator: "boolean",
  spacing: "string",
  height: "string",
} satisfies Record<string, AttributeType>;

const ACTION = {
  id: "string",
  title: "string",
  iconUrl: "string",
  style: "string",
} satisfies Record<string, AttributeType>;

const INPUT = {
  ...ELEMENT,
  id: "string",
  placeholder: "string",
} satisfies Record<string, AttributeType>;

const TEXT_STYLE = {
  color: "string",
  fontType: "string",
  isSubtle: "boolean",
  size: "string",
  weight: "string",
} satisfies Record<string, AttributeType>;

// ─── Kind Catalog ───────────────────────────────────────────

export const CATALOG = {
  AdaptiveCard: {
    type: "AdaptiveCard",
    emitType: true,
    action: false,
    attributes: {
      schema: "string",
      version: "string",
      fallbackText: "string",
      speak: "string",
      lang: "string",
      minHeight: "string",
      backgroundImage: "string",
      verticalContentAlignment: "string",
      selectAction: "node",
    },
    translatable: ["fallbackText", "speak"],
    containers: { items: "body", actions: "actions" },
  },
  Container: {
    type: "Container",
    emitType: true,
    action: false,
    attributes: {
      ...ELEMENT,
      style: "string",
      bleed: "boolean",
      minHeight: "string",
      verticalContentAlignment: "string",
      selectAction: "node",
    },
    translatable: [],
    containers: { items: "items" },
  },
  ColumnSet: {
    type: "ColumnSet",
    emitType: true,
    action: false,
    attributes: {
      ...ELEMENT,
      style: "string",
      bleed: "boolean",
      minHeight: "string",
      horizontalAlignment: "string",
      selectAction: "node",
    },
    translatable: [],
    containers: { items: "columns" },
  },
  Column: {
    type: "Column",
    emitType: true,
    action: false,
    attributes: {
      ...ELEMENT,
      width: "string|number",
      style: "string",
      bleed: "boolean",
      minHeight: "string",
      verticalContentAlignment: "string",
      selectAction: "node",
    },
    translatable: [],
    containers: { items: "items" },
  },
  TextBlock: {
    type: "TextBlock",
    emitType: true,
    action: false,
    attributes: {
      ...ELEMENT,
      ...TEXT_STYLE,
      text: "string",
      horizontalAlignment: "string",
      maxLines: "number",
      wrap: "boolean",
    },
    translatable: ["text"],
    containers: {},
  },
  Image: {
    type: "Image",
    emitType: true,
    action: false,
    attributes: {
      ...ELEMENT,
      url: "string",
      altText: "string",
      backgroundColor: "string",
      horizontalAlignment: "string",
      size: "string",
      style: "string",
      width: "string",
      selectAction: "node",
    },
    translatable: [],
    containers: {},
  },
  ImageSet: {
    type: "ImageSet",
    emitType: true,
    action: false,
    attributes: { ...ELEMENT, imageSize: "string" },
    translatable: [],
    containers: { items: "images" },
  },
  Media: {
    type: "Media",
    emitType: true,
    action: false,
    attributes: { ...ELEMENT, poster: "string", altText: "string" },
    translatable: [],
    containers: { items: "sources" },
  },
  MediaSource: {
    type: "MediaSource",
    emitType: false,
    action: false,
    attributes: { mimeType: "string", url: "string" },
    translatable: [],
    containers: {},
  },
  RichTextBlock: {
    type: "RichTextBlock",
    emitType: true,
    action: false,
    attributes: { ...ELEMENT, horizontalAlignment: "string" },
    translatable: [],
    containers: { items: "inlines" },
  },
  TextRun: {
    type: "TextRun",
    emitType: true,
    action: false,
    attributes: {
      ...TEXT_STYLE,
      text: "string",
      highlight: "boolean",
      italic: "boolean",
      strikethrough: "boolean",
      selectAction: "node",
    },
    translatable: ["text"],
    containers: {},
  },
  FactSet: {
    type: "FactSet",
    emitType: true,
    action: false,
    attributes: { ...ELEMENT },
    translatable: [],
    containers: { items: "facts" },
  },
  Fact: {
    type: "Fact",
    emitType: false,
    action: false,
    attributes: { title: "string", value: "string" },
    translatable: ["title", "value"],
    containers: {},
  },
  ActionSet: {
    type: "ActionSet",
    emitType: true,
    action: false,
    attributes: { ...ELEMENT },
    translatable: [],
    containers: { actions: "actions" },
  },
  "Action.OpenUrl": {
    type: "Action.OpenUrl",
    emitType: true,
    action: true,
    attributes: { ...ACTION, url: "string" },
    translatable: ["title"],
    containers: {},
  },
  "Action.Submit": {
    type: "Action.Submit",
    emitType: true,
    action: true,
    attributes: { ...ACTION, data: "string" },
    translatable: ["title"],
    containers: {},
  },
  "Action.ShowCard": {
    type: "Action.ShowCard",
    emitType: true,
    action: true,
    attributes: { ...ACTION },
    translatable: ["title"],
    containers: { items: "body", actions: "actions" },
    wrapper: { field: "card", type: "AdaptiveCard" },
  },
  "Action.ToggleVisibility": {
    type: "Action.ToggleVisibility",
    emitType: true,
    action: true,
    attributes: { ...ACTION },
    translatable: ["title"],
    containers: { items: "targetElements" },
  },
  TargetElement: {
    type: "TargetElement",
    emitType: false,
    action: false,
    attributes: { elementId: "string", isVisible: "boolean" },
    translatable: [],
    containers: {},
  },
  "Input.Text": {
    type: "Input.Text",
    emitType: true,
    action: false,
    attributes: {
      ...INPUT,
      title: "string",
      value: "string",
      isMultiline: "boolean",
      maxLength: "number",
      style: "string",
      inlineAction: "node",
    },
    translatable: ["title", "placeholder", "value"],
    containers: {},
  },
  "Input.Number": {
    type: "Input.Number",
    emitType: true,
    action: false,
    attributes: { ...INPUT, min: "number", max: "number", value: "number" },
    translatable: ["placeholder"],
    containers: {},
  },
  "Input.Date": {
    type: "Input.Date",
    emitType: true,
    action: false,
    attributes: { ...INPUT, min: "string", max: "string", value: "string" },
    translatable: [],
    containers: {},
  },
  "Input.Time": {
    type: "Input.Time",
    emitType: true,
    action: false,
    attributes: { ...INPUT, min: "string", max: "string", value: "string" },
    translatable: [],
    containers: {},
  },
  "Input.Toggle": {
    type: "Input.Toggle",
    emitType: true,
    action: false,
    attributes: {
      ...ELEMENT,
      id: "string",
      title: "string",
      value: "string",
      valueOn: "string",
      valueOff: "string",
      wrap: "boolean",
    },
    translatable: ["title"],
    containers: {},
  },
  "Input.ChoiceSet": {
    type: "Input.ChoiceSet",
    emitType: true,
    action: false,
    attributes: {
      ...INPUT,
      isMultiSelect: "boolean",
      style: "string",
      value: "string",
      wrap: "boolean",
    },
    translatable: ["placeholder"],
    containers: { items: "choices" },
  },
  "Input.Choice": {
    type: "Input.Choice",
    emitType: false,
    action: false,
    attributes: { title: "string", value: "string" },
    translatable: ["title", "value"],
    containers: {},
  },
} satisfies Record<string, KindDefinition>;

export type CardKind = keyof typeof CATALOG;

export const ROOT_KIND = "AdaptiveCard" satisfies CardKind;

export function getKindDefinition(kind: CardKind): KindDefinition {
  return CATALOG[kind];
}

export function isActionKind(kind: CardKind): boolean {
  return getKindDefinition(kind).action;
}

/** Output fields the serializer owns for a kind; attributes may not use them. */
export function reservedFields(kind: CardKind): string[] {
  const { containers, wrapper } = getKindDefinition(kind);
  const fields = ["type", containers.items, containers.actions, wrapper?.field];
  return fields.filter((field): field is string => field !== undefined);
}

export function expectedAttributeType(kind: CardKind, attribute: string): AttributeType | undefined {
  const attributes: Record<string, AttributeType> = getKindDefinition(kind).attributes;
  return Object.hasOwn(attributes, attribute) ? attributes[attribute] : undefined;
}

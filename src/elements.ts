import { CATALOG, CardKind } from "./catalog.js";
import { AttributeInput, CardNode, NodeOptions } from "./node.js";
import { AttributeType, Primitive } from "./types.js";

type ValueOf<T extends AttributeType> = T extends "string"
  ? string
  : T extends "number"
    ? number
    : T extends "boolean"
      ? boolean
      : T extends "string|number"
        ? string | number
        : T extends "node"
          ? CardNode
          : Primitive[];

type KnownAttributes<K extends CardKind> = (typeof CATALOG)[K]["attributes"];

/** Catalog attributes of a kind, typed; any other name passes through as given. */
export type ElementAttributes<K extends CardKind> = {
  [A in keyof KnownAttributes<K>]?: KnownAttributes<K>[A] extends AttributeType
    ? ValueOf<KnownAttributes<K>[A]>
    : never;
} & AttributeInput &
  NodeOptions;

export function createElement<K extends CardKind>(
  kind: K,
  attributes?: ElementAttributes<K>,
  required: AttributeInput = {},
): CardNode {
  const { dontTranslate, ...rest }: AttributeInput & NodeOptions = attributes ?? {};
  const merged: AttributeInput = { ...required };
  for (const [name, value] of Object.entries(rest)) {
    if (value !== undefined) {
      merged[name] = value;
    }
  }
  return new CardNode(kind, merged, { dontTranslate: dontTranslate === true });
}

// ─── Layout ─────────────────────────────────────────────────

export function container(attributes?: ElementAttributes<"Container">): CardNode {
  return createElement("Container", attributes);
}

export function columnSet(attributes?: ElementAttributes<"ColumnSet">): CardNode {
  return createElement("ColumnSet", attributes);
}

export function column(attributes?: ElementAttributes<"Column">): CardNode {
  return createElement("Column", attributes);
}

export function factSet(attributes?: ElementAttributes<"FactSet">): CardNode {
  return createElement("FactSet", attributes);
}

export function fact(title: string, value: string, options?: NodeOptions): CardNode {
  return createElement("Fact", options, { title, value });
}

export function imageSet(attributes?: ElementAttributes<"ImageSet">): CardNode {
  return createElement("ImageSet", attributes);
}

// ─── Content ────────────────────────────────────────────────

export function textBlock(text: string, attributes?: ElementAttributes<"TextBlock">): CardNode {
  return createElement("TextBlock", attributes, { text });
}

export function richTextBlock(attributes?: ElementAttributes<"RichTextBlock">): CardNode {
  return createElement("RichTextBlock", attributes);
}

export function textRun(text: string, attributes?: ElementAttributes<"TextRun">): CardNode {
  return createElement("TextRun", attributes, { text });
}

export function image(url: string, attributes?: ElementAttributes<"Image">): CardNode {
  return createElement("Image", attributes, { url });
}

export function media(attributes?: ElementAttributes<"Media">): CardNode {
  return createElement("Media", attributes);
}

export function mediaSource(mimeType: string, url: string): CardNode {
  return createElement("MediaSource", undefined, { mimeType, url });
}

// ─── Actions ────────────────────────────────────────────────

export function actionSet(attributes?: ElementAttributes<"ActionSet">): CardNode {
  return createElement("ActionSet", attributes);
}

export function actionOpenUrl(url: string, attributes?: ElementAttributes<"Action.OpenUrl">): CardNode {
  return createElement("Action.OpenUrl", attributes, { url });
}

export function actionSubmit(attributes?: ElementAttributes<"Action.Submit">): CardNode {
  return createElement("Action.Submit", attributes);
}

/** Holds a nested card: its items and actions are filled through the builder like any other container. */
export function actionShowCard(attributes?: ElementAttributes<"Action.ShowCard">): CardNode {
  return createElement("Action.ShowCard", attributes);
}

export function actionToggleVisibility(attributes?: ElementAttributes<"Action.ToggleVisibility">): CardNode {
  return createElement("Action.ToggleVisibility", attributes);
}

export function targetElement(elementId: string, attributes?: ElementAttributes<"TargetElement">): CardNode {
  return createElement("TargetElement", attributes, { elementId });
}

// ─── Inputs ─────────────────────────────────────────────────

export function inputText(id: string, attributes?: ElementAttributes<"Input.Text">): CardNode {
  return createElement("Input.Text", attributes, { id });
}

export function inputNumber(id: string, attributes?: ElementAttributes<"Input.Number">): CardNode {
  return createElement("Input.Number", attributes, { id });
}

export function inputDate(id: string, attributes?: ElementAttributes<"Input.Date">): CardNode {
  return createElement("Input.Date", attributes, { id });
}

export function inputTime(id: string, attributes?: ElementAttributes<"Input.Time">): CardNode {
  return createElement("Input.Time", attributes, { id });
}

export function inputToggle(title: string, id: string, attributes?: ElementAttributes<"Input.Toggle">): CardNode {
  return createElement("Input.Toggle", attributes, { title, id });
}

export function inputChoiceSet(id: string, attributes?: ElementAttributes<"Input.ChoiceSet">): CardNode {
  return createElement("Input.ChoiceSet", attributes, { id });
}

export function inputChoice(title: string, value: string, options?: NodeOptions): CardNode {
  return createElement("Input.Choice", options, { title, value });
}

import { DEFAULT_SCHEMA, DEFAULT_VERSION } from "./catalog.js";
import { AttributeValue, CardNode } from "./node.js";
import { CardDocument, DocumentValue, SerializeOverrides, SerializedNode } from "./types.js";

export interface JsonOptions extends SerializeOverrides {
  pretty?: boolean;
}

function serializeValue(value: AttributeValue): DocumentValue {
  if (value instanceof CardNode) {
    return serializeNode(value);
  }
  return Array.isArray(value) ? [...value] : value;
}

function serializeChildren(children: readonly CardNode[] | undefined): SerializedNode[] {
  return (children ?? []).map((child) => serializeNode(child));
}

export function serializeNode(node: CardNode): SerializedNode {
  const definition = node.definition;
  const output: SerializedNode = {};

  if (definition.emitType) {
    output.type = definition.type;
  }

  for (const [name, value] of node.attributes) {
    output[name] = serializeValue(value);
  }

  // Action.ShowCard keeps its containers inside a nested card object
  const target: SerializedNode = definition.wrapper ? { type: definition.wrapper.type } : output;
  if (definition.containers.items) {
    target[definition.containers.items] = serializeChildren(node.items);
  }
  if (definition.containers.actions) {
    target[definition.containers.actions] = serializeChildren(node.actions);
  }
  if (definition.wrapper) {
    output[definition.wrapper.field] = target;
  }

  return output;
}

function stringAttribute(node: CardNode, name: string): string | undefined {
  const value = node.getAttribute(name);
  return typeof value === "string" ? value : undefined;
}

/** Serializes a card root. Read-only: overrides apply to the output, not the tree. */
export function serializeCard(root: CardNode, overrides: SerializeOverrides = {}): CardDocument {
  const extra: SerializedNode = {};
  for (const [name, value] of root.attributes) {
    if (name !== "schema" && name !== "version") {
      extra[name] = serializeValue(value);
    }
  }

  return {
    type: root.definition.type,
    schema: overrides.schema ?? stringAttribute(root, "schema") ?? DEFAULT_SCHEMA,
    version: overrides.version ?? stringAttribute(root, "version") ?? DEFAULT_VERSION,
    ...extra,
    body: serializeChildren(root.items),
    actions: serializeChildren(root.actions),
  };
}

export function toJson(root: CardNode, options: JsonOptions = {}): string {
  const { pretty, ...overrides } = options;
  return JSON.stringify(serializeCard(root, overrides), null, pretty ? 2 : undefined);
}

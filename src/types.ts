export type Primitive = string | number | boolean;

export type AttributeType = "string" | "number" | "boolean" | "string|number" | "node" | "list";

export type ContainerRole = "items" | "actions";

/** Index of a node in its document's arena. */
export type NodeId = number;

export interface ContainerFields {
  items?: string;
  actions?: string;
}

export interface KindDefinition {
  type: string;
  emitType: boolean;
  action: boolean;
  attributes: Record<string, AttributeType>;
  translatable: string[];
  containers: ContainerFields;
  /** Containers serialize inside a nested object under this field. */
  wrapper?: { field: string; type: string };
}

// ─── Serialized Output ──────────────────────────────────────

export type DocumentValue = Primitive | Primitive[] | SerializedNode;

export interface SerializedNode {
  [field: string]: DocumentValue | SerializedNode[];
}

export interface CardDocument extends SerializedNode {
  type: string;
  schema: string;
  version: string;
  body: SerializedNode[];
  actions: SerializedNode[];
}

export interface SerializeOverrides {
  schema?: string;
  version?: string;
}

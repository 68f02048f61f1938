import { CardKind, expectedAttributeType, getKindDefinition, reservedFields } from "./catalog.js";
import { AttributeTypeError, NodeAlreadyAttachedError, ReservedAttributeError } from "./errors.js";
import { AttributeType, ContainerRole, KindDefinition, NodeId, Primitive } from "./types.js";

export type AttributeValue = Primitive | Primitive[] | CardNode;

export type AttributeInput = Record<string, AttributeValue | undefined>;

export type NodeOptions = {
  /** Exclude this node's own text from translation. */
  dontTranslate?: boolean;
};

function isPrimitive(value: unknown): value is Primitive {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function matchesType(value: AttributeValue, expected: AttributeType): boolean {
  switch (expected) {
    case "string":
    case "number":
    case "boolean":
      return typeof value === expected;
    case "string|number":
      return typeof value === "string" || typeof value === "number";
    case "node":
      return value instanceof CardNode;
    case "list":
      return Array.isArray(value) && value.every(isPrimitive);
  }
}

/**
 * One element of a card tree. The kind fixes which containers exist;
 * attributes and container contents change as the card is built.
 */
export class CardNode {
  readonly kind: CardKind;
  readonly dontTranslate: boolean;

  private readonly attrs = new Map<string, AttributeValue>();
  private readonly itemList?: CardNode[];
  private readonly actionList?: CardNode[];
  private nodeId?: NodeId;
  private parentId?: NodeId;

  constructor(kind: CardKind, attributes: AttributeInput = {}, options: NodeOptions = {}) {
    const definition = getKindDefinition(kind);
    this.kind = kind;
    this.dontTranslate = options.dontTranslate ?? false;

    if (definition.containers.items) {
      this.itemList = [];
    }
    if (definition.containers.actions) {
      this.actionList = [];
    }

    for (const [name, value] of Object.entries(attributes)) {
      this.setAttribute(name, value);
    }
  }

  get definition(): KindDefinition {
    return getKindDefinition(this.kind);
  }

  get id(): NodeId | undefined {
    return this.nodeId;
  }

  get parent(): NodeId | undefined {
    return this.parentId;
  }

  get attached(): boolean {
    return this.nodeId !== undefined;
  }

  get items(): readonly CardNode[] | undefined {
    return this.itemList;
  }

  get actions(): readonly CardNode[] | undefined {
    return this.actionList;
  }

  get attributes(): ReadonlyMap<string, AttributeValue> {
    return this.attrs;
  }

  get composite(): boolean {
    return this.itemList !== undefined || this.actionList !== undefined;
  }

  get translatable(): boolean {
    return !this.dontTranslate && this.translatableAttributes().length > 0;
  }

  /** Names of this node's translatable attributes that currently hold text. */
  translatableAttributes(): string[] {
    return this.definition.translatable.filter((name) => typeof this.attrs.get(name) === "string");
  }

  getAttribute(name: string): AttributeValue | undefined {
    return this.attrs.get(name);
  }

  /** Node values are stored as copies. Reserved output field names are refused. */
  setAttribute(name: string, value: AttributeValue | undefined): this {
    if (reservedFields(this.kind).includes(name)) {
      throw new ReservedAttributeError(this.kind, name);
    }

    if (value === undefined) {
      this.attrs.delete(name);
      return this;
    }

    const expected = expectedAttributeType(this.kind, name);
    if (expected && !matchesType(value, expected)) {
      throw new AttributeTypeError(this.kind, name, expected);
    }

    if (value instanceof CardNode) {
      this.attrs.set(name, value.clone());
    } else {
      this.attrs.set(name, Array.isArray(value) ? [...value] : value);
    }
    return this;
  }

  container(role: ContainerRole): readonly CardNode[] | undefined {
    return role === "items" ? this.itemList : this.actionList;
  }

  /** @internal Called by the builder once it has accepted this node. */
  attach(id: NodeId, parent: NodeId | undefined): void {
    if (this.nodeId !== undefined) {
      throw new NodeAlreadyAttachedError(this.kind);
    }
    this.nodeId = id;
    this.parentId = parent;
  }

  /** @internal Appends a child the builder has already validated. */
  appendChild(role: ContainerRole, child: CardNode): void {
    const list = role === "items" ? this.itemList : this.actionList;
    if (!list) {
      throw new Error(`${this.kind} has no ${role} container.`);
    }
    list.push(child);
  }

  /** Deep copy with no document membership. */
  clone(): CardNode {
    const copy = new CardNode(this.kind, Object.fromEntries(this.attrs), { dontTranslate: this.dontTranslate });
    this.itemList?.forEach((child) => copy.appendChild("items", child.clone()));
    this.actionList?.forEach((child) => copy.appendChild("actions", child.clone()));
    return copy;
  }
}

import { DEFAULT_SCHEMA, DEFAULT_VERSION, ROOT_KIND } from "./catalog.js";
import { ElementAttributes, createElement } from "./elements.js";
import { CardError, InvalidCheckpointError, NodeAlreadyAttachedError } from "./errors.js";
import { CardNode } from "./node.js";
import { JsonOptions, serializeCard, toJson } from "./serializer.js";
import { TranslationService, translateCard } from "./translator.js";
import { CardDocument, ContainerRole, NodeId, SerializeOverrides } from "./types.js";
import { routeChild } from "./validator.js";

// ─── Public Types ───────────────────────────────────────────

export interface AddOptions {
  /** Route into the cursor's action container. Action kinds go there regardless. */
  action?: boolean;
  /** Move into composite nodes after adding them. Defaults to true. */
  descend?: boolean;
  /** Leave the cursor where it was before the call. */
  preserveLevel?: boolean;
}

export interface BatchDirective {
  readonly directive: "ascend" | "reset";
}

export type BatchEntry = CardNode | BatchDirective;

/** Batch entry: move the cursor up one level. */
export const ascend: BatchDirective = Object.freeze({ directive: "ascend" });

/** Batch entry: move the cursor back to the card root. */
export const resetToTop: BatchDirective = Object.freeze({ directive: "reset" });

/** Opaque token for a saved cursor position. Only meaningful to the card that issued it. */
export class Checkpoint {
  private readonly token = "checkpoint";
}

export interface RenderOptions extends SerializeOverrides {
  language?: string;
  translator?: TranslationService;
  signal?: AbortSignal;
}

interface PlannedStep {
  target: CardNode;
  node: CardNode;
  role: ContainerRole;
}

// ─── CardBuilder ────────────────────────────────────────────

/**
 * Builds one card through a cursor. `add` appends to the node under the
 * cursor and, when the new node has containers of its own, moves into it.
 *
 * ```ts
 * const card = new CardBuilder();
 * card.add(columnSet()).add(column()).add(textBlock("Left"));
 * card.upOneLevel().add(column()).add(textBlock("Right"));
 * ```
 */
export class CardBuilder {
  readonly root: CardNode;

  private readonly nodes: CardNode[] = [];
  private readonly checkpoints = new WeakMap<Checkpoint, NodeId>();
  private readonly checkpointByNode = new Map<NodeId, Checkpoint>();
  private readonly rootId: NodeId;
  private cursorId: NodeId;

  static create(attributes?: ElementAttributes<"AdaptiveCard">): CardBuilder {
    return new CardBuilder(attributes);
  }

  constructor(attributes?: ElementAttributes<"AdaptiveCard">) {
    this.root = createElement(ROOT_KIND, attributes, { schema: DEFAULT_SCHEMA, version: DEFAULT_VERSION });
    this.rootId = this.register(this.root, undefined);
    this.cursorId = this.rootId;
  }

  get cursor(): CardNode {
    return this.nodes[this.cursorId];
  }

  /** Levels between the cursor and the root. */
  get depth(): number {
    let depth = 0;
    let parent = this.cursor.parent;
    while (parent !== undefined) {
      depth += 1;
      parent = this.nodes[parent].parent;
    }
    return depth;
  }

  /** Number of nodes in the card, root included. */
  get size(): number {
    return this.nodes.length;
  }

  nodeById(id: NodeId): CardNode | undefined {
    return this.nodes[id];
  }

  // ─── Construction ─────────────────────────────────────────

  add(node: CardNode, options: AddOptions = {}): this {
    const { action = false, descend = true, preserveLevel = false } = options;
    const target = this.cursor;

    this.assertAddable(node, new Set());
    const role = routeChild(target, node, action);

    const id = this.register(node, target.id);
    target.appendChild(role, node);

    if (descend && !preserveLevel && node.composite) {
      this.cursorId = id;
    }
    return this;
  }

  /**
   * Adds a flat sequence of nodes and cursor directives in order.
   * The batch is planned before anything changes: a failing entry leaves
   * the card and the cursor exactly as they were.
   */
  addBatch(entries: readonly BatchEntry[], options: { preserveLevel?: boolean } = {}): this {
    const steps: PlannedStep[] = [];
    const plannedParents = new Map<CardNode, CardNode>();
    const seen = new Set<CardNode>();
    let cursor = this.cursor;

    for (const entry of entries) {
      if (!(entry instanceof CardNode)) {
        if (entry.directive === "reset") {
          cursor = this.root;
        } else {
          cursor = plannedParents.get(cursor) ?? this.parentOf(cursor) ?? cursor;
        }
        continue;
      }

      this.assertAddable(entry, seen);
      steps.push({ target: cursor, node: entry, role: routeChild(cursor, entry) });
      if (entry.composite) {
        plannedParents.set(entry, cursor);
        cursor = entry;
      }
    }

    for (const step of steps) {
      this.register(step.node, step.target.id);
      step.target.appendChild(step.role, step.node);
    }

    if (!options.preserveLevel && cursor.id !== undefined) {
      this.cursorId = cursor.id;
    }
    return this;
  }

  // ─── Navigation ───────────────────────────────────────────

  /** Moves the cursor to its parent. At the root this does nothing. */
  upOneLevel(): this {
    const parent = this.cursor.parent;
    if (parent !== undefined) {
      this.cursorId = parent;
    }
    return this;
  }

  backToTop(): this {
    this.cursorId = this.rootId;
    return this;
  }

  saveLevel(): Checkpoint {
    const existing = this.checkpointByNode.get(this.cursorId);
    if (existing) {
      return existing;
    }

    const checkpoint = new Checkpoint();
    this.checkpoints.set(checkpoint, this.cursorId);
    this.checkpointByNode.set(this.cursorId, checkpoint);
    return checkpoint;
  }

  loadLevel(checkpoint: Checkpoint): this {
    const id = this.checkpoints.get(checkpoint);
    if (id === undefined) {
      throw new InvalidCheckpointError();
    }
    this.cursorId = id;
    return this;
  }

  // ─── Output ───────────────────────────────────────────────

  toDocument(overrides?: SerializeOverrides): CardDocument {
    return serializeCard(this.root, overrides);
  }

  toJson(options?: JsonOptions): string {
    return toJson(this.root, options);
  }

  translate(language: string, translator: TranslationService, signal?: AbortSignal): Promise<number> {
    return translateCard(this.root, language, translator, { signal });
  }

  /** Translates first when a language is given, then serializes. */
  async render(options: RenderOptions = {}): Promise<CardDocument> {
    const { language, translator, signal, ...overrides } = options;
    if (language) {
      if (!translator) {
        throw new CardError(`Rendering in '${language}' requires a translation service.`);
      }
      await translateCard(this.root, language, translator, { signal });
    }
    return serializeCard(this.root, overrides);
  }

  // ─── Internals ────────────────────────────────────────────

  private parentOf(node: CardNode): CardNode | undefined {
    return node.parent === undefined ? undefined : this.nodes[node.parent];
  }

  /** Checks a node and every child it already carries; `seen` collects them. */
  private assertAddable(node: CardNode, seen: Set<CardNode>): void {
    if (node.attached || seen.has(node)) {
      throw new NodeAlreadyAttachedError(node.kind);
    }
    if (node.kind === ROOT_KIND) {
      throw new CardError(`${ROOT_KIND} can only be the root of a card; use Action.ShowCard to nest one.`);
    }
    seen.add(node);
    node.items?.forEach((child) => this.assertAddable(child, seen));
    node.actions?.forEach((child) => this.assertAddable(child, seen));
  }

  /** Assigns arena ids to a node and to any children it already carries. */
  private register(node: CardNode, parent: NodeId | undefined): NodeId {
    const id = this.nodes.length;
    node.attach(id, parent);
    this.nodes.push(node);
    node.items?.forEach((child) => this.register(child, id));
    node.actions?.forEach((child) => this.register(child, id));
    return id;
  }
}

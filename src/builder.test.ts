import { describe, expect, it } from "vitest";
import { CardBuilder, Checkpoint, ascend, resetToTop } from "./builder.js";
import {
  actionOpenUrl,
  actionSet,
  actionShowCard,
  actionSubmit,
  column,
  columnSet,
  container,
  inputText,
  textBlock,
} from "./elements.js";
import { CardError, ContainerMismatchError, InvalidCheckpointError, NodeAlreadyAttachedError } from "./errors.js";
import { CardNode } from "./node.js";

function everyParentMatches(card: CardBuilder, node: CardNode = card.root): boolean {
  const children = [...(node.items ?? []), ...(node.actions ?? [])];
  return children.every((child) => child.parent === node.id && everyParentMatches(card, child));
}

describe("CardBuilder", () => {
  describe("add", () => {
    it("starts with the cursor on an empty root", () => {
      const card = new CardBuilder();

      expect(card.cursor).toBe(card.root);
      expect(card.depth).toBe(0);
      expect(card.size).toBe(1);
      expect(card.root.items).toEqual([]);
      expect(card.root.actions).toEqual([]);
    });

    it("descends into composite nodes and stays on the parent for leaves", () => {
      const card = new CardBuilder();
      const header = textBlock("Header");
      const set = columnSet();
      const first = column();

      card.add(header);
      expect(card.cursor).toBe(card.root);

      card.add(set).add(first);
      expect(card.cursor).toBe(first);
      expect(card.depth).toBe(2);
      expect(set.parent).toBe(card.root.id);
      expect(first.parent).toBe(set.id);
    });

    it("builds sibling columns through upOneLevel", () => {
      const card = new CardBuilder();
      card.add(textBlock("Header"));
      card.add(columnSet());
      card.add(column());
      card.add(textBlock("Cell text"));
      card.upOneLevel();
      card.add(column());
      card.add(textBlock("Second"));

      expect(card.toDocument().body).toEqual([
        { type: "TextBlock", text: "Header" },
        {
          type: "ColumnSet",
          columns: [
            { type: "Column", items: [{ type: "TextBlock", text: "Cell text" }] },
            { type: "Column", items: [{ type: "TextBlock", text: "Second" }] },
          ],
        },
      ]);
      expect(everyParentMatches(card)).toBe(true);
      expect(card.size).toBe(7);
    });

    it("keeps the cursor in place with descend: false or preserveLevel", () => {
      const card = new CardBuilder();

      card.add(container(), { descend: false });
      expect(card.cursor).toBe(card.root);

      card.add(columnSet(), { preserveLevel: true });
      expect(card.cursor).toBe(card.root);
      expect(card.root.items).toHaveLength(2);
    });

    it("routes action kinds into the action container", () => {
      const card = new CardBuilder();
      const open = actionOpenUrl("https://example.com");

      card.add(open);

      expect(card.root.actions).toEqual([open]);
      expect(card.root.items).toEqual([]);
    });

    it("routes any node into the action container when asked", () => {
      const card = new CardBuilder();
      card.add(actionShowCard({ title: "More" }));
      const input = inputText("note");

      card.add(input, { action: true });

      expect(card.cursor.actions).toEqual([input]);
      expect(card.cursor.items).toEqual([]);
    });

    it("leaves the card unchanged when the target has no matching container", () => {
      const card = new CardBuilder();
      const set = columnSet();
      card.add(set);

      expect(() => card.add(actionSubmit({ title: "Go" }))).toThrow(ContainerMismatchError);
      expect(set.items).toEqual([]);
      expect(card.cursor).toBe(set);
      expect(card.size).toBe(2);

      card.backToTop().add(actionSet());
      expect(() => card.add(textBlock("Not here"))).toThrow(ContainerMismatchError);
      expect(card.size).toBe(3);
    });

    it("refuses a node that is already in a card", () => {
      const card = new CardBuilder();
      const header = textBlock("Header");
      card.add(header);

      expect(() => card.add(header)).toThrow(NodeAlreadyAttachedError);
      expect(() => new CardBuilder().add(header)).toThrow(NodeAlreadyAttachedError);
      expect(card.root.items).toHaveLength(1);
    });

    it("refuses a second card root", () => {
      const card = new CardBuilder();
      expect(() => card.add(new CardNode("AdaptiveCard"))).toThrow(CardError);
    });

    it("registers children a node already carries", () => {
      const card = new CardBuilder();
      const copy = container();
      copy.appendChild("items", textBlock("Inside"));

      card.add(copy);

      expect(card.size).toBe(3);
      expect(copy.items?.[0].parent).toBe(copy.id);
    });
  });

  describe("create", () => {
    it("builds a card with root attributes over the defaults", () => {
      const card = CardBuilder.create({ version: "1.4", fallbackText: "Update your app" });

      expect(card).toBeInstanceOf(CardBuilder);
      expect(card.cursor).toBe(card.root);
      expect(card.toDocument()).toMatchObject({ version: "1.4", fallbackText: "Update your app", body: [] });
    });
  });

  describe("navigation", () => {
    it("does nothing when moving up from the root", () => {
      const card = new CardBuilder();
      card.upOneLevel().upOneLevel();
      expect(card.cursor).toBe(card.root);
    });

    it("returns to the root from any depth", () => {
      const card = new CardBuilder();
      card.add(container()).add(columnSet()).add(column());
      expect(card.depth).toBe(3);

      card.backToTop();
      expect(card.cursor).toBe(card.root);
      expect(card.depth).toBe(0);
    });

    it("restores a saved level after further adds", () => {
      const card = new CardBuilder();
      const box = container();
      card.add(box);
      const saved = card.saveLevel();

      card.add(columnSet()).add(column()).add(textBlock("Deep"));
      card.loadLevel(saved);

      expect(card.cursor).toBe(box);
      card.add(textBlock("Next"));
      expect(box.items?.map((node) => node.kind)).toEqual(["ColumnSet", "TextBlock"]);
    });

    it("keeps a checkpoint usable after it has been loaded", () => {
      const card = new CardBuilder();
      card.add(container());
      const saved = card.saveLevel();
      const box = card.cursor;

      card.backToTop().loadLevel(saved);
      card.backToTop().loadLevel(saved);

      expect(card.cursor).toBe(box);
    });

    it("hands out the same checkpoint for the same position", () => {
      const card = new CardBuilder();
      const first = card.saveLevel();
      card.add(textBlock("Leaf"));

      expect(card.saveLevel()).toBe(first);
    });

    it("treats a load right after a save as a no-op", () => {
      const card = new CardBuilder();
      card.add(container());
      const before = card.cursor;

      card.loadLevel(card.saveLevel());

      expect(card.cursor).toBe(before);
    });

    it("rejects checkpoints from another card", () => {
      const other = new CardBuilder();
      const foreign = other.saveLevel();
      const card = new CardBuilder();

      expect(() => card.loadLevel(foreign)).toThrow(InvalidCheckpointError);
      expect(() => card.loadLevel(new Checkpoint())).toThrow(InvalidCheckpointError);
    });
  });

  describe("addBatch", () => {
    it("applies nodes and directives in order", () => {
      const card = new CardBuilder();
      card.addBatch([
        textBlock("Header"),
        columnSet(),
        column(),
        textBlock("Cell text"),
        ascend,
        column(),
        textBlock("Second"),
      ]);

      const columns = card.root.items?.[1].items ?? [];
      expect(columns.map((node) => node.items?.[0].getAttribute("text"))).toEqual(["Cell text", "Second"]);
      expect(card.cursor).toBe(columns[1]);
      expect(everyParentMatches(card)).toBe(true);
    });

    it("ends on the root after a reset", () => {
      const card = new CardBuilder();
      card.addBatch([columnSet(), column(), textBlock("A"), resetToTop, textBlock("B")]);

      expect(card.cursor).toBe(card.root);
      expect(card.root.items?.map((node) => node.kind)).toEqual(["ColumnSet", "TextBlock"]);
    });

    it("treats ascend at the root as a no-op", () => {
      const card = new CardBuilder();
      card.addBatch([ascend, textBlock("Still here")]);

      expect(card.root.items).toHaveLength(1);
      expect(card.cursor).toBe(card.root);
    });

    it("continues from the current cursor", () => {
      const card = new CardBuilder();
      const box = container();
      card.add(box);

      card.addBatch([ascend, textBlock("Sibling")]);

      expect(box.items).toEqual([]);
      expect(card.root.items).toHaveLength(2);
      expect(card.cursor).toBe(card.root);
    });

    it("restores the cursor with preserveLevel", () => {
      const card = new CardBuilder();
      card.addBatch([container(), textBlock("Inside")], { preserveLevel: true });

      expect(card.cursor).toBe(card.root);
      expect(card.root.items?.[0].items).toHaveLength(1);
    });

    it("changes nothing when an entry fails", () => {
      const card = new CardBuilder();
      const first = textBlock("First");

      expect(() => card.addBatch([first, actionSet(), textBlock("Nope")])).toThrow(ContainerMismatchError);

      expect(card.root.items).toEqual([]);
      expect(card.size).toBe(1);
      expect(card.cursor).toBe(card.root);
      expect(first.attached).toBe(false);
    });

    it("changes nothing when a carried child is already in the card", () => {
      const card = new CardBuilder();
      const header = textBlock("Header");
      card.add(header);
      const box = container();
      box.appendChild("items", header);

      expect(() => card.add(box)).toThrow(NodeAlreadyAttachedError);
      expect(() => card.addBatch([textBlock("Before"), box])).toThrow(NodeAlreadyAttachedError);

      expect(card.size).toBe(2);
      expect(card.root.items).toEqual([header]);
      expect(box.attached).toBe(false);
      expect(card.cursor).toBe(card.root);
    });

    it("refuses a carried child that appears twice", () => {
      const card = new CardBuilder();
      const shared = textBlock("Shared");
      const left = column();
      left.appendChild("items", shared);
      const right = column();
      right.appendChild("items", shared);

      expect(() => card.addBatch([columnSet(), left, ascend, right])).toThrow(NodeAlreadyAttachedError);
      expect(card.size).toBe(1);
      expect(left.attached).toBe(false);
    });

    it("refuses the same node twice in one batch", () => {
      const card = new CardBuilder();
      const header = textBlock("Header");

      expect(() => card.addBatch([header, header])).toThrow(NodeAlreadyAttachedError);
      expect(card.size).toBe(1);
    });
  });

  describe("render", () => {
    it("requires a translation service when a language is given", async () => {
      const card = new CardBuilder();
      await expect(card.render({ language: "fr" })).rejects.toThrow(CardError);
    });

    it("serializes with overrides when no language is given", async () => {
      const card = new CardBuilder();
      const document = await card.render({ version: "1.5" });

      expect(document.version).toBe("1.5");
      expect(card.root.getAttribute("version")).toBe("1.2");
    });
  });
});

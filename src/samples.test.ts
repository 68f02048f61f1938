import { describe, expect, it } from "vitest";
import { UnknownSampleError } from "./errors.js";
import { SAMPLES, buildSample, listSamples } from "./samples.js";
import { collectTranslatableText } from "./translator.js";
import { SerializedNode } from "./types.js";
import { isRecord } from "./utils.js";

function childList(node: SerializedNode | undefined, field: string): SerializedNode[] {
  const value: unknown = node?.[field];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is SerializedNode => isRecord(entry) && !Array.isArray(entry));
}

describe("samples", () => {
  it("lists every sample by name", () => {
    expect(listSamples().map((sample) => sample.name)).toEqual([
      "branch-locator",
      "schema-publish",
      "appointments",
      "transactions",
      "feedback",
    ]);
  });

  it.each(SAMPLES.map((sample) => sample.name))("builds %s into valid JSON", (name) => {
    const card = buildSample(name);
    expect(JSON.parse(card.toJson()).type).toBe("AdaptiveCard");
  });

  it("looks names up case-insensitively", () => {
    expect(buildSample("  Feedback ").root.items).toHaveLength(3);
  });

  it("reports the available samples for an unknown name", () => {
    expect(() => buildSample("weather")).toThrow(UnknownSampleError);
    expect(() => buildSample("weather")).toThrow(
      "Sample 'weather' not found. Available: branch-locator, schema-publish, appointments, transactions, feedback",
    );
  });

  it("applies schema and version overrides", () => {
    const document = buildSample("branch-locator", { version: "1.0" }).toDocument();
    expect(document.version).toBe("1.0");
    expect(childList(document.body[1], "columns")).toHaveLength(2);
  });

  it("fills every appointment slot through the saved level", () => {
    const card = buildSample("appointments");
    const [showCard] = card.toDocument().actions;
    const inner = showCard.card;
    const body = typeof inner === "object" && !Array.isArray(inner) ? childList(inner, "body") : [];

    expect(body.map((node) => node.type)).toEqual(["TextBlock", "ColumnSet", "ColumnSet", "ColumnSet"]);
    expect(card.cursor.kind).toBe("Action.ShowCard");
  });

  it("builds the transaction table row by row", () => {
    const card = buildSample("transactions");
    const rows = card.toDocument().body;

    expect(rows).toHaveLength(4);
    expect(rows.map((row) => childList(row, "columns").length)).toEqual([4, 4, 4, 4]);
    expect(childList(childList(rows[1], "columns")[2], "items")[0]).toEqual({
      type: "TextBlock",
      text: "Corner Grocer",
      horizontalAlignment: "center",
    });
    expect(card.cursor).toBe(card.root);
  });

  it("keeps marked text out of the translation batch", () => {
    const texts = collectTranslatableText(buildSample("feedback").root).map((slot) => slot.text);
    expect(texts).toEqual([
      "How was your visit?",
      "Thanks for stopping by. Tell us what went well.",
      "More",
      "Leave feedback",
      "What could we do better?",
      "Send",
    ]);
  });
});

import { CardBuilder, ascend, resetToTop } from "./builder.js";
import {
  actionOpenUrl,
  actionSet,
  actionShowCard,
  actionSubmit,
  actionToggleVisibility,
  column,
  columnSet,
  container,
  fact,
  factSet,
  image,
  inputText,
  targetElement,
  textBlock,
} from "./elements.js";
import { UnknownSampleError } from "./errors.js";
import { SerializeOverrides } from "./types.js";

export interface SampleCard {
  name: string;
  description: string;
  build(overrides?: SerializeOverrides): CardBuilder;
}

function newCard(overrides: SerializeOverrides = {}): CardBuilder {
  return new CardBuilder({ schema: overrides.schema, version: overrides.version });
}

// ─── Sample Builders ────────────────────────────────────────

function branchLocator(overrides?: SerializeOverrides): CardBuilder {
  const card = newCard(overrides);

  card.add(textBlock("0.45 miles away", { separator: true, spacing: "large" }));
  card.add(columnSet());
  card.add(column({ width: 2 }));
  card.add(textBlock("NORTHSIDE BRANCH"));
  card.add(textBlock("Harbour Street", { size: "ExtraLarge", weight: "Bolder", spacing: "None" }));
  card.add(textBlock("4.2 stars", { isSubtle: true, spacing: "None" }));
  card.add(textBlock("Friendly staff and short queues on weekday mornings.", { size: "Small", wrap: true }));
  card.upOneLevel();
  card.add(column({ width: 1 }));
  card.add(image("https://example.com/images/branch.png", { altText: "Branch front" }));

  return card;
}

function schemaPublish(overrides?: SerializeOverrides): CardBuilder {
  const card = newCard(overrides);

  card.add(textBlock("Publish the card schema", { weight: "Bolder", size: "Medium" }));
  card.add(columnSet());
  card.add(column({ width: "auto" }));
  card.add(image("https://example.com/images/avatar.png", { size: "Small", style: "Person" }));
  card.upOneLevel();
  card.add(column({ width: "stretch" }));
  card.add(textBlock("Sam Taylor", { weight: "Bolder", wrap: true }));
  card.add(textBlock("Created {{DATE(2024-02-14T06:08:39Z, SHORT)}}", { isSubtle: true, wrap: true }));
  card.backToTop();

  card.add(container());
  card.add(textBlock("The format is settled; the schema goes out next and becomes the base of the reference docs.", { wrap: true }));
  card.add(factSet());
  card.add(fact("Board", "Card format"));
  card.add(fact("List", "Backlog"));
  card.add(fact("Assigned to", "Sam Taylor"));
  card.add(fact("Due date", "Not set"));
  card.upOneLevel();

  card.add(actionSet());
  card.add(actionShowCard({ title: "Comment" }));
  card.add(inputText("comment", { isMultiline: true, placeholder: "Enter your comment" }));
  card.add(actionSubmit({ title: "OK" }));
  card.upOneLevel();
  card.add(actionOpenUrl("https://example.com/board", { title: "View" }));

  return card;
}

function appointments(overrides?: SerializeOverrides): CardBuilder {
  const slots: Array<[string, string]> = [
    ["09:00", "09:30"],
    ["11:00", "11:45"],
    ["14:15", "15:00"],
  ];
  const card = newCard(overrides);

  card.add(textBlock("Appointments", { weight: "Bolder", size: "Large" }));
  card.add(actionShowCard({ title: "Show all" }));
  card.add(textBlock("ALL APPOINTMENTS"));

  const list = card.saveLevel();
  for (const [start, end] of slots) {
    card.add(columnSet());
    card.add(column());
    card.add(textBlock("Appointment"));
    card.upOneLevel();
    card.add(column());
    card.add(textBlock(start));
    card.upOneLevel();
    card.add(column());
    card.add(textBlock(end));
    card.upOneLevel();
    card.add(column());
    card.add(actionSet());
    card.add(actionSubmit({ title: "Book this!" }));
    card.loadLevel(list);
  }

  return card;
}

function transactions(overrides?: SerializeOverrides): CardBuilder {
  const headers = ["ID", "Amount", "Receiver", "Date"];
  const rows = [
    ["TRN-0001", "$40.50", "Corner Grocer", "2024-05-29"],
    ["TRN-0002", "$15.35", "City Transit", "2024-06-01"],
    ["TRN-0003", "$6.50", "Juice Bar", "2024-06-03"],
  ];
  const card = newCard(overrides);

  card.addBatch([
    columnSet(),
    ...headers.flatMap((header) => [
      column(),
      textBlock(header, { horizontalAlignment: "center", weight: "Bolder" }),
      ascend,
    ]),
    resetToTop,
  ]);

  for (const row of rows) {
    card.addBatch([
      columnSet({ separator: true }),
      ...row.flatMap((cell) => [column(), textBlock(cell, { horizontalAlignment: "center" }), ascend]),
      resetToTop,
    ]);
  }

  return card;
}

function feedback(overrides?: SerializeOverrides): CardBuilder {
  const card = newCard(overrides);

  card.add(textBlock("How was your visit?", { weight: "Bolder" }));
  card.add(textBlock("Cardsmith Cafe", { isSubtle: true, dontTranslate: true }));
  card.add(textBlock("Thanks for stopping by. Tell us what went well.", { id: "details", isVisible: false, wrap: true }));

  card.add(actionToggleVisibility({ title: "More" }));
  card.add(targetElement("details"));
  card.backToTop();

  card.add(actionShowCard({ title: "Leave feedback" }));
  card.add(inputText("feedback", { placeholder: "What could we do better?", isMultiline: true }));
  card.add(actionSubmit({ title: "Send" }));

  return card;
}

// ─── Registry ───────────────────────────────────────────────

export const SAMPLES: SampleCard[] = [
  { name: "branch-locator", description: "Two-column branch summary with an image", build: branchLocator },
  { name: "schema-publish", description: "Task card with facts, a comment form and links", build: schemaPublish },
  { name: "appointments", description: "Show-card listing booking slots, built with checkpoints", build: appointments },
  { name: "transactions", description: "Table of payments built with batch directives", build: transactions },
  { name: "feedback", description: "Feedback form with toggled details and top-level actions", build: feedback },
];

export function listSamples(): Array<Pick<SampleCard, "name" | "description">> {
  return SAMPLES.map(({ name, description }) => ({ name, description }));
}

export function buildSample(name: string, overrides?: SerializeOverrides): CardBuilder {
  const sample = SAMPLES.find((entry) => entry.name === name.trim().toLowerCase());
  if (!sample) {
    throw new UnknownSampleError(name, SAMPLES.map((entry) => entry.name));
  }
  return sample.build(overrides);
}

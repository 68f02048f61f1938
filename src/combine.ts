import { CardBuilder } from "./builder.js";
import { actionSet } from "./elements.js";
import { CardError } from "./errors.js";
import { CardNode } from "./node.js";

function copyBody(card: CardBuilder): CardNode[] {
  const body = (card.root.items ?? []).map((node) => node.clone());
  const actions = card.root.actions ?? [];

  // Top-level actions would otherwise all end up after every card's body
  if (actions.length > 0) {
    const set = actionSet();
    actions.forEach((action) => set.appendChild("actions", action.clone()));
    body.push(set);
  }

  return body;
}

/**
 * Joins cards into a new one, body after body. Each card's top-level
 * actions are moved into an ActionSet at the end of its own body.
 * The first card's root attributes (schema, version, ...) carry over.
 * The inputs are left untouched.
 */
export function combineCards(cards: readonly CardBuilder[]): CardBuilder {
  if (cards.length === 0) {
    throw new CardError("combineCards needs at least one card.");
  }

  const [first] = cards;
  const combined = new CardBuilder();
  for (const [name, value] of first.root.attributes) {
    combined.root.setAttribute(name, value instanceof CardNode ? value.clone() : value);
  }

  if (cards.length === 1) {
    (first.root.items ?? []).forEach((node) => combined.add(node.clone(), { descend: false }));
    (first.root.actions ?? []).forEach((node) => combined.add(node.clone(), { action: true, descend: false }));
    return combined;
  }

  for (const card of cards) {
    for (const node of copyBody(card)) {
      combined.add(node, { descend: false });
    }
  }

  return combined;
}

import { isActionKind } from "./catalog.js";
import { ContainerMismatchError } from "./errors.js";
import { CardNode } from "./node.js";
import { ContainerRole } from "./types.js";

/**
 * Picks the container of `target` that receives `candidate`.
 * Action kinds always go to the action container, whether or not the caller asked for it.
 */
export function routeChild(target: CardNode, candidate: CardNode, wantsActionContainer = false): ContainerRole {
  const role: ContainerRole = wantsActionContainer || isActionKind(candidate.kind) ? "actions" : "items";

  if (!target.container(role)) {
    throw new ContainerMismatchError(target.kind, role);
  }

  return role;
}

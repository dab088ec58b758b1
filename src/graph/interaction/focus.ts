import { sameNode, type NodeId } from "../store/graphStore";
import type { Cell } from "../store/cell";

export type FocusState = NodeId | null;

export function isFocused(focus: FocusState, id: NodeId): boolean {
  return focus !== null && sameNode(focus, id);
}

/** Clicking the focused node unfocuses it; clicking any other node focuses that one. */
export function toggleFocus(focus: Cell<FocusState>, id: NodeId): void {
  focus.write((current, replace) => {
    replace(isFocused(current, id) ? null : id);
  });
}

export function clearFocusIf(focus: Cell<FocusState>, id: NodeId): void {
  if (isFocused(focus.read(), id)) focus.set(null);
}

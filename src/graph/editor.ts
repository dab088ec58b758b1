import { Cell } from "./store/cell";
import { GraphStore } from "./store/graphStore";
import { IDLE, type DragState } from "./interaction/dragState";
import type { FocusState } from "./interaction/focus";

/** Everything the pointer handlers read and write, passed to them explicitly. */
export interface EditorHandle {
  graph: Cell<GraphStore>;
  drag: Cell<DragState>;
  focus: Cell<FocusState>;
}

export function createEditor(graph: GraphStore = new GraphStore()): EditorHandle {
  return {
    graph: new Cell(graph, "graph"),
    drag: new Cell<DragState>(IDLE, "drag"),
    focus: new Cell<FocusState>(null, "focus"),
  };
}

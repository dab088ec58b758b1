import type { Point, PortRef } from "../geometry";
import type { EditorHandle } from "../editor";
import { nodeKey, type GraphEdge, type NodeId } from "../store/graphStore";
import {
  beginBodyDrag,
  beginConnectionDrag,
  clearDragging,
  draggedNodeOrigin,
  resolveDropOnNode,
  resolveDropOnPort,
  withCursor,
  type ConnectionCommit,
} from "./dragState";
import { toggleFocus } from "./focus";

/** One pointer event, in canvas space. */
export interface PointerSample {
  page: Point;
  /** Pointer relative to the top-left of the element that received the event. */
  element: Point;
  /** Bitmask of held buttons; 0 when none. */
  buttons: number;
}

// Surface-level handlers

/** Recovers from a release that happened outside the surface. */
export function handleSurfaceEnter(editor: EditorHandle, sample: PointerSample): void {
  if (sample.buttons === 0) clearDragging(editor.drag);
}

export function handleSurfaceMove(editor: EditorHandle, sample: PointerSample): void {
  const state = editor.drag.read();
  switch (state.kind) {
    case "idle":
      return;
    case "draggingNode": {
      const origin = draggedNodeOrigin(state, sample.page);
      if (!origin || !editor.graph.read().hasNode(state.nodeId)) return;
      editor.graph.write((graph) => {
        const node = graph.getNode(state.nodeId);
        if (node) node.position = origin;
      });
      return;
    }
    case "draggingConnection":
      editor.drag.set(withCursor(state, sample.page));
      return;
  }
}

export function handleSurfaceUp(editor: EditorHandle): void {
  clearDragging(editor.drag);
}

// Node body handlers

/** A press always starts a fresh gesture; any gesture left over from a lost release is dropped. */
export function handleNodeDown(editor: EditorHandle, nodeId: NodeId, sample: PointerSample): void {
  const node = editor.graph.read().getNode(nodeId);
  if (!node) return;
  editor.drag.set(beginBodyDrag(node, sample.page, sample.element));
}

/**
 * Release over a node body. Finishes a connection drag against the nearest
 * opposite port; any other gesture counts as a click and toggles focus.
 */
export function handleNodeUp(
  editor: EditorHandle,
  nodeId: NodeId,
  sample: PointerSample,
): GraphEdge | null {
  const state = editor.drag.read();
  const node = editor.graph.read().getNode(nodeId);
  let added: GraphEdge | null = null;
  if (state.kind === "draggingConnection") {
    if (node) added = commit(editor, resolveDropOnNode(state, node, sample.page));
  } else if (node) {
    toggleFocus(editor.focus, nodeId);
  }
  clearDragging(editor.drag);
  return added;
}

// Port marker handlers

export function handlePortDown(
  editor: EditorHandle,
  nodeId: NodeId,
  port: PortRef,
  sample: PointerSample,
): void {
  const node = editor.graph.read().getNode(nodeId);
  if (!node) return;
  const count = port.direction === "input" ? node.inputs.length : node.outputs.length;
  if (port.index < 0 || port.index >= count) {
    throw new Error(`[drag] ${port.direction} port ${port.index} does not exist on node ${nodeKey(nodeId)}`);
  }
  editor.drag.set(beginConnectionDrag(node, port, sample.page));
}

export function handlePortUp(editor: EditorHandle, nodeId: NodeId, port: PortRef): GraphEdge | null {
  const state = editor.drag.read();
  const node = editor.graph.read().getNode(nodeId);
  const added = node ? commit(editor, resolveDropOnPort(state, node, port)) : null;
  clearDragging(editor.drag);
  return added;
}

/**
 * Adds the edge unless an endpoint was removed, or lost the captured port,
 * while the gesture was in flight.
 */
function commit(editor: EditorHandle, connection: ConnectionCommit | null): GraphEdge | null {
  if (!connection) return null;
  const graph = editor.graph.read();
  const source = graph.getNode(connection.from);
  const target = graph.getNode(connection.to);
  if (!source || !target) return null;
  if (connection.outputIndex >= source.outputs.length || connection.inputIndex >= target.inputs.length) {
    return null;
  }
  return editor.graph.write((g) =>
    g.addEdge(connection.from, connection.outputIndex, connection.to, connection.inputIndex),
  );
}

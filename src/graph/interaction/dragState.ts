import {
  oppositeDirection,
  subtractPoints,
  type Point,
  type PortRef,
} from "../geometry";
import type { GraphNode } from "../node";
import { nodeKey, type NodeId } from "../store/graphStore";
import type { Cell } from "../store/cell";
import { snappedPort } from "./hitTest";

export type DragState =
  | { kind: "idle" }
  | { kind: "draggingNode"; nodeId: NodeId; grabOffset: Point }
  | { kind: "draggingConnection"; fromNode: NodeId; fromPort: PortRef; cursor: Point };

export const IDLE: DragState = { kind: "idle" };

/** Edge to commit, already oriented output → input. */
export interface ConnectionCommit {
  from: NodeId;
  outputIndex: number;
  to: NodeId;
  inputIndex: number;
}

export function beginConnectionDrag(node: GraphNode, port: PortRef, pointer: Point): DragState {
  return { kind: "draggingConnection", fromNode: node.id, fromPort: port, cursor: pointer };
}

/**
 * Press on a node body: a port within snap distance starts a connection,
 * anything else grabs the node. `elementOffset` is the pointer relative to
 * the node's top-left corner.
 */
export function beginBodyDrag(node: GraphNode, pointer: Point, elementOffset: Point): DragState {
  const port = snappedPort(node, pointer);
  if (port) return beginConnectionDrag(node, port, pointer);
  return { kind: "draggingNode", nodeId: node.id, grabOffset: elementOffset };
}

/** Where a grabbed node's origin goes for a pointer at `pointer`. */
export function draggedNodeOrigin(state: DragState, pointer: Point): Point | null {
  if (state.kind !== "draggingNode") return null;
  return subtractPoints(pointer, state.grabOffset);
}

export function withCursor(state: DragState, pointer: Point): DragState {
  if (state.kind !== "draggingConnection") return state;
  return { ...state, cursor: pointer };
}

function orient(
  fromNode: NodeId,
  fromPort: PortRef,
  other: NodeId,
  otherIndex: number,
): ConnectionCommit {
  return fromPort.direction === "output"
    ? { from: fromNode, outputIndex: fromPort.index, to: other, inputIndex: otherIndex }
    : { from: other, outputIndex: otherIndex, to: fromNode, inputIndex: fromPort.index };
}

/** Release over a node body: snap to the nearest opposite-direction port, if close enough. */
export function resolveDropOnNode(
  state: DragState,
  target: GraphNode,
  pointer: Point,
): ConnectionCommit | null {
  if (state.kind !== "draggingConnection") return null;
  const port = snappedPort(target, pointer, [oppositeDirection(state.fromPort.direction)]);
  if (!port) return null;
  return orient(state.fromNode, state.fromPort, target.id, port.index);
}

/** Release directly on a port marker; same-direction markers are ignored. */
export function resolveDropOnPort(
  state: DragState,
  target: GraphNode,
  port: PortRef,
): ConnectionCommit | null {
  if (state.kind !== "draggingConnection") return null;
  if (port.direction === state.fromPort.direction) return null;
  return orient(state.fromNode, state.fromPort, target.id, port.index);
}

/** Always lands in idle; safe from any state. */
export function clearDragging(drag: Cell<DragState>): void {
  if (drag.read().kind === "idle") return;
  drag.set(IDLE);
}

export function describeDragState(state: DragState): string {
  switch (state.kind) {
    case "idle":
      return "idle";
    case "draggingNode":
      return `node ${nodeKey(state.nodeId)}`;
    case "draggingConnection":
      return `connection ${nodeKey(state.fromNode)}.${state.fromPort.direction}[${state.fromPort.index}]`;
  }
}

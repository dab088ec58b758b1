import {
  boxRect,
  inputPortPosition,
  outputPortPosition,
  portPosition,
  type Point,
  type Rect,
} from "./geometry";
import type { GraphNode } from "./node";
import type { GraphStore, GraphEdge } from "./store/graphStore";
import type { DragState } from "./interaction/dragState";

export interface SceneNode {
  node: GraphNode;
  worldRect: Rect;
  inputAnchors: Point[];
  outputAnchors: Point[];
}

/** Drawn from the source's output port to the target's input port. */
export interface SceneEdge {
  edge: GraphEdge;
  start: Point;
  end: Point;
}

export interface SceneGeometry {
  nodes: SceneNode[];
  edges: SceneEdge[];
  /** In-progress connection, from the captured port to the cursor. */
  preview: { start: Point; end: Point } | null;
}

function sceneNode(node: GraphNode): SceneNode {
  return {
    node,
    worldRect: boxRect(node),
    inputAnchors: node.inputs.map((_, i) => inputPortPosition(node, i)),
    outputAnchors: node.outputs.map((_, i) => outputPortPosition(node, i)),
  };
}

/** Recomputed from live node state on every call; nothing here is cached. */
export function buildSceneGeometry(graph: GraphStore, drag: DragState): SceneGeometry {
  const nodes = Array.from(graph.nodes(), sceneNode);

  const edges: SceneEdge[] = [];
  for (const edge of graph.edges()) {
    const ends = graph.nodesOf(edge);
    if (!ends) continue;
    edges.push({
      edge,
      start: outputPortPosition(ends.source, edge.outputIndex),
      end: inputPortPosition(ends.target, edge.inputIndex),
    });
  }

  let preview: SceneGeometry["preview"] = null;
  if (drag.kind === "draggingConnection") {
    const from = graph.getNode(drag.fromNode);
    if (from) preview = { start: portPosition(from, drag.fromPort), end: drag.cursor };
  }

  return { nodes, edges, preview };
}

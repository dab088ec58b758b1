import type React from "react";
import type { EditorHandle } from "../editor";
import { subtractPoints, type Point, type PortDirection } from "../geometry";
import {
  handleNodeDown,
  handleNodeUp,
  handlePortDown,
  handlePortUp,
  type PointerSample,
} from "../interaction/router";
import { isFocused, type FocusState } from "../interaction/focus";
import type { SceneNode } from "../sceneGeometry";
import { nodeKey, type NodeId } from "../store/graphStore";
import { GraphNode } from "../../components/graph/GraphNode";
import type { ToCanvasPoint } from "../canvas/GraphCanvas";
import "./NodeLayer.css";

/** Radius of a port marker; markers sit just inside the node edge. */
export const PORT_MARKER_RADIUS = 5;

export interface NodeLayerProps {
  editor: EditorHandle;
  nodes: SceneNode[];
  focused: FocusState;
  toCanvasPoint: ToCanvasPoint;
}

function PortMarker({
  editor,
  nodeId,
  direction,
  index,
  anchor,
  toCanvasPoint,
}: {
  editor: EditorHandle;
  nodeId: NodeId;
  direction: PortDirection;
  index: number;
  anchor: Point;
  toCanvasPoint: ToCanvasPoint;
}) {
  const cx = direction === "input" ? anchor.x + PORT_MARKER_RADIUS : anchor.x - PORT_MARKER_RADIUS;
  const port = { direction, index };
  return (
    <circle
      className={`node-layer__port node-layer__port--${direction}`}
      data-testid={`port-${nodeKey(nodeId)}-${direction}-${index}`}
      cx={cx}
      cy={anchor.y}
      r={PORT_MARKER_RADIUS}
      onMouseDown={(e) => {
        const page = toCanvasPoint(e.clientX, e.clientY);
        handlePortDown(editor, nodeId, port, { page, element: page, buttons: e.buttons });
      }}
      onMouseUp={() => {
        handlePortUp(editor, nodeId, port);
      }}
    />
  );
}

export function NodeLayer({ editor, nodes, focused, toCanvasPoint }: NodeLayerProps) {
  if (nodes.length === 0) return null;

  const sampleFor = (e: React.MouseEvent, origin: Point): PointerSample => {
    const page = toCanvasPoint(e.clientX, e.clientY);
    return { page, element: subtractPoints(page, origin), buttons: e.buttons };
  };

  return (
    <>
      {nodes.map(({ node, worldRect, inputAnchors, outputAnchors }) => {
        const key = nodeKey(node.id);
        const { x, y, width, height } = worldRect;
        // a running node is only a placeholder: no markers, no gestures
        if (node.status.running) {
          return (
            <g key={key} className="node-layer__node">
              <foreignObject x={x} y={y} width={width} height={height} data-testid={`node-${key}`}>
                <GraphNode node={node} focused={isFocused(focused, node.id)} />
              </foreignObject>
            </g>
          );
        }
        return (
          <g key={key} className="node-layer__node">
            {inputAnchors.map((anchor, i) => (
              <PortMarker
                key={`in-${i}`}
                editor={editor}
                nodeId={node.id}
                direction="input"
                index={i}
                anchor={anchor}
                toCanvasPoint={toCanvasPoint}
              />
            ))}
            <foreignObject
              x={x}
              y={y}
              width={width}
              height={height}
              data-testid={`node-${key}`}
              onMouseDown={(e) => handleNodeDown(editor, node.id, sampleFor(e, node.position))}
              onMouseUp={(e) => {
                handleNodeUp(editor, node.id, sampleFor(e, node.position));
              }}
            >
              <GraphNode node={node} focused={isFocused(focused, node.id)} />
            </foreignObject>
            {outputAnchors.map((anchor, i) => (
              <PortMarker
                key={`out-${i}`}
                editor={editor}
                nodeId={node.id}
                direction="output"
                index={i}
                anchor={anchor}
                toCanvasPoint={toCanvasPoint}
              />
            ))}
          </g>
        );
      })}
    </>
  );
}

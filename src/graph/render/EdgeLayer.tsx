import type { Point } from "../geometry";
import type { SceneEdge } from "../sceneGeometry";
import { nodeKey } from "../store/graphStore";
import "./EdgeLayer.css";

/** Horizontal-tangent cubic from an output anchor to an input anchor. */
export function connectionPath(start: Point, end: Point): string {
  const bend = Math.max(40, Math.abs(end.x - start.x) / 2);
  return `M ${start.x} ${start.y} C ${start.x + bend} ${start.y}, ${end.x - bend} ${end.y}, ${end.x} ${end.y}`;
}

interface EdgeLayerProps {
  edges: SceneEdge[];
  preview: { start: Point; end: Point } | null;
}

export function EdgeLayer({ edges, preview }: EdgeLayerProps) {
  return (
    <g className="edge-layer">
      {edges.map(({ edge, start, end }, i) => (
        <path
          // Parallel edges share endpoints, so position disambiguates.
          key={`${nodeKey(edge.from)}:${edge.outputIndex}->${nodeKey(edge.to)}:${edge.inputIndex}#${i}`}
          className="edge-layer__edge"
          data-testid="graph-edge"
          d={connectionPath(start, end)}
        />
      ))}
      {preview && (
        <line
          className="edge-layer__preview"
          data-testid="graph-edge-preview"
          x1={preview.start.x}
          y1={preview.start.y}
          x2={preview.end.x}
          y2={preview.end.y}
        />
      )}
    </g>
  );
}

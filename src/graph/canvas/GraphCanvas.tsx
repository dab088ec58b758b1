import React, { useCallback, useRef } from "react";
import type { EditorHandle } from "../editor";
import type { Point } from "../geometry";
import {
  handleSurfaceEnter,
  handleSurfaceMove,
  handleSurfaceUp,
  type PointerSample,
} from "../interaction/router";
import { buildSceneGeometry } from "../sceneGeometry";
import { useCell } from "../useCell";
import { EdgeLayer } from "../render/EdgeLayer";
import { NodeLayer } from "../render/NodeLayer";
import "./GraphCanvas.css";

interface GraphCanvasProps {
  editor: EditorHandle;
  className?: string;
}

export type ToCanvasPoint = (clientX: number, clientY: number) => Point;

export function GraphCanvas({ editor, className }: GraphCanvasProps) {
  const svgRef = useRef<SVGSVGElement>(null);
  const graph = useCell(editor.graph);
  const drag = useCell(editor.drag);
  const focus = useCell(editor.focus);

  const toCanvasPoint = useCallback<ToCanvasPoint>((clientX, clientY) => {
    const svg = svgRef.current;
    if (!svg) return { x: clientX, y: clientY };
    const rect = svg.getBoundingClientRect();
    return { x: clientX - rect.left, y: clientY - rect.top };
  }, []);

  const surfaceSample = useCallback(
    (e: React.MouseEvent<SVGSVGElement>): PointerSample => {
      const page = toCanvasPoint(e.clientX, e.clientY);
      return { page, element: page, buttons: e.buttons };
    },
    [toCanvasPoint],
  );

  const handleMouseEnter = useCallback(
    (e: React.MouseEvent<SVGSVGElement>) => handleSurfaceEnter(editor, surfaceSample(e)),
    [editor, surfaceSample],
  );

  const handleMouseMove = useCallback(
    (e: React.MouseEvent<SVGSVGElement>) => handleSurfaceMove(editor, surfaceSample(e)),
    [editor, surfaceSample],
  );

  const handleMouseUp = useCallback(() => handleSurfaceUp(editor), [editor]);

  const scene = buildSceneGeometry(graph, drag);

  return (
    <div className={`graph-canvas${className ? ` ${className}` : ""}`}>
      <svg
        ref={svgRef}
        className="graph-canvas__svg"
        data-testid="graph-surface"
        data-drag={drag.kind}
        onMouseEnter={handleMouseEnter}
        onMouseMove={handleMouseMove}
        onMouseUp={handleMouseUp}
      >
        <EdgeLayer edges={scene.edges} preview={scene.preview} />
        <NodeLayer
          editor={editor}
          nodes={scene.nodes}
          focused={focus}
          toCanvasPoint={toCanvasPoint}
        />
      </svg>
    </div>
  );
}

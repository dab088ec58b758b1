import { useEffect, useState } from "react";
import { seedSampleGraph } from "./api/mock";
import { NodeInspector } from "./components/inspector/NodeInspector";
import { editorConfig, type EditorConfig } from "./config";
import { GraphCanvas } from "./graph/canvas/GraphCanvas";
import { createEditor, type EditorHandle } from "./graph/editor";
import { attachDragLogger } from "./graph/interaction/dragLog";
import { GraphStore } from "./graph/store/graphStore";

function initialEditor(config: EditorConfig): EditorHandle {
  const graph = new GraphStore();
  if (config.demoGraph) seedSampleGraph(graph);
  return createEditor(graph);
}

export function App({ config = editorConfig }: { config?: EditorConfig }) {
  const [editor] = useState(() => initialEditor(config));

  useEffect(() => {
    if (!config.debugDrag) return;
    return attachDragLogger(editor);
  }, [editor, config.debugDrag]);

  return (
    <div className="app">
      <GraphCanvas editor={editor} className="app__canvas" />
      <NodeInspector editor={editor} />
    </div>
  );
}

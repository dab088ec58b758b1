import { Trash } from "@phosphor-icons/react";
import { Button } from "react-aria-components";
import type { EditorHandle } from "../../graph/editor";
import { clearFocusIf } from "../../graph/interaction/focus";
import { nodeHelpText, nodeName, type NodeStatus } from "../../graph/node";
import type { NodeId } from "../../graph/store/graphStore";
import { useCell } from "../../graph/useCell";
import { Panel } from "../../ui/layout/Panel";
import { KeyValueRow } from "../../ui/primitives/KeyValueRow";

export function statusLabel(status: NodeStatus): string {
  if (status.error !== undefined) return "error";
  if (status.running) return "running";
  if (status.queued) return "queued";
  return "idle";
}

export function removeNode(editor: EditorHandle, id: NodeId): void {
  editor.graph.write((graph) => {
    graph.removeNode(id);
  });
  clearFocusIf(editor.focus, id);
}

export function NodeInspector({ editor }: { editor: EditorHandle }) {
  const focus = useCell(editor.focus);
  const graph = useCell(editor.graph);
  const node = focus ? graph.getNode(focus) : undefined;

  if (!node) {
    return (
      <Panel variant="inspector" aria-label="Node details">
        <p className="inspector-empty">Click a node to see its details.</p>
      </Panel>
    );
  }

  return (
    <Panel variant="inspector" aria-label="Node details">
      <h2 className="inspector-title">{nodeName(node)}</h2>
      <p className="inspector-help">{nodeHelpText(node)}</p>
      <KeyValueRow label="Inputs">{node.inputs.map((p) => p.name).join(", ") || "none"}</KeyValueRow>
      <KeyValueRow label="Outputs">{node.outputs.map((p) => p.name).join(", ") || "none"}</KeyValueRow>
      <KeyValueRow label="Status">{statusLabel(node.status)}</KeyValueRow>
      {node.status.error !== undefined && (
        <KeyValueRow label="Error" className="inspector-error">
          {node.status.error}
        </KeyValueRow>
      )}
      <Button className="ui-action-button ui-action-button--danger" onPress={() => removeNode(editor, node.id)}>
        <Trash size={12} weight="bold" /> Remove node
      </Button>
    </Panel>
  );
}

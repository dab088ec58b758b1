import { HourglassMedium, WarningCircle } from "@phosphor-icons/react";
import { nodeName, type GraphNode as GraphNodeModel } from "../../graph/node";
import "./GraphNode.css";

export function GraphNode({ node, focused }: { node: GraphNodeModel; focused: boolean }) {
  const { running, queued, error } = node.status;

  if (running) {
    return <div className="graph-card graph-card--loading">Loading...</div>;
  }

  return (
    <div
      className={["graph-card", focused && "graph-card--focused", error !== undefined && "graph-card--error"]
        .filter(Boolean)
        .join(" ")}
    >
      <div className="graph-node-header">
        <span className="graph-node-label">{nodeName(node)}</span>
        {queued && (
          <span className="graph-node-queued" title="Queued">
            <HourglassMedium size={12} weight="bold" />
          </span>
        )}
      </div>
      {error !== undefined && (
        <p className="graph-node-error" role="alert">
          <WarningCircle size={12} weight="fill" />
          <span>{error}</span>
        </p>
      )}
    </div>
  );
}

import type { Point } from "./geometry";
import type { ComputeInstance, GraphNode, PortDef } from "./node";
import type { GraphStore, NodeId } from "./store/graphStore";

/** Saved form of a node. Status flags are not part of it. */
export interface NodeRecord {
  id: NodeId;
  position: Point;
  inputs: PortDef[];
  outputs: PortDef[];
  width: number;
  height: number;
  instance: unknown;
}

export function toNodeRecord(node: GraphNode): NodeRecord {
  return {
    id: { index: node.id.index, generation: node.id.generation },
    position: { x: node.position.x, y: node.position.y },
    inputs: node.inputs.map((p) => ({ ...p })),
    outputs: node.outputs.map((p) => ({ ...p })),
    width: node.width,
    height: node.height,
    instance: node.instance.toJSON(),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function requireFinite(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`[node-record] missing or invalid ${label}`);
  }
  return value;
}

function requirePositive(value: unknown, label: string): number {
  const n = requireFinite(value, label);
  if (n <= 0) {
    throw new Error(`[node-record] ${label} must be positive`);
  }
  return n;
}

function requireNonNegativeInteger(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new Error(`[node-record] missing or invalid ${label}`);
  }
  return value;
}

function parsePorts(value: unknown, label: string): PortDef[] {
  if (!Array.isArray(value)) {
    throw new Error(`[node-record] ${label} must be an array`);
  }
  return value.map((port, idx) => {
    if (!isRecord(port) || typeof port.name !== "string") {
      throw new Error(`[node-record] ${label}[${idx}] must be an object with a name`);
    }
    return port.data === undefined ? { name: port.name } : { name: port.name, data: port.data };
  });
}

export function parseNodeRecord(payload: unknown): NodeRecord {
  if (!isRecord(payload)) {
    throw new Error("[node-record] record must be an object");
  }
  if (!isRecord(payload.id)) {
    throw new Error("[node-record] id must be an object");
  }
  if (!isRecord(payload.position)) {
    throw new Error("[node-record] position must be an object");
  }
  if (!("instance" in payload)) {
    throw new Error("[node-record] missing instance");
  }
  return {
    id: {
      index: requireNonNegativeInteger(payload.id.index, "id.index"),
      generation: requireNonNegativeInteger(payload.id.generation, "id.generation"),
    },
    position: {
      x: requireFinite(payload.position.x, "position.x"),
      y: requireFinite(payload.position.y, "position.y"),
    },
    inputs: parsePorts(payload.inputs, "inputs"),
    outputs: parsePorts(payload.outputs, "outputs"),
    width: requirePositive(payload.width, "width"),
    height: requirePositive(payload.height, "height"),
    instance: payload.instance,
  };
}

/**
 * Puts a saved node back into the graph and returns its live id, which keeps
 * the saved index. The node comes back not running, not queued and without
 * an error.
 */
export function restoreNodeRecord(
  graph: GraphStore,
  record: NodeRecord,
  loadInstance: (payload: unknown) => ComputeInstance,
): NodeId {
  return graph.restoreNode(record.id, {
    instance: loadInstance(record.instance),
    position: { ...record.position },
    inputs: record.inputs,
    outputs: record.outputs,
    width: record.width,
    height: record.height,
  });
}

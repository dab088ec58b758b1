import type { Point } from "./geometry";
import type { NodeId } from "./store/graphStore";

/** Description of one port as supplied by the compute backend. */
export interface PortDef {
  name: string;
  /** Backend-specific payload; the editor never inspects it. */
  data?: unknown;
}

export interface ComputeMetadata {
  name: string;
  description: string;
}

/** The compute unit behind a node. Owned by the plugin backend. */
export interface ComputeInstance {
  metadata(): ComputeMetadata;
  /** Serializable form of the instance, stored in the node record. */
  toJSON(): unknown;
}

export interface NodeStatus {
  running: boolean;
  queued: boolean;
  error?: string;
}

export const IDLE_STATUS: Readonly<NodeStatus> = { running: false, queued: false };

export interface NodeInit {
  instance: ComputeInstance;
  position: Point;
  inputs: PortDef[];
  outputs: PortDef[];
  width: number;
  height: number;
}

export interface GraphNode extends NodeInit {
  readonly id: NodeId;
  status: NodeStatus;
}

export function nodeHelpText(node: { instance: ComputeInstance }): string {
  return node.instance.metadata().description;
}

export function nodeName(node: { instance: ComputeInstance }): string {
  return node.instance.metadata().name;
}

import type { ComputeInstance, ComputeMetadata, NodeInit, PortDef } from "../graph/node";
import type { GraphStore, NodeId } from "../graph/store/graphStore";

export const SAMPLE_NODE_WIDTH = 160;
export const SAMPLE_NODE_HEIGHT = 72;

interface SampleUnitPayload {
  kind: "sample";
  name: string;
  description: string;
}

/** Stand-in for a plugin instance; carries only its metadata. */
export function createSampleInstance(name: string, description = ""): ComputeInstance {
  const metadata: ComputeMetadata = { name, description };
  return {
    metadata: () => metadata,
    toJSON: (): SampleUnitPayload => ({ kind: "sample", name, description }),
  };
}

export function loadSampleInstance(payload: unknown): ComputeInstance {
  if (typeof payload !== "object" || payload === null) {
    throw new Error("[mock] sample instance payload must be an object");
  }
  const name: unknown = "name" in payload ? payload.name : undefined;
  const description: unknown = "description" in payload ? payload.description : undefined;
  if (typeof name !== "string") {
    throw new Error("[mock] sample instance payload needs a name");
  }
  return createSampleInstance(name, typeof description === "string" ? description : "");
}

function ports(...names: string[]): PortDef[] {
  return names.map((name) => ({ name }));
}

function sampleNode(
  name: string,
  description: string,
  x: number,
  y: number,
  inputs: PortDef[],
  outputs: PortDef[],
): NodeInit {
  return {
    instance: createSampleInstance(name, description),
    position: { x, y },
    inputs,
    outputs,
    width: SAMPLE_NODE_WIDTH,
    height: SAMPLE_NODE_HEIGHT,
  };
}

/** A small pipeline: text source → split → count, plus an unconnected join. */
export function seedSampleGraph(graph: GraphStore): NodeId[] {
  const source = graph.addNode(
    sampleNode("Text", "Emits a fixed string.", 40, 60, [], ports("text")),
  );
  const split = graph.addNode(
    sampleNode("Split", "Splits text on a separator.", 280, 40, ports("text", "separator"), ports("parts")),
  );
  const count = graph.addNode(
    sampleNode("Count", "Counts list items.", 520, 60, ports("items"), ports("count", "empty")),
  );
  const join = graph.addNode(
    sampleNode("Join", "Joins list items with a separator.", 280, 220, ports("items", "separator"), ports("text")),
  );
  graph.addEdge(source, 0, split, 0);
  graph.addEdge(split, 0, count, 0);

  const failing = graph.getNode(join);
  if (failing) failing.status = { running: false, queued: false, error: "separator is required" };

  return [source, split, count, join];
}

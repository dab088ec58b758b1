import { createSampleInstance } from "../api/mock";
import type { NodeInit, PortDef } from "../graph/node";

function portList(prefix: string, count: number): PortDef[] {
  return Array.from({ length: count }, (_, i) => ({ name: `${prefix}${i}` }));
}

/** 80×40 node with `inputs` input ports and `outputs` output ports. */
export function boxNode(
  x: number,
  y: number,
  inputs: number,
  outputs: number,
  size: { width: number; height: number } = { width: 80, height: 40 },
): NodeInit {
  return {
    instance: createSampleInstance(`node@${x},${y}`, "fixture node"),
    position: { x, y },
    inputs: portList("in", inputs),
    outputs: portList("out", outputs),
    width: size.width,
    height: size.height,
  };
}

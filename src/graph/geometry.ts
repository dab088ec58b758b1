export type Point = { x: number; y: number };
export type Rect = { x: number; y: number; width: number; height: number };

export type PortDirection = "input" | "output";

export interface PortRef {
  direction: PortDirection;
  index: number;
}

/** Anything with a top-left position, a size, and two port lists. */
export interface PortedBox {
  position: Point;
  width: number;
  height: number;
  inputs: readonly unknown[];
  outputs: readonly unknown[];
}

/** Pointer-to-port radius within which a port counts as hit. */
export const SNAP_DISTANCE = 15;
export const SNAP_DISTANCE_SQ = SNAP_DISTANCE * SNAP_DISTANCE;

function spacedY(box: PortedBox, index: number, count: number): number {
  return box.position.y + ((index + 1) * box.height) / (count + 1);
}

export function inputPortPosition(box: PortedBox, index: number): Point {
  return {
    x: box.position.x - 1,
    y: spacedY(box, index, box.inputs.length),
  };
}

export function outputPortPosition(box: PortedBox, index: number): Point {
  return {
    x: box.position.x + box.width - 1,
    y: spacedY(box, index, box.outputs.length),
  };
}

export function portPosition(box: PortedBox, port: PortRef): Point {
  return port.direction === "input"
    ? inputPortPosition(box, port.index)
    : outputPortPosition(box, port.index);
}

export function oppositeDirection(direction: PortDirection): PortDirection {
  return direction === "input" ? "output" : "input";
}

export function squaredDistance(p: Point, q: Point): number {
  const dx = p.x - q.x;
  const dy = p.y - q.y;
  return dx * dx + dy * dy;
}

export function subtractPoints(p: Point, q: Point): Point {
  return { x: p.x - q.x, y: p.y - q.y };
}

export function boxRect(box: PortedBox): Rect {
  return { x: box.position.x, y: box.position.y, width: box.width, height: box.height };
}

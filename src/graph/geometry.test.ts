import { describe, expect, it } from "vitest";
import { boxNode } from "../fixtures/graphFixtures";
import {
  SNAP_DISTANCE_SQ,
  inputPortPosition,
  outputPortPosition,
  portPosition,
  squaredDistance,
} from "./geometry";

describe("port positions", () => {
  it("puts a single output one pixel inside the right edge, vertically centered", () => {
    expect(outputPortPosition(boxNode(100, 100, 0, 1), 0)).toEqual({ x: 179, y: 120 });
  });

  it("puts a single input one pixel outside the left edge", () => {
    expect(inputPortPosition(boxNode(300, 100, 1, 0), 0)).toEqual({ x: 299, y: 120 });
  });

  it("spaces ports evenly and strictly inside the node's height", () => {
    const node = boxNode(0, 10, 3, 0, { width: 50, height: 80 });
    const ys = [0, 1, 2].map((i) => inputPortPosition(node, i).y);
    expect(ys).toEqual([30, 50, 70]);
    for (const y of ys) {
      expect(y).toBeGreaterThan(10);
      expect(y).toBeLessThan(90);
    }
  });

  it("keeps port y strictly increasing in index", () => {
    const node = boxNode(0, 0, 0, 7, { width: 10, height: 33 });
    const ys = node.outputs.map((_, i) => outputPortPosition(node, i).y);
    for (let i = 1; i < ys.length; i++) {
      expect(ys[i]).toBeGreaterThan(ys[i - 1]);
    }
    expect(ys[0]).toBeGreaterThan(0);
    expect(ys[ys.length - 1]).toBeLessThan(33);
  });

  it("reflects the node's current position on every call", () => {
    const node = boxNode(0, 0, 1, 0);
    expect(inputPortPosition(node, 0)).toEqual({ x: -1, y: 20 });
    node.position = { x: 10, y: 5 };
    expect(inputPortPosition(node, 0)).toEqual({ x: 9, y: 25 });
  });

  it("dispatches on direction", () => {
    const node = boxNode(0, 0, 1, 1);
    expect(portPosition(node, { direction: "input", index: 0 })).toEqual({ x: -1, y: 20 });
    expect(portPosition(node, { direction: "output", index: 0 })).toEqual({ x: 79, y: 20 });
  });
});

describe("squaredDistance", () => {
  it("is the squared euclidean distance", () => {
    expect(squaredDistance({ x: 299, y: 120 }, { x: 300, y: 120 })).toBe(1);
    expect(squaredDistance({ x: 299, y: 120 }, { x: 250, y: 120 })).toBe(2401);
    expect(squaredDistance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(25);
  });

  it("snap threshold is 15 squared", () => {
    expect(SNAP_DISTANCE_SQ).toBe(225);
  });
});

import { describe, expect, it } from "vitest";
import { boxNode } from "../../fixtures/graphFixtures";
import { GraphStore, nodeKey, sameNode } from "./graphStore";

describe("GraphStore", () => {
  it("issues distinct ids and starts nodes idle", () => {
    const graph = new GraphStore();
    const a = graph.addNode(boxNode(0, 0, 0, 1));
    const b = graph.addNode(boxNode(100, 0, 1, 0));

    expect(sameNode(a, b)).toBe(false);
    expect(graph.nodeCount).toBe(2);
    expect(graph.getNode(a)?.status).toEqual({ running: false, queued: false });
    expect(graph.getNode(b)?.id).toEqual(b);
  });

  it("allows parallel edges between the same ports", () => {
    const graph = new GraphStore();
    const a = graph.addNode(boxNode(0, 0, 0, 1));
    const b = graph.addNode(boxNode(100, 0, 1, 0));

    graph.addEdge(a, 0, b, 0);
    graph.addEdge(a, 0, b, 0);

    expect(graph.edgeCount).toBe(2);
    expect(graph.neighbors(a, "outgoing")).toEqual([b, b]);
    expect(graph.neighbors(b, "incoming")).toEqual([a, a]);
  });

  it("rejects out-of-range port indices", () => {
    const graph = new GraphStore();
    const a = graph.addNode(boxNode(0, 0, 0, 1));
    const b = graph.addNode(boxNode(100, 0, 1, 0));

    expect(() => graph.addEdge(a, 1, b, 0)).toThrow(
      "[graph] output index 1 out of range for node 0v0 (1 outputs)",
    );
    expect(() => graph.addEdge(a, 0, b, 2)).toThrow(
      "[graph] input index 2 out of range for node 1v0 (1 inputs)",
    );
    expect(graph.edgeCount).toBe(0);
  });

  it("removes every edge touching a removed node", () => {
    const graph = new GraphStore();
    const a = graph.addNode(boxNode(0, 0, 0, 1));
    const b = graph.addNode(boxNode(100, 0, 1, 1));
    const c = graph.addNode(boxNode(200, 0, 1, 0));
    graph.addEdge(a, 0, b, 0);
    graph.addEdge(b, 0, c, 0);
    graph.addEdge(a, 0, c, 0);

    const removed = graph.removeNode(b);

    expect(removed?.id).toEqual(b);
    expect(graph.hasNode(b)).toBe(false);
    expect([...graph.edges()]).toEqual([{ from: a, outputIndex: 0, to: c, inputIndex: 0 }]);
    expect(graph.edgesOf(b)).toEqual([]);
  });

  it("never resolves a stale id after its slot is reused", () => {
    const graph = new GraphStore();
    const a = graph.addNode(boxNode(0, 0, 0, 0));
    graph.removeNode(a);
    const b = graph.addNode(boxNode(10, 0, 0, 0));

    expect(b.index).toBe(a.index);
    expect(nodeKey(b)).toBe("0v1");
    expect(graph.getNode(a)).toBeUndefined();
    expect(graph.removeNode(a)).toBeUndefined();
    expect(() => graph.addEdge(a, 0, b, 0)).toThrow("[graph] unknown node 0v0");
  });

  it("lists edges by direction", () => {
    const graph = new GraphStore();
    const a = graph.addNode(boxNode(0, 0, 1, 1));
    const b = graph.addNode(boxNode(100, 0, 1, 1));
    graph.addEdge(a, 0, b, 0);
    graph.addEdge(b, 0, a, 0);

    expect(graph.edgesOf(a, "outgoing")).toEqual([{ from: a, outputIndex: 0, to: b, inputIndex: 0 }]);
    expect(graph.edgesOf(a, "incoming")).toEqual([{ from: b, outputIndex: 0, to: a, inputIndex: 0 }]);
    expect(graph.edgesOf(a)).toHaveLength(2);
  });

  it("resolves an edge's endpoint nodes", () => {
    const graph = new GraphStore();
    const a = graph.addNode(boxNode(0, 0, 0, 1));
    const b = graph.addNode(boxNode(100, 0, 1, 0));
    const edge = graph.addEdge(a, 0, b, 0);

    const ends = graph.nodesOf(edge);
    expect(ends?.source.id).toEqual(a);
    expect(ends?.target.id).toEqual(b);
  });

  it("iterates live nodes only", () => {
    const graph = new GraphStore();
    const a = graph.addNode(boxNode(0, 0, 0, 0));
    const b = graph.addNode(boxNode(1, 0, 0, 0));
    graph.removeNode(a);

    expect([...graph.nodes()].map((n) => n.id)).toEqual([b]);
    expect(graph.nodeCount).toBe(1);
  });

  it("restores a node under its saved id", () => {
    const graph = new GraphStore();
    graph.restoreNode({ index: 2, generation: 3 }, boxNode(0, 0, 0, 1));

    expect(graph.getNode({ index: 2, generation: 3 })?.position).toEqual({ x: 0, y: 0 });
    expect(graph.nodeCount).toBe(1);
    // slots 0 and 1 stay available
    const next = graph.addNode(boxNode(5, 5, 0, 0));
    expect(next.index === 0 || next.index === 1).toBe(true);
    expect(() => graph.restoreNode({ index: 2, generation: 3 }, boxNode(0, 0, 0, 0))).toThrow(
      "[graph] node slot 2 is occupied",
    );
  });

  it("returns the live id when restoring into a slot that was reused", () => {
    const graph = new GraphStore();
    const first = graph.addNode(boxNode(0, 0, 0, 1));
    graph.removeNode(first);

    const restored = graph.restoreNode({ index: 0, generation: 0 }, boxNode(10, 20, 0, 1));

    expect(restored).toEqual({ index: 0, generation: 1 });
    expect(graph.getNode(restored)?.position).toEqual({ x: 10, y: 20 });
    expect(graph.getNode(first)).toBeUndefined();
  });

  it("refuses to restore far past the end of the arena", () => {
    const graph = new GraphStore();
    expect(() => graph.restoreNode({ index: 4_000_000_000, generation: 0 }, boxNode(0, 0, 0, 0))).toThrow(
      "[graph] node index 4000000000 is too far past the end of the arena (0 slots)",
    );
    expect(graph.nodeCount).toBe(0);

    graph.restoreNode({ index: 65_536, generation: 0 }, boxNode(0, 0, 0, 0));
    expect(graph.nodeCount).toBe(1);
  });
});

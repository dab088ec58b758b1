import { IDLE_STATUS, type GraphNode, type NodeInit } from "../node";

/** Index into the node arena plus the slot generation it was issued for. */
export interface NodeId {
  readonly index: number;
  readonly generation: number;
}

/** Directed arc from `from`'s output port to `to`'s input port. */
export interface GraphEdge {
  readonly from: NodeId;
  readonly outputIndex: number;
  readonly to: NodeId;
  readonly inputIndex: number;
}

export type EdgeDirection = "outgoing" | "incoming";

type Slot = { generation: number; node: GraphNode | null };

const MAX_SLOTS = 2 ** 32 - 1;
/** How far past the arena end a restored index may land. */
const MAX_RESTORE_GAP = 1 << 16;

export function sameNode(a: NodeId, b: NodeId): boolean {
  return a.index === b.index && a.generation === b.generation;
}

/** Stable string form, for React keys and map lookups. */
export function nodeKey(id: NodeId): string {
  return `${id.index}v${id.generation}`;
}

export class GraphStore {
  private readonly slots: Slot[] = [];
  private readonly free: number[] = [];
  private edgeList: GraphEdge[] = [];

  get nodeCount(): number {
    return this.slots.length - this.free.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  addNode(init: NodeInit): NodeId {
    let index = this.free.pop();
    if (index === undefined) {
      if (this.slots.length >= MAX_SLOTS) {
        throw new Error("[graph] node index space exhausted");
      }
      index = this.slots.length;
      this.slots.push({ generation: 0, node: null });
    }
    const slot = this.slots[index];
    const id: NodeId = { index, generation: slot.generation };
    slot.node = { ...init, id, status: { ...IDLE_STATUS } };
    return id;
  }

  /**
   * Re-inserts a node under a previously issued id, e.g. when loading a saved
   * graph. Returns the id actually issued: a slot that was used and freed since
   * keeps its newer generation.
   */
  restoreNode(id: NodeId, init: NodeInit): NodeId {
    if (!Number.isInteger(id.index) || id.index < 0 || id.index >= MAX_SLOTS) {
      throw new Error(`[graph] invalid node index ${id.index}`);
    }
    if (id.index - this.slots.length > MAX_RESTORE_GAP) {
      throw new Error(
        `[graph] node index ${id.index} is too far past the end of the arena (${this.slots.length} slots)`,
      );
    }
    while (this.slots.length <= id.index) {
      this.free.push(this.slots.length);
      this.slots.push({ generation: 0, node: null });
    }
    const freeAt = this.free.indexOf(id.index);
    if (freeAt === -1) {
      throw new Error(`[graph] node slot ${id.index} is occupied`);
    }
    this.free.splice(freeAt, 1);
    const slot = this.slots[id.index];
    slot.generation = Math.max(slot.generation, id.generation);
    const issued: NodeId = { index: id.index, generation: slot.generation };
    slot.node = { ...init, id: issued, status: { ...IDLE_STATUS } };
    return issued;
  }

  getNode(id: NodeId): GraphNode | undefined {
    const slot = this.slots[id.index];
    if (!slot || slot.generation !== id.generation) return undefined;
    return slot.node ?? undefined;
  }

  hasNode(id: NodeId): boolean {
    return this.getNode(id) !== undefined;
  }

  /**
   * Adds an arc without checking for duplicates. Ids must be live and the port
   * indices in range for the nodes' current port lists.
   */
  addEdge(from: NodeId, outputIndex: number, to: NodeId, inputIndex: number): GraphEdge {
    const source = this.requireNode(from);
    const target = this.requireNode(to);
    if (!Number.isInteger(outputIndex) || outputIndex < 0 || outputIndex >= source.outputs.length) {
      throw new Error(
        `[graph] output index ${outputIndex} out of range for node ${nodeKey(from)} (${source.outputs.length} outputs)`,
      );
    }
    if (!Number.isInteger(inputIndex) || inputIndex < 0 || inputIndex >= target.inputs.length) {
      throw new Error(
        `[graph] input index ${inputIndex} out of range for node ${nodeKey(to)} (${target.inputs.length} inputs)`,
      );
    }
    const edge: GraphEdge = { from: source.id, outputIndex, to: target.id, inputIndex };
    this.edgeList.push(edge);
    return edge;
  }

  /** Removes the node and every edge touching it. Stale ids return undefined. */
  removeNode(id: NodeId): GraphNode | undefined {
    const node = this.getNode(id);
    if (!node) return undefined;
    const slot = this.slots[id.index];
    slot.node = null;
    slot.generation += 1;
    this.free.push(id.index);
    this.edgeList = this.edgeList.filter((e) => !sameNode(e.from, id) && !sameNode(e.to, id));
    return node;
  }

  /** Edges touching `id`; both directions unless one is given. */
  edgesOf(id: NodeId, direction?: EdgeDirection): GraphEdge[] {
    return this.edgeList.filter((e) => {
      if (direction === "outgoing") return sameNode(e.from, id);
      if (direction === "incoming") return sameNode(e.to, id);
      return sameNode(e.from, id) || sameNode(e.to, id);
    });
  }

  /** The live source and target nodes of an edge, or null if either is gone. */
  nodesOf(edge: GraphEdge): { source: GraphNode; target: GraphNode } | null {
    const source = this.getNode(edge.from);
    const target = this.getNode(edge.to);
    if (!source || !target) return null;
    return { source, target };
  }

  /** Ids of the nodes one hop away; parallel edges yield repeated ids. */
  neighbors(id: NodeId, direction: EdgeDirection): NodeId[] {
    return this.edgesOf(id, direction).map((e) => (direction === "outgoing" ? e.to : e.from));
  }

  *nodes(): Generator<GraphNode> {
    for (const slot of this.slots) {
      if (slot.node) yield slot.node;
    }
  }

  *edges(): Generator<GraphEdge> {
    yield* this.edgeList;
  }

  private requireNode(id: NodeId): GraphNode {
    const node = this.getNode(id);
    if (!node) throw new Error(`[graph] unknown node ${nodeKey(id)}`);
    return node;
  }
}

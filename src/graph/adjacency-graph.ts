import dagre from "dagre";
import type { graphlib } from "dagre";
import type { NodeAttribute, WallEdge } from "../types/index.js";

/** Order-independent key of an undirected edge. */
function edgeKey(u: string, v: string): string {
  return u <= v ? JSON.stringify([u, v]) : JSON.stringify([v, u]);
}

/**
 * Undirected graph of leaf ids with typed edge properties.
 *
 * Topology lives in a graphlib `Graph`; node attributes and edge properties
 * are kept alongside it, keyed by node id and unordered node pair.
 */
export class AdjacencyGraph<E extends { weight: number } = WallEdge> {
  private readonly graph: graphlib.Graph;
  private readonly nodeAttributes = new Map<string, NodeAttribute[]>();
  private readonly edgeData = new Map<string, E>();

  constructor() {
    this.graph = new dagre.graphlib.Graph({ directed: false });
  }

  /** Declares a node. Attributes of an existing node are left as they are. */
  addNode(id: string, attrs: readonly NodeAttribute[] = []): void {
    if (this.graph.hasNode(id)) return;
    this.graph.setNode(id, {});
    this.nodeAttributes.set(id, [...attrs]);
  }

  /**
   * Connects two nodes, adding them when missing. Repeated calls for the
   * same pair, in either order, merge `properties` into the existing edge.
   */
  addEdge(edge: readonly [string, string], properties: E): void {
    const [u, v] = edge;
    this.addNode(u);
    this.addNode(v);

    const key = edgeKey(u, v);
    const existing = this.edgeData.get(key);
    if (existing === undefined) {
      this.graph.setEdge(u, v);
      this.edgeData.set(key, { ...properties });
      return;
    }
    this.edgeData.set(key, { ...existing, ...properties });
  }

  /** Merges `properties` into an existing edge. Returns false if there is none. */
  setEdgeProperties(edge: readonly [string, string], properties: Partial<E>): boolean {
    const key = edgeKey(edge[0], edge[1]);
    const existing = this.edgeData.get(key);
    if (existing === undefined) return false;
    this.edgeData.set(key, { ...existing, ...properties });
    return true;
  }

  // ---- query API ----

  hasNode(id: string): boolean {
    return this.graph.hasNode(id);
  }

  hasEdge(u: string, v: string): boolean {
    return this.edgeData.has(edgeKey(u, v));
  }

  nodes(): string[] {
    return this.graph.nodes();
  }

  /** Every edge once, as an unordered pair. */
  edges(): Array<[string, string]> {
    return this.graph.edges().map((e): [string, string] => [e.v, e.w]);
  }

  get nodeCount(): number {
    return this.graph.nodeCount();
  }

  get edgeCount(): number {
    return this.graph.edgeCount();
  }

  getNodeAttributes(id: string): readonly NodeAttribute[] | null {
    return this.nodeAttributes.get(id) ?? null;
  }

  /** Ids connected to `id`, including `id` itself for a self-edge. */
  neighbors(id: string): string[] {
    const result: string[] = [];
    for (const [u, v] of this.edges()) {
      if (u === id) result.push(v);
      else if (v === id) result.push(u);
    }
    return result;
  }

  edgeProperties(u: string, v: string): E | null {
    return this.edgeData.get(edgeKey(u, v)) ?? null;
  }

  edgeAttribute<K extends keyof E>(u: string, v: string, key: K): E[K] | null {
    const properties = this.edgeData.get(edgeKey(u, v));
    if (properties === undefined) return null;
    return properties[key];
  }

  /** Mean `weight` of the edges at `id`; null for a node without edges. */
  averagePathLength(id: string): number | null {
    const others = this.neighbors(id);
    if (others.length === 0) return null;
    let total = 0;
    for (const other of others) {
      total += this.edgeProperties(id, other)?.weight ?? 0;
    }
    return total / others.length;
  }

  /** Node ids, lowest average path length first; isolated nodes last. */
  sortedByAveragePathLength(): string[] {
    return this.nodes()
      .map((id) => ({ id, apl: this.averagePathLength(id) ?? Infinity }))
      .sort((a, b) => (a.apl === b.apl ? 0 : a.apl - b.apl))
      .map((entry) => entry.id);
  }

  /** Copy with the same nodes, attributes and edges; property objects are copied one level deep. */
  clone(): AdjacencyGraph<E> {
    const copy = new AdjacencyGraph<E>();
    for (const id of this.nodes()) {
      copy.addNode(id, this.nodeAttributes.get(id) ?? []);
    }
    for (const [u, v] of this.edges()) {
      const properties = this.edgeProperties(u, v);
      if (properties !== null) copy.addEdge([u, v], properties);
    }
    return copy;
  }
}

/**
 * Undirected weighted graph with insertion-ordered nodes.
 *
 * Node and neighbor iteration follow insertion order, so every algorithm
 * that breaks ties by "first encountered" is deterministic.
 */

export interface GraphNode {
  readonly id: string;
}

/**
 * Edge as seen from outside the graph
 */
export interface GraphEdge {
  readonly from: string;
  readonly to: string;
  readonly weight: number;
}

/**
 * Read-only view handed to metrics and visualization collaborators.
 */
export interface ReadonlyWeightedGraph<TNode extends GraphNode> {
  readonly nodeCount: number;
  readonly edgeCount: number;
  hasNode(id: string): boolean;
  getNode(id: string): TNode | undefined;
  nodes(): Iterable<TNode>;
  neighbors(id: string): ReadonlyMap<string, number>;
  degree(id: string): number;
  edges(): GraphEdge[];
}

const NO_NEIGHBORS: ReadonlyMap<string, number> = new Map();

export class WeightedGraph<TNode extends GraphNode>
  implements ReadonlyWeightedGraph<TNode>
{
  private readonly nodeMap = new Map<string, TNode>();
  private readonly adjacency = new Map<string, Map<string, number>>();
  private edgeTotal = 0;

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeTotal;
  }

  addNode(node: TNode): void {
    if (this.nodeMap.has(node.id)) {
      throw new Error(`Graph already contains node ${node.id}`);
    }
    this.nodeMap.set(node.id, node);
    this.adjacency.set(node.id, new Map());
  }

  /**
   * Add or reweight an undirected edge. Self-loops are ignored.
   */
  addEdge(from: string, to: string, weight = 1): void {
    const fromNeighbors = this.adjacency.get(from);
    const toNeighbors = this.adjacency.get(to);
    if (!fromNeighbors || !toNeighbors) {
      throw new Error(`Cannot link unknown nodes ${from} and ${to}`);
    }
    if (from === to) return;

    if (!fromNeighbors.has(to)) this.edgeTotal++;
    fromNeighbors.set(to, weight);
    toNeighbors.set(from, weight);
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id);
  }

  getNode(id: string): TNode | undefined {
    return this.nodeMap.get(id);
  }

  nodes(): Iterable<TNode> {
    return this.nodeMap.values();
  }

  neighbors(id: string): ReadonlyMap<string, number> {
    return this.adjacency.get(id) ?? NO_NEIGHBORS;
  }

  degree(id: string): number {
    return this.adjacency.get(id)?.size ?? 0;
  }

  /**
   * Every edge once, listed from the endpoint inserted first
   */
  edges(): GraphEdge[] {
    const result: GraphEdge[] = [];
    const seen = new Set<string>();
    for (const [from, neighbors] of this.adjacency) {
      seen.add(from);
      for (const [to, weight] of neighbors) {
        if (!seen.has(to)) result.push({ from, to, weight });
      }
    }
    return result;
  }
}

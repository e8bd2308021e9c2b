/**
 * Graph Adapter
 *
 * Validates an adjacency matrix and exposes it as neighbor lists over
 * vertex indices 0..n-1. Instances are immutable.
 */

import { InvalidInputError } from "./errors";
import type { AdjacencyMatrix } from "./graph-types";

export class Graph {
  readonly n: number;
  private readonly neighborLists: ReadonlyArray<readonly number[]>;
  private readonly edgeSet: ReadonlySet<string>;

  private constructor(neighborLists: number[][]) {
    this.n = neighborLists.length;
    this.neighborLists = neighborLists;
    const edgeSet = new Set<string>();
    neighborLists.forEach((list, u) => {
      for (const v of list) edgeSet.add(edgeKey(u, v));
    });
    this.edgeSet = edgeSet;
  }

  /**
   * Build a graph from a square, symmetric 0/1 matrix with a zero diagonal.
   * @throws InvalidInputError if the matrix is malformed
   */
  static fromAdjacency(matrix: AdjacencyMatrix): Graph {
    if (!Array.isArray(matrix) || matrix.length === 0) {
      throw new InvalidInputError("Adjacency matrix must be a non-empty array of rows.");
    }
    const n = matrix.length;

    matrix.forEach((row, u) => {
      if (!Array.isArray(row) || row.length !== n) {
        throw new InvalidInputError(`Adjacency matrix must be square: row ${u} is not of length ${n}.`);
      }
    });

    const neighborLists: number[][] = [];
    for (let u = 0; u < n; u++) {
      const list: number[] = [];
      for (let v = 0; v < n; v++) {
        const entry = matrix[u][v];
        if (entry !== 0 && entry !== 1) {
          throw new InvalidInputError(`Entry [${u}][${v}] must be 0 or 1, got ${String(entry)}.`);
        }
        if (u === v && entry !== 0) {
          throw new InvalidInputError(`Self-loop not allowed: diagonal entry [${u}][${u}] is 1.`);
        }
        if (entry !== matrix[v][u]) {
          throw new InvalidInputError(`Adjacency matrix must be symmetric: [${u}][${v}] != [${v}][${u}].`);
        }
        if (entry === 1) list.push(v);
      }
      neighborLists.push(list);
    }

    return new Graph(neighborLists);
  }

  degree(v: number): number {
    return this.neighbors(v).length;
  }

  /**
   * Neighbors of v in ascending order
   */
  neighbors(v: number): readonly number[] {
    this.checkVertex(v);
    return this.neighborLists[v];
  }

  hasEdge(u: number, v: number): boolean {
    return this.edgeSet.has(edgeKey(u, v));
  }

  /**
   * Undirected edges as [u, v] with u < v, in lexicographic order
   */
  edges(): [number, number][] {
    const result: [number, number][] = [];
    this.neighborLists.forEach((list, u) => {
      for (const v of list) {
        if (u < v) result.push([u, v]);
      }
    });
    return result;
  }

  /**
   * Connected components of the subgraph induced by `vertices`.
   * Each component is sorted; components are ordered by their smallest vertex.
   */
  components(vertices: Iterable<number>): number[][] {
    const members = new Set(vertices);
    for (const v of members) this.checkVertex(v);

    const visited = new Set<number>();
    const result: number[][] = [];

    for (const start of [...members].sort((a, b) => a - b)) {
      if (visited.has(start)) continue;

      const component: number[] = [];
      const queue = [start];
      visited.add(start);
      while (queue.length > 0) {
        const u = queue.shift();
        if (u === undefined) break;
        component.push(u);
        for (const w of this.neighborLists[u]) {
          if (members.has(w) && !visited.has(w)) {
            visited.add(w);
            queue.push(w);
          }
        }
      }
      result.push(component.sort((a, b) => a - b));
    }

    return result;
  }

  /**
   * Whether `vertices` induce a connected subgraph (an empty set does not)
   */
  isConnected(vertices: Iterable<number>): boolean {
    return this.components(vertices).length === 1;
  }

  private checkVertex(v: number): void {
    if (!Number.isInteger(v) || v < 0 || v >= this.n) {
      throw new InvalidInputError(`Vertex ${v} is out of range 0..${this.n - 1}.`);
    }
  }
}

function edgeKey(u: number, v: number): string {
  return u < v ? `${u}--${v}` : `${v}--${u}`;
}

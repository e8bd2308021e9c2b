/**
 * Small graphs shared by the tests
 */

import type { AdjacencyMatrix } from "./graph-types";

/**
 * Adjacency matrix of an undirected graph on vertices 0..n-1
 */
export function fromEdges(n: number, edges: [number, number][]): number[][] {
  const matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  for (const [u, v] of edges) {
    matrix[u][v] = 1;
    matrix[v][u] = 1;
  }
  return matrix;
}

export function complete(n: number): number[][] {
  const edges: [number, number][] = [];
  for (let u = 0; u < n; u++) {
    for (let v = u + 1; v < n; v++) edges.push([u, v]);
  }
  return fromEdges(n, edges);
}

/** 0-1-2 and 3-4-5 */
export const TWO_TRIANGLES: AdjacencyMatrix = fromEdges(6, [
  [0, 1],
  [1, 2],
  [0, 2],
  [3, 4],
  [4, 5],
  [3, 5],
]);

/** Two triangles plus isolated vertex 6 */
export const TWO_TRIANGLES_AND_ISOLATED: AdjacencyMatrix = fromEdges(7, [
  [0, 1],
  [1, 2],
  [0, 2],
  [3, 4],
  [4, 5],
  [3, 5],
]);

/** Edges 0-1 and 2-3 */
export const TWO_EDGES: AdjacencyMatrix = fromEdges(4, [
  [0, 1],
  [2, 3],
]);

/** Triangle 0-1-2 with pendant 3 on vertex 0 */
export const TRIANGLE_WITH_PENDANT: AdjacencyMatrix = fromEdges(4, [
  [0, 1],
  [1, 2],
  [0, 2],
  [0, 3],
]);

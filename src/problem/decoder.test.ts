import { describe, it, expect } from "vitest";
import {
  decodeMembership,
  isProportionalPartition,
  isProportionalSubgraph,
  partitionViolations,
  subgraphViolations,
  toCommunities,
} from "./decoder";
import { Graph } from "./graph";
import {
  TRIANGLE_WITH_PENDANT,
  TWO_EDGES,
  TWO_TRIANGLES,
  TWO_TRIANGLES_AND_ISOLATED,
} from "./fixtures";

describe("decodeMembership", () => {
  it("rounds values at 0.5 and treats missing values as zero", () => {
    const values = new Map([
      [1, 1],
      [2, 0.2],
      [3, 0.9],
    ]);
    expect(
      decodeMembership(values, [
        [1, 2],
        [3, 4],
      ])
    ).toEqual([[0], [0]]);
  });
});

describe("toCommunities", () => {
  it("labels groups by smallest member", () => {
    expect(toCommunities([[3, 4], [5, 6], [0, 1, 2]])).toEqual({
      1: [0, 1, 2],
      2: [3, 4],
      3: [5, 6],
    });
  });
});

describe("partitionViolations", () => {
  const triangles = Graph.fromAdjacency(TWO_TRIANGLES);
  const strict = { sizeFloor: true, connected: true };

  it("accepts the two triangles", () => {
    expect(
      partitionViolations(
        triangles,
        [
          [0, 1, 2],
          [3, 4, 5],
        ],
        strict
      )
    ).toEqual([]);
  });

  it("reports every vertex that is not dominated by its own community", () => {
    expect(
      partitionViolations(
        triangles,
        [
          [0, 1],
          [2, 3, 4, 5],
        ],
        strict
      )
    ).toEqual([
      "vertex 0 has 1 neighbors in community 1 but 1 in community 2",
      "vertex 1 has 1 neighbors in community 1 but 1 in community 2",
      "vertex 2 has 0 neighbors in community 2 but 2 in community 1",
      "community 2 is not connected",
    ]);
  });

  it("reports uncovered vertices", () => {
    expect(
      partitionViolations(
        triangles,
        [
          [0, 1, 2],
          [3, 4],
        ],
        strict
      )
    ).toEqual(["vertex 5 is in no community"]);
  });

  it("reports vertices placed twice", () => {
    expect(
      partitionViolations(
        triangles,
        [
          [0, 1, 2],
          [2, 3, 4, 5],
        ],
        strict
      )
    ).toContain("vertex 2 is in communities 1 and 2");
  });

  it("rejects empty communities with or without the size floor", () => {
    const graph = Graph.fromAdjacency(TWO_EDGES);
    const groups = [[0, 1], [2, 3], []];
    expect(partitionViolations(graph, groups, { sizeFloor: true, connected: false })).toEqual([
      "community 3 has 0 members, needs at least 2",
    ]);
    expect(partitionViolations(graph, groups, { sizeFloor: false, connected: false })).toEqual([
      "community 3 has 0 members, needs at least 1",
    ]);
  });

  it("accepts a single member without the size floor", () => {
    const graph = Graph.fromAdjacency([[0]]);
    expect(partitionViolations(graph, [[0]], { sizeFloor: false, connected: true })).toEqual([]);
    expect(partitionViolations(graph, [[0]], { sizeFloor: true, connected: true })).toEqual([
      "community 1 has 1 members, needs at least 2",
    ]);
  });
});

describe("subgraphViolations", () => {
  const graph = Graph.fromAdjacency(TRIANGLE_WITH_PENDANT);

  it("accepts the triangle", () => {
    expect(subgraphViolations(graph, [0, 1, 2], false)).toEqual([]);
  });

  it("rejects the whole vertex set", () => {
    expect(subgraphViolations(graph, [0, 1, 2, 3], false)).toEqual([
      "subgraph has 4 vertices, needs between 2 and 3",
    ]);
  });

  it("reports members with too few neighbors inside", () => {
    expect(subgraphViolations(graph, [0, 3], false)).toEqual([
      "vertex 0 has 1 neighbors inside but 2 outside",
    ]);
  });

  it("checks connectivity only when asked", () => {
    const withIsolated = Graph.fromAdjacency(TWO_TRIANGLES_AND_ISOLATED);
    const subset = [0, 1, 2, 3, 4, 5];
    expect(subgraphViolations(withIsolated, subset, false)).toEqual([]);
    expect(subgraphViolations(withIsolated, subset, true)).toEqual(["subgraph is not connected"]);
  });
});

describe("public validators", () => {
  it("isProportionalPartition", () => {
    const graph = Graph.fromAdjacency(TWO_TRIANGLES);
    expect(isProportionalPartition(graph, { 1: [0, 1, 2], 2: [3, 4, 5] })).toBe(true);
    expect(isProportionalPartition(graph, { 1: [0, 1], 2: [2, 3, 4, 5] })).toBe(false);
  });

  it("isProportionalSubgraph", () => {
    const graph = Graph.fromAdjacency(TRIANGLE_WITH_PENDANT);
    expect(isProportionalSubgraph(graph, [0, 1, 2])).toBe(true);
    expect(isProportionalSubgraph(graph, [0, 3])).toBe(false);
  });
});

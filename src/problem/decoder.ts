/**
 * Solution Decoder
 *
 * Turns solver values back into vertex groups and re-checks every property
 * the model is supposed to guarantee. A failed check means the model was
 * built wrong, not that the input is bad.
 */

import type { VarRef } from "../solvers";
import type { Graph } from "./graph";
import type { Communities } from "./graph-types";

/** Solver slack: a binary counts as set above this value */
const ROUNDING_THRESHOLD = 0.5;

export interface PartitionRules {
  /** Two members per community; otherwise one */
  sizeFloor: boolean;
  connected: boolean;
}

/**
 * Members of every column, ascending. `groups[c]` lists the vertices whose
 * variable in column c rounds to 1.
 */
export function decodeMembership(values: Map<VarRef, number>, membership: VarRef[][]): number[][] {
  return membership.map((column) =>
    column.flatMap((ref, v) => ((values.get(ref) ?? 0) > ROUNDING_THRESHOLD ? [v] : []))
  );
}

/**
 * Label validated (non-empty) groups 1..k in order of their smallest vertex
 */
export function toCommunities(groups: number[][]): Communities {
  const communities: Communities = {};
  [...groups]
    .sort((a, b) => a[0] - b[0])
    .forEach((members, i) => {
      communities[i + 1] = [...members];
    });
  return communities;
}

/**
 * Describe every way `groups` fails to be a proportional partition of the graph.
 * An empty list means the partition is valid.
 */
export function partitionViolations(graph: Graph, groups: number[][], rules: PartitionRules): string[] {
  const violations: string[] = [];
  const owner = new Map<number, number>();

  groups.forEach((members, c) => {
    for (const v of members) {
      const previous = owner.get(v);
      if (previous !== undefined) {
        violations.push(`vertex ${v} is in communities ${previous + 1} and ${c + 1}`);
      }
      owner.set(v, c);
    }
  });
  for (let v = 0; v < graph.n; v++) {
    if (!owner.has(v)) violations.push(`vertex ${v} is in no community`);
  }

  const floor = rules.sizeFloor ? 2 : 1;
  groups.forEach((members, c) => {
    if (members.length < floor) {
      violations.push(`community ${c + 1} has ${members.length} members, needs at least ${floor}`);
    }
  });

  const memberSets = groups.map((members) => new Set(members));
  groups.forEach((members, c) => {
    for (const v of members) {
      const counts = memberSets.map((set) => graph.neighbors(v).filter((u) => set.has(u)).length);
      counts.forEach((cross, other) => {
        if (other !== c && counts[c] <= cross) {
          violations.push(
            `vertex ${v} has ${counts[c]} neighbors in community ${c + 1} but ${cross} in community ${other + 1}`
          );
        }
      });
    }
  });

  if (rules.connected) {
    groups.forEach((members, c) => {
      if (members.length > 0 && !graph.isConnected(members)) {
        violations.push(`community ${c + 1} is not connected`);
      }
    });
  }

  return violations;
}

/**
 * Describe every way `subset` fails to be a proportional subgraph.
 */
export function subgraphViolations(graph: Graph, subset: number[], connected: boolean): string[] {
  const violations: string[] = [];
  const selected = new Set(subset);

  if (selected.size < 2 || selected.size > graph.n - 1) {
    violations.push(`subgraph has ${selected.size} vertices, needs between 2 and ${graph.n - 1}`);
  }

  for (const v of selected) {
    const inside = graph.neighbors(v).filter((u) => selected.has(u)).length;
    const outside = graph.degree(v) - inside;
    if (inside <= outside) {
      violations.push(`vertex ${v} has ${inside} neighbors inside but ${outside} outside`);
    }
  }

  if (connected && selected.size > 0 && !graph.isConnected(selected)) {
    violations.push("subgraph is not connected");
  }

  return violations;
}

/**
 * Whether `communities` is a partition of the vertices in which every vertex
 * has strictly more neighbors in its own community than in any other one
 */
export function isProportionalPartition(
  graph: Graph,
  communities: Communities,
  rules: PartitionRules = { sizeFloor: false, connected: false }
): boolean {
  return partitionViolations(graph, Object.values(communities), rules).length === 0;
}

/**
 * Whether every vertex of `subset` has strictly more neighbors inside than outside
 */
export function isProportionalSubgraph(graph: Graph, subset: number[], connected = false): boolean {
  return subgraphViolations(graph, subset, connected).length === 0;
}

/**
 * Community Model Builder
 *
 * Builds the integer program shared by the four problem variants:
 * - Membership variables, one column per community
 *   (k columns for a partition, a single column for a subgraph)
 * - Partition / size rules on those columns
 * - Proportional dominance rows, guarded by big-M on the vertex's own variable
 * - Flow-based connectivity rows when requested
 *
 * Key encoding technique: a dominance row for vertex v only has to hold when
 * v sits in the community it talks about. With
 *   M_v = deg(v) + 1
 * the row is always slack when the guard is 0, since no neighbor count can
 * push the left-hand side below -deg(v). That is the tightest valid constant
 * and it never exceeds n.
 */

import type { ConnectivityStrategy } from "../config";
import type { MILPSolver, Term, VarRef } from "../solvers";
import { BaseModelBuilder } from "../solvers";
import { addFlowConnectivity } from "./connectivity";
import type { Graph } from "./graph";
import type { ProblemVariant } from "./graph-types";

export interface CommunityModel {
  variant: ProblemVariant;
  builder: BaseModelBuilder;
  /** membership[c][v] = variable for "v belongs to column c" */
  membership: VarRef[][];
}

/**
 * Big-M for the dominance rows of v
 */
export function dominanceBigM(graph: Graph, v: number): number {
  return graph.degree(v) + 1;
}

/**
 * Build the model for `variant` into `solver`.
 *
 * Connectivity rows are only emitted for the "flow" strategy; with "cuts"
 * the caller adds separator rows between solves.
 */
export function buildCommunityModel(
  graph: Graph,
  variant: ProblemVariant,
  solver: MILPSolver,
  strategy: ConnectivityStrategy = "flow"
): CommunityModel {
  const builder = new BaseModelBuilder(solver);
  const membership =
    variant.family === "partition"
      ? addPartitionLayer(builder, graph, variant.k, variant.sizeFloor)
      : [addSubgraphLayer(builder, graph)];

  if (variant.family === "partition") {
    addPartitionDominance(builder, graph, membership);
  } else {
    addSubgraphDominance(builder, graph, membership[0]);
  }

  if (variant.connected && strategy === "flow") {
    addFlowConnectivity(builder, graph, membership, columnLabels(variant));
  }

  return { variant, builder, membership };
}

/**
 * Names used for the columns in variable and row names
 */
export function columnLabels(variant: ProblemVariant): string[] {
  if (variant.family === "subgraph") return ["S"];
  return Array.from({ length: variant.k }, (_, c) => String(c + 1));
}

// ---------- Assignment variable layer ----------

function addPartitionLayer(
  builder: BaseModelBuilder,
  graph: Graph,
  k: number,
  sizeFloor: boolean
): VarRef[][] {
  const { n } = graph;
  const columns: VarRef[][] = Array.from({ length: k }, () => []);

  for (let v = 0; v < n; v++) {
    for (let c = 0; c < k; c++) {
      columns[c].push(builder.createBinary(`x_${v}_${c + 1}`));
    }
  }

  // (1) Every vertex belongs to exactly one community
  for (let v = 0; v < n; v++) {
    builder.addExactlyOne(
      columns.map((column) => column[v]),
      `one_${v}`
    );
  }

  // (2) At least two members per community, or one in generalized mode
  const floor = sizeFloor ? 2 : 1;
  columns.forEach((column, c) => builder.addAtLeast(column, floor, `floor_${c + 1}`));

  // (3) Label symmetry: community c is the one whose smallest member is the
  // c-th smallest, so vertex v can only open communities 1..v+1
  for (let v = 0; v < n; v++) {
    for (let c = v + 1; c < k; c++) {
      builder.addAtMost([columns[c][v]], 0, `order_${v}_${c + 1}`);
    }
  }

  return columns;
}

function addSubgraphLayer(builder: BaseModelBuilder, graph: Graph): VarRef[] {
  const { n } = graph;
  const selected: VarRef[] = [];
  for (let v = 0; v < n; v++) {
    selected.push(builder.createBinary(`s_${v}`));
  }

  // 2 <= |S| <= n - 1
  builder.addAtLeast(selected, 2, "size_min");
  builder.addAtMost(selected, n - 1, "size_max");

  builder.solver.setObjective(
    selected.map((s): Term => [s, 1]),
    "maximize"
  );

  return selected;
}

// ---------- Proportional dominance ----------

/**
 * For every v and ordered pair c != c':
 *   sum_{u in N(v)} x[u][c] - sum_{u in N(v)} x[u][c'] >= 1   whenever x[v][c] = 1
 */
function addPartitionDominance(builder: BaseModelBuilder, graph: Graph, columns: VarRef[][]): void {
  const k = columns.length;
  for (let v = 0; v < graph.n; v++) {
    const neighbors = graph.neighbors(v);
    const bigM = dominanceBigM(graph, v);

    for (let c = 0; c < k; c++) {
      for (let other = 0; other < k; other++) {
        if (other === c) continue;
        const terms: Term[] = [
          ...neighbors.map((u): Term => [columns[c][u], 1]),
          ...neighbors.map((u): Term => [columns[other][u], -1]),
        ];
        builder.addGuardedAtLeast(columns[c][v], terms, 1, bigM, `dom_${v}_${c + 1}_${other + 1}`);
      }
    }
  }
}

/**
 * For every v: in(v) - out(v) >= 1 whenever s[v] = 1, where
 * in(v) = sum_{u in N(v)} s[u] and out(v) = deg(v) - in(v).
 * Moving the constant: 2 * in(v) >= deg(v) + 1.
 */
function addSubgraphDominance(builder: BaseModelBuilder, graph: Graph, selected: VarRef[]): void {
  for (let v = 0; v < graph.n; v++) {
    const terms = graph.neighbors(v).map((u): Term => [selected[u], 2]);
    builder.addGuardedAtLeast(
      selected[v],
      terms,
      graph.degree(v) + 1,
      dominanceBigM(graph, v),
      `dom_${v}`
    );
  }
}

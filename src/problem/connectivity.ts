/**
 * Connectivity Constraint Builder
 *
 * Two encodings that forbid a community from inducing a disconnected subgraph.
 *
 * Flow (single pass), per column c:
 * - Root indicators r[v] <= x[v]; at most one root, and a root whenever the
 *   column has any member
 * - A continuous flow on both directions of every edge, only allowed when
 *   both endpoints are members: f(u→v) <= (n-1) x[u], f(u→v) <= (n-1) x[v]
 * - Every non-root member absorbs one unit:
 *     inflow(v) - outflow(v) >= x[v] - n r[v]
 *   A component without the root has no way to receive flow, so it cannot
 *   satisfy its members.
 *
 * Cuts (lazy): after a solve, every component K of a disconnected column
 * yields a vertex separator row. With a in K, b another member outside K and
 * N(K) the vertices adjacent to K but not in it, any connected community that
 * holds both a and b holds some vertex of N(K):
 *   sum_{t in N(K)} x[t] >= x[a] + x[b] - 1
 * The row holds for every connected solution, under every label, and is
 * violated by the current one.
 */

import type { BaseModelBuilder, Term, VarRef } from "../solvers";
import type { Graph } from "./graph";

/**
 * A separator found in a decoded solution
 */
export interface ConnectivityCut {
  /** Column whose members were disconnected */
  column: number;
  /** The component K the cut is built from */
  component: number[];
  /** Vertices adjacent to K outside it, ascending */
  separator: number[];
  a: number;
  b: number;
}

/**
 * Add single-commodity flow connectivity rows for every column
 */
export function addFlowConnectivity(
  builder: BaseModelBuilder,
  graph: Graph,
  membership: VarRef[][],
  labels: string[]
): void {
  const { n } = graph;
  const edges = graph.edges();

  membership.forEach((x, c) => {
    const label = labels[c];

    // ---------- Root selection ----------
    const roots: VarRef[] = [];
    for (let v = 0; v < n; v++) {
      const r = builder.createBinary(`root_${v}_${label}`);
      builder.addImplies(r, x[v], `root_member_${v}_${label}`);
      roots.push(r);
    }
    builder.addAtMost(roots, 1, `one_root_${label}`);
    for (let u = 0; u < n; u++) {
      builder.solver.addConstraint({
        terms: [...roots.map((r): Term => [r, 1]), [x[u], -1]],
        relation: ">=",
        rhs: 0,
        name: `has_root_${u}_${label}`,
      });
    }

    // ---------- Arc flows gated by membership ----------
    const inflow: Term[][] = Array.from({ length: n }, () => []);
    const outflow: Term[][] = Array.from({ length: n }, () => []);
    for (const [u, v] of edges) {
      for (const [from, to] of [
        [u, v],
        [v, u],
      ]) {
        const f = builder.createContinuous(`f_${from}_${to}_${label}`);
        for (const end of [from, to]) {
          builder.solver.addConstraint({
            terms: [
              [f, 1],
              [x[end], -(n - 1)],
            ],
            relation: "<=",
            rhs: 0,
            name: `cap_${from}_${to}_${end}_${label}`,
          });
        }
        outflow[from].push([f, -1]);
        inflow[to].push([f, 1]);
      }
    }

    // ---------- Every non-root member absorbs one unit ----------
    for (let v = 0; v < n; v++) {
      builder.solver.addConstraint({
        terms: [...inflow[v], ...outflow[v], [x[v], -1], [roots[v], n]],
        relation: ">=",
        rhs: 0,
        name: `absorb_${v}_${label}`,
      });
    }
  });
}

/**
 * Find one separator per component of every disconnected group.
 * `groups[c]` lists the members of column c.
 */
export function findConnectivityCuts(graph: Graph, groups: number[][]): ConnectivityCut[] {
  const cuts: ConnectivityCut[] = [];

  groups.forEach((members, column) => {
    const components = graph.components(members);
    if (components.length <= 1) return;

    for (const component of components) {
      const inside = new Set(component);
      const separator = new Set<number>();
      for (const u of component) {
        for (const w of graph.neighbors(u)) {
          if (!inside.has(w)) separator.add(w);
        }
      }
      const outsideMembers = members.filter((v) => !inside.has(v));
      cuts.push({
        column,
        component,
        separator: [...separator].sort((p, q) => p - q),
        a: component[0],
        b: Math.min(...outsideMembers),
      });
    }
  });

  return cuts;
}

/**
 * Add the separator row of `cut` for every column
 */
export function addConnectivityCut(
  builder: BaseModelBuilder,
  membership: VarRef[][],
  cut: ConnectivityCut,
  round: number
): void {
  membership.forEach((x, c) => {
    builder.solver.addConstraint({
      terms: [
        ...cut.separator.map((t): Term => [x[t], 1]),
        [x[cut.a], -1],
        [x[cut.b], -1],
      ],
      relation: ">=",
      rhs: -1,
      name: `cut_${round}_${cut.a}_${cut.b}_${c + 1}`,
    });
  });
}

/**
 * Join cycle detection
 *
 * The join graph is an explicit directed graph: nodes are data source slugs,
 * edges are declared joins. Cycles are found by depth-first traversal with a
 * per-path visited set; nodes whose subtree is fully explored are not
 * traversed again.
 */

import type { DataSource } from '../definitions/records.js';

/** Adjacency list of the join graph, in join declaration order */
export function joinEdges(sources: ReadonlyMap<string, DataSource>): Map<string, string[]> {
  const edges = new Map<string, string[]>();
  for (const [slug, source] of sources) {
    edges.set(slug, [...source.joins.keys()]);
  }
  return edges;
}

/** Rotate a cycle so it starts at its smallest slug, for de-duplication */
function cycleKey(cycle: readonly string[]): string {
  let start = 0;
  for (let i = 1; i < cycle.length; i++) {
    if (cycle[i] < cycle[start]) start = i;
  }
  return [...cycle.slice(start), ...cycle.slice(0, start)].join('\u0000');
}

/**
 * Find join cycles.
 *
 * @param from Only search the graph reachable from these slugs (default: every data source)
 * @returns each distinct cycle once, as the slugs on it in traversal order
 */
export function findCycles(
  sources: ReadonlyMap<string, DataSource>,
  from: Iterable<string> = sources.keys()
): string[][] {
  const edges = joinEdges(sources);
  const done = new Set<string>();
  const seen = new Set<string>();
  const cycles: string[][] = [];

  const path: string[] = [];
  const onPath = new Set<string>();

  const visit = (slug: string): void => {
    if (done.has(slug)) return;
    if (onPath.has(slug)) {
      const cycle = path.slice(path.indexOf(slug));
      const key = cycleKey(cycle);
      if (!seen.has(key)) {
        seen.add(key);
        cycles.push(cycle);
      }
      return;
    }

    path.push(slug);
    onPath.add(slug);
    // unknown targets have no outgoing edges; they are reported elsewhere
    for (const target of edges.get(slug) ?? []) {
      visit(target);
    }
    path.pop();
    onPath.delete(slug);
    done.add(slug);
  };

  for (const slug of from) {
    visit(slug);
  }
  return cycles;
}

import type { Context, CorpusIndex } from '../corpus/corpusIndex.js';
import type { CompatibilityGraph } from './builder.js';
import { UnionFind } from './unionFind.js';
import { mean, median, stdDev } from '../stats/descriptive.js';

export type Adjacency = ReadonlyMap<string, ReadonlySet<string>>;

export interface ConnectivityReport {
  nodes: number;
  edges: number;
  components: number;
  giantSize: number;
  giantFraction: number;
  isolates: number;
  /** component size → number of components of that size */
  sizeDistribution: Record<string, number>;
}

export function connectivity(adj: Adjacency): ConnectivityReport {
  const uf = new UnionFind(adj.keys());
  let edges = 0;
  for (const [a, neighbours] of adj) {
    for (const b of neighbours) {
      if (a < b) {
        uf.union(a, b);
        edges++;
      }
    }
  }
  const sizes = uf.componentSizes();
  const sizeDistribution: Record<string, number> = {};
  for (const s of sizes) sizeDistribution[s] = (sizeDistribution[s] ?? 0) + 1;
  const giantSize = sizes[0] ?? 0;
  return {
    nodes: adj.size,
    edges,
    components: sizes.length,
    giantSize,
    giantFraction: adj.size === 0 ? 0 : giantSize / adj.size,
    isolates: sizes.filter(s => s === 1).length,
    sizeDistribution,
  };
}

/** Component count of the graph induced on all nodes except `removed`. */
export function componentsWithout(adj: Adjacency, removed: ReadonlySet<string>): number {
  const uf = new UnionFind();
  for (const [a, neighbours] of adj) {
    if (removed.has(a)) continue;
    uf.add(a);
    for (const b of neighbours) {
      if (!removed.has(b)) uf.union(a, b);
    }
  }
  return uf.count();
}

export interface HubOptions {
  degreeZ: number;
  percolationThreshold: number;
}

export interface HubCandidate {
  id: string;
  degree: number;
  z: number;
  /** Components added when this node is removed from the graph without the other candidates. */
  percolation: number;
  hub: boolean;
}

export interface HubReport {
  meanDegree: number;
  sdDegree: number;
  candidates: HubCandidate[];
  hubs: string[];
  componentsWithHubs: number;
  componentsWithoutHubs: number;
}

/**
 * Degree z-score shortlist, then a percolation check per candidate: in the
 * graph with every other candidate removed, removing a real connector splits
 * at least `percolationThreshold` more components off.
 */
export function detectHubs(adj: Adjacency, options: HubOptions): HubReport {
  const ids = [...adj.keys()].sort();
  const degrees = ids.map(id => adj.get(id)?.size ?? 0);
  const meanDegree = ids.length > 0 ? mean(degrees) : 0;
  const sdDegree = ids.length > 0 ? stdDev(degrees) : 0;

  const shortlisted = sdDegree === 0 ? [] : ids
    .map((id, i) => ({ id, degree: degrees[i], z: (degrees[i] - meanDegree) / sdDegree }))
    .filter(c => c.z >= options.degreeZ);
  const shortIds = new Set(shortlisted.map(c => c.id));

  // Components of G minus every candidate; each candidate is checked against them.
  const base = new UnionFind();
  for (const [a, neighbours] of adj) {
    if (shortIds.has(a)) continue;
    base.add(a);
    for (const b of neighbours) {
      if (!shortIds.has(b)) base.union(a, b);
    }
  }

  const candidates: HubCandidate[] = shortlisted.map(c => {
    const touched = new Set<string>();
    for (const n of adj.get(c.id) ?? []) {
      if (!shortIds.has(n)) touched.add(base.find(n));
    }
    const percolation = touched.size === 0 ? -1 : touched.size - 1;
    return { ...c, percolation, hub: percolation >= options.percolationThreshold };
  });
  const hubs = candidates.filter(c => c.hub).map(c => c.id);

  return {
    meanDegree,
    sdDegree,
    candidates,
    hubs,
    componentsWithHubs: componentsWithout(adj, new Set()),
    componentsWithoutHubs: componentsWithout(adj, new Set(hubs)),
  };
}

export interface GreedyCover {
  contexts: number;
  covered: number;
  picks: string[];
  /** Contexts newly covered by each pick. */
  gains: number[];
  /** Cumulative coverage fraction after each pick. */
  curve: number[];
}

/** Greedy set cover of contexts by MIDDLE types; ties go to the lexicographically first. */
export function greedyCover(contexts: readonly Context[]): GreedyCover {
  const universe = contexts.filter(c => c.middles.length > 0);
  const coversOf = new Map<string, Set<number>>();
  universe.forEach((c, i) => {
    for (const m of c.middles) {
      let s = coversOf.get(m);
      if (!s) {
        s = new Set();
        coversOf.set(m, s);
      }
      s.add(i);
    }
  });

  const uncovered = new Set(universe.map((_, i) => i));
  const picks: string[] = [];
  const gains: number[] = [];
  const curve: number[] = [];
  const pool = [...coversOf.keys()].sort();
  while (uncovered.size > 0) {
    let best: string | null = null;
    let bestGain = 0;
    for (const m of pool) {
      let gain = 0;
      for (const i of coversOf.get(m) ?? []) if (uncovered.has(i)) gain++;
      if (gain > bestGain) {
        best = m;
        bestGain = gain;
      }
    }
    if (best === null) break;
    picks.push(best);
    gains.push(bestGain);
    for (const i of coversOf.get(best) ?? []) uncovered.delete(i);
    curve.push((universe.length - uncovered.size) / universe.length);
  }
  return { contexts: universe.length, covered: universe.length - uncovered.size, picks, gains, curve };
}

export interface Rationing {
  baselineHubFraction: number;
  observedHubFraction: number;
  rationingRatio: number | null;
  rationingNote: string | null;
}

/** Context slots the cover fills, per MIDDLE: each context counts once, for the pick that covered it. */
export function coverSlots(cover: Pick<GreedyCover, 'picks' | 'gains'>): Map<string, number> {
  return new Map(cover.picks.map((m, i) => [m, cover.gains[i] ?? 0]));
}

function hubShare(counts: ReadonlyMap<string, number>, hubs: ReadonlySet<string>): number {
  let total = 0;
  let hubCount = 0;
  for (const [m, n] of counts) {
    total += n;
    if (hubs.has(m)) hubCount += n;
  }
  return total === 0 ? 0 : hubCount / total;
}

/**
 * Hub share of the slots the greedy cover fills against the hub share of
 * observed token usage. Both sides count occurrences, not distinct types.
 */
export function rationing(
  baselineSlots: ReadonlyMap<string, number>,
  usage: ReadonlyMap<string, number>,
  hubs: ReadonlySet<string>,
): Rationing {
  const baselineHubFraction = hubShare(baselineSlots, hubs);
  const observedHubFraction = hubShare(usage, hubs);
  const rationingRatio = baselineHubFraction === 0
    ? null
    : (baselineHubFraction - observedHubFraction) / baselineHubFraction;
  return {
    baselineHubFraction,
    observedHubFraction,
    rationingRatio,
    rationingNote: rationingRatio === null ? 'baseline cover contains no hubs' : null,
  };
}

export interface CoverageReport extends Rationing {
  contexts: number;
  covered: number;
  coverageFraction: number;
  baseline: string[];
  gains: number[];
  curve: number[];
}

export function coverage(
  contexts: readonly Context[],
  usage: ReadonlyMap<string, number>,
  hubs: ReadonlySet<string>,
): CoverageReport {
  const cover = greedyCover(contexts);
  return {
    contexts: cover.contexts,
    covered: cover.covered,
    coverageFraction: cover.contexts === 0 ? 1 : cover.covered / cover.contexts,
    baseline: cover.picks,
    gains: cover.gains,
    curve: cover.curve,
    ...rationing(coverSlots(cover), usage, hubs),
  };
}

/**
 * Share of below-median-frequency MIDDLEs that take part in at least one
 * trusted edge. Null when no MIDDLE sits below the median.
 */
export function tailActivation(frequencies: ReadonlyMap<string, number>, adj: Adjacency): number | null {
  if (frequencies.size === 0) return null;
  const med = median([...frequencies.values()]);
  const tail = [...frequencies.entries()].filter(([, f]) => f < med).map(([id]) => id);
  if (tail.length === 0) return null;
  return tail.filter(id => (adj.get(id)?.size ?? 0) > 0).length / tail.length;
}

export interface GraphAnalysis {
  connectivity: ConnectivityReport;
  hubs: HubReport;
  coverage: CoverageReport;
  tailActivation: number | null;
}

export function analyzeGraph(graph: CompatibilityGraph, index: CorpusIndex, options: HubOptions): GraphAnalysis {
  const adj = graph.adjacency();
  const hubs = detectHubs(adj, options);
  const frequencies = new Map(index.middleTypes().map(m => [m.id, m.frequency]));
  return {
    connectivity: connectivity(adj),
    hubs,
    coverage: coverage(index.contexts(graph.options.window), frequencies, new Set(hubs.hubs)),
    tailActivation: tailActivation(frequencies, adj),
  };
}

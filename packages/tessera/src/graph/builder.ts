import type { CompatibilityEdge, WindowType } from '../types.js';
import type { TesseraConfig } from '../config.js';
import type { Context, CorpusIndex } from '../corpus/corpusIndex.js';
import { GraphInstabilityError } from '../errors.js';

const SHARD_SIZE = 512;
const SEP = '\u0000';

export type PairCounts = Map<string, number>;

export interface GraphOptions {
  window: WindowType;
  alternativeWindow: WindowType;
  minCount: number;
  minAgreement: number;
}

export function graphOptions(config: TesseraConfig, window?: WindowType): GraphOptions {
  const primary = window ?? config.graph.window;
  let alternative = config.robustness.alternativeWindow;
  // A --window override can collide with the configured alternative.
  if (alternative === primary) {
    alternative = config.graph.window !== primary ? config.graph.window : primary === 'line' ? 'record' : 'line';
  }
  return {
    window: primary,
    alternativeWindow: alternative,
    minCount: config.graph.minCount,
    minAgreement: config.robustness.minAgreement,
  };
}

export function pairKey(a: string, b: string): string {
  return a < b ? `${a}${SEP}${b}` : `${b}${SEP}${a}`;
}

export function splitKey(key: string): [string, string] {
  const i = key.indexOf(SEP);
  return [key.slice(0, i), key.slice(i + 1)];
}

/** Count every unordered pair of distinct MIDDLEs sharing a window. */
export function countCooccurrence(windows: readonly Context[]): PairCounts {
  let total: PairCounts = new Map();
  for (let start = 0; start < windows.length; start += SHARD_SIZE) {
    total = mergePairCounts(total, countShard(windows.slice(start, start + SHARD_SIZE)));
  }
  return total;
}

function countShard(windows: readonly Context[]): PairCounts {
  const counts: PairCounts = new Map();
  for (const w of windows) {
    const ms = [...new Set(w.middles)].sort();
    for (let i = 0; i < ms.length; i++) {
      for (let j = i + 1; j < ms.length; j++) {
        const key = `${ms[i]}${SEP}${ms[j]}`;
        counts.set(key, (counts.get(key) ?? 0) + 1);
      }
    }
  }
  return counts;
}

export function mergePairCounts(a: PairCounts, b: PairCounts): PairCounts {
  const out: PairCounts = new Map(a);
  for (const [k, v] of b) out.set(k, (out.get(k) ?? 0) + v);
  return out;
}

/**
 * MIDDLE compatibility graph. The raw edge table holds every pair seen in
 * either window; only legal STABLE edges are trusted downstream.
 */
export class CompatibilityGraph {
  private readonly byKey: Map<string, CompatibilityEdge>;

  constructor(
    readonly nodes: readonly string[],
    readonly edges: readonly CompatibilityEdge[],
    readonly options: GraphOptions,
    readonly agreement: number,
  ) {
    this.byKey = new Map(edges.map(e => [pairKey(e.a, e.b), e]));
  }

  get passed(): boolean {
    return this.agreement >= this.options.minAgreement;
  }

  get instability(): GraphInstabilityError | null {
    return this.passed ? null : new GraphInstabilityError(this.agreement, this.options.minAgreement, this.unstableEdges().length);
  }

  edge(a: string, b: string): CompatibilityEdge | null {
    return this.byKey.get(pairKey(a, b)) ?? null;
  }

  isLegal(a: string, b: string): boolean {
    return this.edge(a, b)?.legal ?? false;
  }

  isTrusted(a: string, b: string): boolean {
    const e = this.edge(a, b);
    return e !== null && e.legal && e.stability === 'STABLE';
  }

  legalEdges(): CompatibilityEdge[] {
    return this.edges.filter(e => e.legal);
  }

  trustedEdges(): CompatibilityEdge[] {
    return this.edges.filter(e => e.legal && e.stability === 'STABLE');
  }

  unstableEdges(): CompatibilityEdge[] {
    return this.edges.filter(e => e.stability === 'UNSTABLE');
  }

  /** Adjacency over trusted edges; every node present. */
  adjacency(): Map<string, Set<string>> {
    const adj = new Map<string, Set<string>>(this.nodes.map(n => [n, new Set<string>()]));
    for (const e of this.trustedEdges()) {
      adj.get(e.a)?.add(e.b);
      adj.get(e.b)?.add(e.a);
    }
    return adj;
  }

  /** Legal pairs over all n·(n−1)/2 possible pairs. */
  density(): number {
    const n = this.nodes.length;
    const pairs = (n * (n - 1)) / 2;
    return pairs === 0 ? 0 : this.legalEdges().length / pairs;
  }
}

export function buildGraph(index: CorpusIndex, options: GraphOptions): CompatibilityGraph {
  const primary = countCooccurrence(index.contexts(options.window));
  const alternative = countCooccurrence(index.contexts(options.alternativeWindow));
  return graphFromCounts(index.middleIds(), primary, alternative, options);
}

export function graphFromCounts(
  nodes: readonly string[],
  primary: PairCounts,
  alternative: PairCounts,
  options: GraphOptions,
): CompatibilityGraph {
  const keys = new Set([...primary.keys(), ...alternative.keys()]);
  const edges: CompatibilityEdge[] = [];
  let disagreements = 0;

  for (const key of [...keys].sort()) {
    const [a, b] = splitKey(key);
    const count = primary.get(key) ?? 0;
    const altCount = alternative.get(key) ?? 0;
    const legal = count >= options.minCount;
    const altLegal = altCount >= options.minCount;
    if (legal !== altLegal) disagreements++;
    edges.push({ a, b, count, altCount, legal, altLegal, stability: legal === altLegal ? 'STABLE' : 'UNSTABLE' });
  }

  const n = nodes.length;
  const pairs = (n * (n - 1)) / 2;
  const agreement = pairs === 0 ? 1 : 1 - disagreements / pairs;
  return new CompatibilityGraph([...nodes].sort(), edges, options, agreement);
}

export interface RobustnessReport {
  window: WindowType;
  alternativeWindow: WindowType;
  agreement: number;
  required: number;
  passed: boolean;
  legalEdges: number;
  unstableEdges: CompatibilityEdge[];
  error: string | null;
}

export function validateRobustness(index: CorpusIndex, options: GraphOptions): RobustnessReport {
  return robustnessReport(buildGraph(index, options));
}

export function robustnessReport(graph: CompatibilityGraph): RobustnessReport {
  return {
    window: graph.options.window,
    alternativeWindow: graph.options.alternativeWindow,
    agreement: graph.agreement,
    required: graph.options.minAgreement,
    passed: graph.passed,
    legalEdges: graph.legalEdges().length,
    unstableEdges: graph.unstableEdges(),
    error: graph.instability?.message ?? null,
  };
}

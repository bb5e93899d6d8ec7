import type { TestContext, TestDefinition } from './types.js';
import type { ClassSequence } from '../classify/hazards.js';
import { classSequence } from '../classify/engine.js';
import { StatisticalDegeneracyError } from '../errors.js';
import type { Rng } from '../stats/random.js';
import {
  chiSquareIndependence,
  mannWhitney,
  mutualInformation,
  oneWayAnova,
  pearson,
  silhouette,
  spearman,
} from '../stats/tests.js';
import { permutationKey, runPermutation, type PermutationResult } from '../stats/permutation.js';
import { coverSlots, rationing } from '../graph/analyzer.js';

const NO_PREFIX = '∅';

function relativePosition(position: number, lineLength: number): number {
  return lineLength > 1 ? position / (lineLength - 1) : 0;
}

function permute(
  ctx: TestContext,
  testId: string,
  observed: number,
  statistic: (rng: Rng) => number,
): Promise<PermutationResult> {
  return runPermutation({
    testId,
    observed,
    statistic,
    shuffles: ctx.shuffles,
    seed: ctx.seed,
    checkpointEvery: ctx.checkpointEvery,
    key: permutationKey(testId, ctx.seed, ctx.shuffles, ctx.pipeline.corpusVersion),
    store: ctx.store,
    signal: ctx.signal,
  });
}

function adjacentPairs(seqs: readonly ClassSequence[]): { from: string[]; to: string[] } {
  const from: string[] = [];
  const to: string[] = [];
  for (const seq of seqs) {
    for (let i = 0; i + 1 < seq.length; i++) {
      const a = seq[i];
      const b = seq[i + 1];
      if (a === null || b === null) continue;
      from.push(a);
      to.push(b);
    }
  }
  return { from, to };
}

// ── Battery ───────────────────────────────────────────────────

const prefixSection: TestDefinition = {
  id: 'prefix-section-association',
  title: 'PREFIX choice × section (χ², Cramér\'s V)',
  kind: 'chi-square',
  threshold: { alpha: 0.01, minEffect: 0.1 },
  permutation: false,
  statement: 'PREFIX selection is associated with manuscript section',
  tier: 2,
  run({ pipeline }) {
    const tokens = pipeline.index().parsedTokens();
    const prefixes = [...new Set(tokens.map(t => t.prefix ?? NO_PREFIX))].sort();
    const sections = [...new Set(tokens.map(t => t.section))].sort();
    const table = prefixes.map(() => new Array<number>(sections.length).fill(0));
    for (const t of tokens) {
      table[prefixes.indexOf(t.prefix ?? NO_PREFIX)][sections.indexOf(t.section)]++;
    }
    const r = chiSquareIndependence(table);
    return { statistic: r.chi2, pValue: r.pValue, effectSize: r.cramersV, sampleSize: r.n, details: { df: r.df } };
  },
};

const frequencyDegree: TestDefinition = {
  id: 'middle-frequency-degree-correlation',
  title: 'MIDDLE frequency × compatibility degree (Spearman)',
  kind: 'spearman',
  threshold: { alpha: 0.01, minEffect: 0.3 },
  permutation: false,
  statement: 'Frequent MIDDLEs are compatible with more MIDDLEs',
  tier: 2,
  run({ pipeline }) {
    const adj = pipeline.graph().adjacency();
    const middles = pipeline.index().middleTypes();
    const r = spearman(middles.map(m => m.frequency), middles.map(m => adj.get(m.id)?.size ?? 0));
    return { statistic: r.r, pValue: r.pValue, effectSize: r.r, sampleSize: r.n };
  },
};

const positionFrequency: TestDefinition = {
  id: 'middle-position-frequency-correlation',
  title: 'MIDDLE log-frequency × mean line position (Pearson)',
  kind: 'pearson',
  threshold: { alpha: 0.01, minEffect: 0.2 },
  permutation: false,
  statement: 'MIDDLE frequency varies with typical line position',
  tier: 3,
  run({ pipeline }) {
    const sums = new Map<string, { total: number; n: number }>();
    for (const t of pipeline.index().parsedTokens()) {
      const s = sums.get(t.middle) ?? { total: 0, n: 0 };
      s.total += relativePosition(t.position, t.lineLength);
      s.n++;
      sums.set(t.middle, s);
    }
    const ids = [...sums.keys()].sort();
    const r = pearson(
      ids.map(id => Math.log(sums.get(id)?.n ?? 1)),
      ids.map(id => {
        const s = sums.get(id);
        return s ? s.total / s.n : 0;
      }),
    );
    return { statistic: r.r, pValue: r.pValue, effectSize: r.r, sampleSize: r.n };
  },
};

const rolePosition: TestDefinition = {
  id: 'role-position-anova',
  title: 'Line position by instruction role (one-way ANOVA, η²)',
  kind: 'anova',
  threshold: { alpha: 0.01, minEffect: 0.06 },
  permutation: false,
  statement: 'Instruction roles occupy distinct line positions',
  tier: 2,
  run({ pipeline }) {
    const { table } = pipeline.classification();
    const groups = new Map<string, number[]>();
    for (const t of pipeline.index().parsedTokens()) {
      const id = table.classOf(t.raw);
      const role = id === null ? null : table.roleOf(id);
      if (role === null) continue;
      groups.set(role, [...(groups.get(role) ?? []), relativePosition(t.position, t.lineLength)]);
    }
    const r = oneWayAnova([...groups.values()]);
    return {
      statistic: r.f,
      pValue: r.pValue,
      effectSize: r.etaSquared,
      sampleSize: r.n,
      details: { roles: [...groups.keys()].sort(), dfBetween: r.dfBetween, dfWithin: r.dfWithin },
    };
  },
};

const regimeHazard: TestDefinition = {
  id: 'regime-hazard-density',
  title: 'Folio hazard density between the two largest regimes (Mann–Whitney)',
  kind: 'mann-whitney',
  threshold: { alpha: 0.05, minEffect: 0.2 },
  permutation: false,
  statement: 'Hazard density differs between operating regimes',
  tier: 3,
  run({ pipeline }) {
    const profiles = pipeline.classification().profiles;
    const byRegime = new Map<string, number[]>();
    for (const p of profiles) byRegime.set(p.regime, [...(byRegime.get(p.regime) ?? []), p.hazardDensity]);
    const ranked = [...byRegime.entries()].sort((a, b) => b[1].length - a[1].length || a[0].localeCompare(b[0]));
    if (ranked.length < 2) {
      throw new StatisticalDegeneracyError(`Need two regimes, found ${ranked.length}`);
    }
    const [[regimeA, a], [regimeB, b]] = ranked;
    const r = mannWhitney(a, b);
    return {
      statistic: r.u,
      pValue: r.pValue,
      effectSize: r.rankBiserial,
      sampleSize: a.length + b.length,
      details: { regimeA, regimeB, z: r.z },
    };
  },
};

const classOrder: TestDefinition = {
  id: 'class-order-permutation',
  title: 'Adjacent class order information vs within-line shuffle',
  kind: 'permutation',
  threshold: { alpha: 0.01, minEffect: 0.01 },
  permutation: true,
  statement: 'Instruction class order within lines is non-random',
  tier: 2,
  async run(ctx) {
    const { table } = ctx.pipeline.classification();
    const seqs = ctx.pipeline.index().lines().map(line => classSequence(line, table));
    const observedPairs = adjacentPairs(seqs);
    const observed = mutualInformation(observedPairs.from, observedPairs.to);
    const perm = await permute(ctx, 'class-order-permutation', observed.mi, rng => {
      const pairs = adjacentPairs(seqs.map(seq => rng.shuffle([...seq])));
      return mutualInformation(pairs.from, pairs.to).mi;
    });
    return {
      statistic: observed.mi,
      pValue: perm.pValue,
      effectSize: observed.nmi,
      sampleSize: observed.n,
      details: { exceed: perm.exceed, shuffles: perm.shuffles, resumedFrom: perm.resumedFrom },
    };
  },
};

const middleSection: TestDefinition = {
  id: 'middle-section-information',
  title: 'MIDDLE × section normalised MI vs label permutation',
  kind: 'permutation',
  threshold: { alpha: 0.01, minEffect: 0.05 },
  permutation: true,
  statement: 'MIDDLE vocabulary carries information about section',
  tier: 2,
  async run(ctx) {
    const tokens = ctx.pipeline.index().parsedTokens();
    const middles = tokens.map(t => t.middle);
    const sections = tokens.map(t => t.section);
    const observed = mutualInformation(middles, sections);
    const perm = await permute(ctx, 'middle-section-information', observed.nmi, rng =>
      mutualInformation(middles, rng.shuffle([...sections])).nmi);
    return {
      statistic: observed.nmi,
      pValue: perm.pValue,
      effectSize: observed.nmi,
      sampleSize: observed.n,
      details: { mi: observed.mi, exceed: perm.exceed, shuffles: perm.shuffles, resumedFrom: perm.resumedFrom },
    };
  },
};

const separability: TestDefinition = {
  id: 'class-separability',
  title: 'Silhouette of the behavioural clustering vs shuffled labels',
  kind: 'permutation',
  threshold: { alpha: 0.05, minEffect: 0.25 },
  permutation: true,
  statement: 'Unresolved instruction classes form separable behavioural clusters',
  tier: 3,
  async run(ctx) {
    const { clustering } = ctx.pipeline.classification();
    if (clustering.points.length === 0) {
      throw new StatisticalDegeneracyError(clustering.note ?? 'No classes were clustered');
    }
    const observed = silhouette(clustering.points, clustering.labels);
    const perm = await permute(ctx, 'class-separability', observed, rng =>
      silhouette(clustering.points, rng.shuffle([...clustering.labels])));
    return {
      statistic: observed,
      pValue: perm.pValue,
      effectSize: observed,
      sampleSize: clustering.points.length,
      details: { k: clustering.k, exceed: perm.exceed, shuffles: perm.shuffles },
    };
  },
};

const edgeRobustness: TestDefinition = {
  id: 'edge-robustness',
  title: 'Edge legality agreement across windowing schemes',
  kind: 'gate',
  threshold: { alpha: 0.05 },
  permutation: false,
  statement: 'MIDDLE compatibility is stable across windowing schemes',
  tier: 1,
  run({ pipeline }) {
    const graph = pipeline.graph();
    const n = graph.nodes.length;
    return {
      statistic: graph.agreement,
      // Deterministic gate: no sampling distribution.
      pValue: graph.passed ? 0 : 1,
      effectSize: graph.agreement - graph.options.minAgreement,
      sampleSize: (n * (n - 1)) / 2,
      details: {
        window: graph.options.window,
        alternativeWindow: graph.options.alternativeWindow,
        required: graph.options.minAgreement,
        unstableEdges: graph.unstableEdges().length,
      },
    };
  },
};

const hubRationing: TestDefinition = {
  id: 'hub-rationing',
  title: 'Hub rationing ratio vs random hub sets',
  kind: 'permutation',
  threshold: { alpha: 0.05, minEffect: 0.1 },
  permutation: true,
  statement: 'Hub MIDDLEs are used less than an optimal cover would use them',
  tier: 3,
  async run(ctx) {
    const analysis = ctx.pipeline.analysis();
    const hubs = analysis.hubs.hubs;
    if (hubs.length === 0) throw new StatisticalDegeneracyError('No hubs detected');
    const observed = analysis.coverage.rationingRatio;
    if (observed === null) throw new StatisticalDegeneracyError(analysis.coverage.rationingNote ?? 'Rationing ratio undefined');

    const usage = new Map(ctx.pipeline.index().middleTypes().map(m => [m.id, m.frequency]));
    const slots = coverSlots({ picks: analysis.coverage.baseline, gains: analysis.coverage.gains });
    const nodes = [...ctx.pipeline.graph().nodes];
    const perm = await permute(ctx, 'hub-rationing', observed, rng => {
      const randomHubs = new Set(rng.shuffle([...nodes]).slice(0, hubs.length));
      return rationing(slots, usage, randomHubs).rationingRatio ?? -Infinity;
    });
    return {
      statistic: observed,
      pValue: perm.pValue,
      effectSize: observed,
      sampleSize: analysis.coverage.contexts,
      details: {
        hubs,
        baselineHubFraction: analysis.coverage.baselineHubFraction,
        observedHubFraction: analysis.coverage.observedHubFraction,
        exceed: perm.exceed,
        shuffles: perm.shuffles,
      },
    };
  },
};

/** Every battery test runs on its own worker thread, loaded from this module. */
export const BATTERY: readonly TestDefinition[] = [
  prefixSection,
  frequencyDegree,
  positionFrequency,
  rolePosition,
  regimeHazard,
  classOrder,
  middleSection,
  separability,
  edgeRobustness,
  hubRationing,
].map(def => ({ ...def, module: import.meta.url }));

export function findTest(id: string): TestDefinition | undefined {
  return BATTERY.find(t => t.id === id);
}


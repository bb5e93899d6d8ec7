import { StatisticalDegeneracyError } from '../errors.js';
import { mean, ranks, sum, tieGroups } from './descriptive.js';
import { chiSquareSf, fSf, normalTwoSided, studentTTwoSided } from './distributions.js';

export interface CorrelationResult {
  r: number;
  pValue: number;
  n: number;
}

export function pearson(x: readonly number[], y: readonly number[]): CorrelationResult {
  if (x.length !== y.length) throw new StatisticalDegeneracyError('Correlation needs paired samples');
  const n = x.length;
  if (n < 3) throw new StatisticalDegeneracyError(`Correlation needs at least 3 pairs, got ${n}`);
  const mx = mean(x);
  const my = mean(y);
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - mx;
    const dy = y[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) throw new StatisticalDegeneracyError('Correlation of a constant sample');
  const r = Math.max(-1, Math.min(1, sxy / Math.sqrt(sxx * syy)));
  if (Math.abs(r) === 1) return { r, pValue: 0, n };
  const t = r * Math.sqrt((n - 2) / (1 - r * r));
  return { r, pValue: studentTTwoSided(t, n - 2), n };
}

export function spearman(x: readonly number[], y: readonly number[]): CorrelationResult {
  return pearson(ranks(x), ranks(y));
}

export interface ChiSquareResult {
  chi2: number;
  df: number;
  pValue: number;
  cramersV: number;
  n: number;
}

/** χ² test of independence. All-zero rows and columns are dropped first. */
export function chiSquareIndependence(table: readonly (readonly number[])[]): ChiSquareResult {
  const rows = table.filter(r => sum(r) > 0);
  if (rows.length === 0) throw new StatisticalDegeneracyError('Contingency table is empty');
  const cols: number[] = [];
  for (let j = 0; j < rows[0].length; j++) {
    if (rows.some(r => r[j] > 0)) cols.push(j);
  }
  const r = rows.length;
  const c = cols.length;
  if (r < 2 || c < 2) {
    throw new StatisticalDegeneracyError(`Contingency table is ${r}x${c}; need at least 2x2`);
  }
  const rowTotals = rows.map(row => sum(cols.map(j => row[j])));
  const colTotals = cols.map(j => sum(rows.map(row => row[j])));
  const n = sum(rowTotals);

  let chi2 = 0;
  for (let i = 0; i < r; i++) {
    for (let k = 0; k < c; k++) {
      const expected = (rowTotals[i] * colTotals[k]) / n;
      chi2 += (rows[i][cols[k]] - expected) ** 2 / expected;
    }
  }
  const df = (r - 1) * (c - 1);
  return {
    chi2,
    df,
    pValue: chiSquareSf(chi2, df),
    cramersV: Math.sqrt(chi2 / (n * (Math.min(r, c) - 1))),
    n,
  };
}

export interface AnovaResult {
  f: number;
  dfBetween: number;
  dfWithin: number;
  pValue: number;
  etaSquared: number;
  n: number;
}

export function oneWayAnova(groups: readonly (readonly number[])[]): AnovaResult {
  const nonEmpty = groups.filter(g => g.length > 0);
  const k = nonEmpty.length;
  if (k < 2) throw new StatisticalDegeneracyError('ANOVA needs at least 2 non-empty groups');
  const all = nonEmpty.flat();
  const n = all.length;
  if (n <= k) throw new StatisticalDegeneracyError('ANOVA needs more observations than groups');
  const grand = mean(all);

  let ssBetween = 0;
  let ssWithin = 0;
  for (const g of nonEmpty) {
    const m = mean(g);
    ssBetween += g.length * (m - grand) ** 2;
    for (const x of g) ssWithin += (x - m) ** 2;
  }
  const ssTotal = ssBetween + ssWithin;
  if (ssTotal === 0) throw new StatisticalDegeneracyError('ANOVA on a constant sample');

  const dfBetween = k - 1;
  const dfWithin = n - k;
  const f = ssWithin === 0 ? Infinity : (ssBetween / dfBetween) / (ssWithin / dfWithin);
  return { f, dfBetween, dfWithin, pValue: fSf(f, dfBetween, dfWithin), etaSquared: ssBetween / ssTotal, n };
}

export interface MannWhitneyResult {
  u: number;
  z: number;
  pValue: number;
  /** Positive when `a` tends to exceed `b`. */
  rankBiserial: number;
}

/** Mann–Whitney U with tie-corrected normal approximation. */
export function mannWhitney(a: readonly number[], b: readonly number[]): MannWhitneyResult {
  const n1 = a.length;
  const n2 = b.length;
  if (n1 === 0 || n2 === 0) throw new StatisticalDegeneracyError('Mann–Whitney needs two non-empty samples');
  const combined = [...a, ...b];
  const r = ranks(combined);
  const r1 = sum(r.slice(0, n1));
  const u = r1 - (n1 * (n1 + 1)) / 2;
  const n = n1 + n2;
  const tieTerm = sum(tieGroups(combined).map(t => t ** 3 - t));
  const sigma2 = (n1 * n2 / 12) * ((n + 1) - tieTerm / (n * (n - 1)));
  if (sigma2 <= 0) throw new StatisticalDegeneracyError('Mann–Whitney on identical values');
  const z = (u - (n1 * n2) / 2) / Math.sqrt(sigma2);
  return { u, z, pValue: normalTwoSided(z), rankBiserial: (2 * u) / (n1 * n2) - 1 };
}

/** Shannon entropy in bits of a count vector. */
export function entropy(counts: Iterable<number>): number {
  const xs = [...counts].filter(c => c > 0);
  const n = sum(xs);
  if (n === 0) return 0;
  let h = 0;
  for (const c of xs) {
    const p = c / n;
    h -= p * Math.log2(p);
  }
  return h;
}

export interface InformationResult {
  mi: number;
  nmi: number;
  hx: number;
  hy: number;
  n: number;
}

/** Mutual information (bits) of paired discrete labels; NMI = MI / √(H(X)·H(Y)). */
export function mutualInformation(xs: readonly string[], ys: readonly string[]): InformationResult {
  if (xs.length !== ys.length) throw new StatisticalDegeneracyError('Mutual information needs paired labels');
  const n = xs.length;
  if (n === 0) throw new StatisticalDegeneracyError('Mutual information of an empty sample');
  const cx = new Map<string, number>();
  const cy = new Map<string, number>();
  const joint = new Map<string, number>();
  for (let i = 0; i < n; i++) {
    cx.set(xs[i], (cx.get(xs[i]) ?? 0) + 1);
    cy.set(ys[i], (cy.get(ys[i]) ?? 0) + 1);
    const key = `${xs[i]}\u0000${ys[i]}`;
    joint.set(key, (joint.get(key) ?? 0) + 1);
  }
  const hx = entropy(cx.values());
  const hy = entropy(cy.values());
  const mi = Math.max(0, hx + hy - entropy(joint.values()));
  if (hx === 0 || hy === 0) throw new StatisticalDegeneracyError('Mutual information with a constant variable');
  return { mi, nmi: mi / Math.sqrt(hx * hy), hx, hy, n };
}

export function euclidean(a: readonly number[], b: readonly number[]): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += (a[i] - b[i]) ** 2;
  return Math.sqrt(s);
}

/** Mean silhouette coefficient. Needs 2 ≤ clusters ≤ n − 1. */
export function silhouette(points: readonly (readonly number[])[], labels: readonly number[]): number {
  const n = points.length;
  const clusters = [...new Set(labels)];
  if (clusters.length < 2 || clusters.length > n - 1) {
    throw new StatisticalDegeneracyError(`Silhouette needs 2..${n - 1} clusters, got ${clusters.length}`);
  }
  const scores: number[] = [];
  for (let i = 0; i < n; i++) {
    const dist = new Map<number, { total: number; count: number }>();
    for (let j = 0; j < n; j++) {
      if (i === j) continue;
      const entry = dist.get(labels[j]) ?? { total: 0, count: 0 };
      entry.total += euclidean(points[i], points[j]);
      entry.count++;
      dist.set(labels[j], entry);
    }
    const own = dist.get(labels[i]);
    if (!own) {
      scores.push(0);
      continue;
    }
    const a = own.total / own.count;
    let b = Infinity;
    for (const [label, d] of dist) {
      if (label !== labels[i]) b = Math.min(b, d.total / d.count);
    }
    const denom = Math.max(a, b);
    scores.push(denom === 0 ? 0 : (b - a) / denom);
  }
  return mean(scores);
}


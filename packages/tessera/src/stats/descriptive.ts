import { StatisticalDegeneracyError } from '../errors.js';

export function sum(xs: readonly number[]): number {
  let s = 0;
  for (const x of xs) s += x;
  return s;
}

export function mean(xs: readonly number[]): number {
  if (xs.length === 0) throw new StatisticalDegeneracyError('Mean of an empty sample');
  return sum(xs) / xs.length;
}

/** Population variance unless `sample` is set. */
export function variance(xs: readonly number[], sample = false): number {
  const m = mean(xs);
  const denom = sample ? xs.length - 1 : xs.length;
  if (denom <= 0) throw new StatisticalDegeneracyError('Variance needs more observations');
  let ss = 0;
  for (const x of xs) ss += (x - m) ** 2;
  return ss / denom;
}

export function stdDev(xs: readonly number[], sample = false): number {
  return Math.sqrt(variance(xs, sample));
}

export function median(xs: readonly number[]): number {
  if (xs.length === 0) throw new StatisticalDegeneracyError('Median of an empty sample');
  const s = [...xs].sort((a, b) => a - b);
  const mid = Math.floor(s.length / 2);
  return s.length % 2 === 1 ? s[mid] : (s[mid - 1] + s[mid]) / 2;
}

/** 1-based ranks; ties get the average of the ranks they span. */
export function ranks(xs: readonly number[]): number[] {
  const order = xs.map((x, i) => ({ x, i })).sort((a, b) => a.x - b.x);
  const out = new Array<number>(xs.length);
  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1].x === order[i].x) j++;
    const avg = (i + j) / 2 + 1;
    for (let k = i; k <= j; k++) out[order[k].i] = avg;
    i = j + 1;
  }
  return out;
}

/** Sizes of runs of tied values, for tie corrections. */
export function tieGroups(xs: readonly number[]): number[] {
  const counts = new Map<number, number>();
  for (const x of xs) counts.set(x, (counts.get(x) ?? 0) + 1);
  return [...counts.values()].filter(n => n > 1);
}

/** Population z-scores; all zero when the sample has no spread. */
export function zScores(xs: readonly number[]): number[] {
  if (xs.length === 0) return [];
  const m = mean(xs);
  const sd = stdDev(xs);
  return xs.map(x => (sd === 0 ? 0 : (x - m) / sd));
}

import type { HazardCategory, Transition } from '../types.js';
import type { Rng } from '../stats/random.js';

const SEP = '\u0000';

export interface HazardOptions {
  alpha: number;
  minExpected: number;
  shuffles: number;
  categories: Array<{ fromRole: string; toRole: string; category: HazardCategory }>;
}

/** Class id per line position; null where the token has no class. */
export type ClassSequence = ReadonlyArray<string | null>;

function countPairs(seqs: readonly ClassSequence[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const seq of seqs) {
    for (let i = 0; i + 1 < seq.length; i++) {
      const a = seq[i];
      const b = seq[i + 1];
      if (a === null || b === null) continue;
      const key = `${a}${SEP}${b}`;
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Adjacent class transitions against a within-line shuffle baseline. A pair
 * is forbidden when it never occurs, the baseline expects at least
 * `minExpected` occurrences, and the add-one share of shuffles in which it
 * also never occurs is below `alpha`.
 *
 * Returned transitions cover every observed pair plus every unobserved pair
 * the baseline expects at least `minExpected` times.
 */
export function forbiddenTransitions(
  seqs: readonly ClassSequence[],
  roleOf: (classId: string) => string | null,
  options: HazardOptions,
  rng: Rng,
): Transition[] {
  const observed = countPairs(seqs);
  const totals = new Map<string, number>();
  const presentIn = new Map<string, number>();

  for (let s = 0; s < options.shuffles; s++) {
    const shuffled = seqs.map(seq => rng.shuffle([...seq]));
    for (const [key, n] of countPairs(shuffled)) {
      totals.set(key, (totals.get(key) ?? 0) + n);
      presentIn.set(key, (presentIn.get(key) ?? 0) + 1);
    }
  }

  const keys = new Set([...observed.keys(), ...totals.keys()]);
  const out: Transition[] = [];
  for (const key of [...keys].sort()) {
    const obs = observed.get(key) ?? 0;
    const expected = (totals.get(key) ?? 0) / options.shuffles;
    if (obs === 0 && expected < options.minExpected) continue;
    const [from, to] = key.split(SEP);
    let pValue: number | null = null;
    let forbidden = false;
    if (obs === 0) {
      const zeroShuffles = options.shuffles - (presentIn.get(key) ?? 0);
      pValue = (zeroShuffles + 1) / (options.shuffles + 1);
      forbidden = pValue < options.alpha;
    }
    out.push({
      from,
      to,
      observed: obs,
      expected,
      pValue,
      forbidden,
      category: forbidden ? categorize(roleOf(from), roleOf(to), options) : null,
    });
  }
  return out;
}

export function categorize(fromRole: string | null, toRole: string | null, options: HazardOptions): HazardCategory {
  const hit = options.categories.find(c => c.fromRole === fromRole && c.toRole === toRole);
  return hit ? hit.category : 'UNSPECIFIED';
}

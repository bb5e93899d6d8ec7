import type { Rng } from '../stats/random.js';
import { euclidean, silhouette } from '../stats/tests.js';
import { StatisticalDegeneracyError } from '../errors.js';

const MAX_ITER = 100;

type Point = readonly number[];

/** Lloyd's algorithm with k-means++ seeding. Returns one label per point. */
export function kmeans(points: readonly Point[], k: number, rng: Rng): number[] {
  const centroids = seedCentroids(points, k, rng);
  let labels = new Array<number>(points.length).fill(-1);

  for (let iter = 0; iter < MAX_ITER; iter++) {
    const next = points.map(p => nearest(p, centroids));
    const changed = next.some((l, i) => l !== labels[i]);
    labels = next;
    if (!changed) break;
    for (let c = 0; c < k; c++) {
      const members = points.filter((_, i) => labels[i] === c);
      if (members.length > 0) centroids[c] = centroid(members);
    }
  }
  return labels;
}

function seedCentroids(points: readonly Point[], k: number, rng: Rng): number[][] {
  const centroids: number[][] = [[...points[rng.int(points.length)]]];
  while (centroids.length < k) {
    const d2 = points.map(p => Math.min(...centroids.map(c => euclidean(p, c) ** 2)));
    const total = d2.reduce((s, x) => s + x, 0);
    if (total === 0) {
      centroids.push([...points[rng.int(points.length)]]);
      continue;
    }
    let r = rng.next() * total;
    let pick = d2.length - 1;
    for (let i = 0; i < d2.length; i++) {
      r -= d2[i];
      if (r <= 0) {
        pick = i;
        break;
      }
    }
    centroids.push([...points[pick]]);
  }
  return centroids;
}

function nearest(p: Point, centroids: readonly Point[]): number {
  let best = 0;
  let bestD = Infinity;
  centroids.forEach((c, i) => {
    const d = euclidean(p, c);
    if (d < bestD) {
      best = i;
      bestD = d;
    }
  });
  return best;
}

function centroid(members: readonly Point[]): number[] {
  const dim = members[0].length;
  const out = new Array<number>(dim).fill(0);
  for (const m of members) for (let d = 0; d < dim; d++) out[d] += m[d];
  return out.map(x => x / members.length);
}

export interface ClusterChoice {
  k: number;
  labels: number[];
  silhouette: number;
  /** Silhouette per tried k; null where the clustering was degenerate. */
  tried: Array<{ k: number; silhouette: number | null }>;
}

/**
 * Cluster for every k in range (capped at n − 1) and keep the best
 * silhouette. Null when no k yields a usable clustering.
 */
export function chooseK(points: readonly Point[], kRange: readonly [number, number], rng: Rng): ClusterChoice | null {
  const maxK = Math.min(kRange[1], points.length - 1);
  let best: ClusterChoice | null = null;
  const tried: ClusterChoice['tried'] = [];

  for (let k = kRange[0]; k <= maxK; k++) {
    const labels = kmeans(points, k, rng);
    let score: number;
    try {
      score = silhouette(points, labels);
    } catch (err) {
      if (!(err instanceof StatisticalDegeneracyError)) throw err;
      tried.push({ k, silhouette: null });
      continue;
    }
    tried.push({ k, silhouette: score });
    if (!best || score > best.silhouette) best = { k, labels, silhouette: score, tried };
  }
  return best ? { ...best, tried } : null;
}

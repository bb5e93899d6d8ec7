import type Database from 'better-sqlite3';
import { setImmediate as yieldToLoop } from 'node:timers/promises';
import { Rng } from './random.js';
import { deleteCheckpoint, getCheckpoint, listCheckpoints, upsertCheckpoint, type CheckpointRow } from '../db/queries.js';

export interface Checkpoint {
  key: string;
  testId: string;
  target: number;
  completed: number;
  exceed: number;
  observed: number;
  rngState: number;
}

export interface CheckpointStore {
  load(key: string): Checkpoint | null;
  save(checkpoint: Checkpoint): void;
  clear(key: string): void;
}

function toCheckpoint(row: CheckpointRow): Checkpoint {
  return {
    key: row.key,
    testId: row.test_id,
    target: row.target,
    completed: row.completed,
    exceed: row.exceed,
    observed: row.observed,
    rngState: row.rng_state,
  };
}

/** Checkpoints in the project database. */
export class SqliteCheckpointStore implements CheckpointStore {
  constructor(private readonly db: Database.Database) {}

  load(key: string): Checkpoint | null {
    const row = getCheckpoint(this.db, key);
    return row ? toCheckpoint(row) : null;
  }

  forTest(testId: string): Checkpoint[] {
    return listCheckpoints(this.db, testId).map(toCheckpoint);
  }

  save(cp: Checkpoint): void {
    upsertCheckpoint(this.db, {
      key: cp.key,
      test_id: cp.testId,
      target: cp.target,
      completed: cp.completed,
      exceed: cp.exceed,
      observed: cp.observed,
      rng_state: cp.rngState,
    });
  }

  clear(key: string): void {
    deleteCheckpoint(this.db, key);
  }
}

export interface PermutationJob {
  testId: string;
  observed: number;
  /** One shuffled statistic, drawing only from `rng`. */
  statistic: (rng: Rng) => number;
  shuffles: number;
  seed: number;
  checkpointEvery: number;
  /** Shuffles counting as "at least as extreme". Defaults to stat ≥ observed. */
  exceeds?: (stat: number, observed: number) => boolean;
  store?: CheckpointStore;
  /** Defaults to `permutationKey(testId, seed, shuffles)`. */
  key?: string;
  signal?: AbortSignal;
  onChunk?: (completed: number, target: number) => void;
}

export interface PermutationResult {
  observed: number;
  shuffles: number;
  exceed: number;
  pValue: number;
  resumedFrom: number;
}

const TOLERANCE = 1e-12;

export function defaultExceeds(stat: number, observed: number): boolean {
  return stat >= observed - TOLERANCE;
}

/** `testId:seed:shuffles`, plus the corpus version when the statistic depends on one. */
export function permutationKey(testId: string, seed: number, shuffles: number, corpusVersion?: string): string {
  const key = `${testId}:${seed}:${shuffles}`;
  return corpusVersion === undefined ? key : `${key}:${corpusVersion}`;
}

/**
 * p = (exceed + 1) / (shuffles + 1). Runs in chunks; after each chunk the
 * progress and RNG state go to the checkpoint store, so a cancelled run
 * resumed under the same key yields the uninterrupted p-value. An aborted run
 * rejects and never returns a partial result.
 */
export async function runPermutation(job: PermutationJob): Promise<PermutationResult> {
  const key = job.key ?? permutationKey(job.testId, job.seed, job.shuffles);
  const exceeds = job.exceeds ?? defaultExceeds;

  let rng = new Rng(job.seed);
  let completed = 0;
  let exceed = 0;

  const saved = job.store?.load(key) ?? null;
  if (saved && saved.target === job.shuffles && saved.observed === job.observed && saved.completed <= job.shuffles) {
    rng = Rng.fromState(saved.rngState);
    completed = saved.completed;
    exceed = saved.exceed;
  }
  const resumedFrom = completed;

  while (completed < job.shuffles) {
    job.signal?.throwIfAborted();
    const end = Math.min(job.shuffles, completed + job.checkpointEvery);
    for (; completed < end; completed++) {
      if (exceeds(job.statistic(rng), job.observed)) exceed++;
    }
    job.store?.save({
      key,
      testId: job.testId,
      target: job.shuffles,
      completed,
      exceed,
      observed: job.observed,
      rngState: rng.getState(),
    });
    job.onChunk?.(completed, job.shuffles);
    await yieldToLoop();
  }
  job.signal?.throwIfAborted();

  job.store?.clear(key);
  return {
    observed: job.observed,
    shuffles: job.shuffles,
    exceed,
    pValue: (exceed + 1) / (job.shuffles + 1),
    resumedFrom,
  };
}

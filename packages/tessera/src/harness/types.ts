import type { CorpusRecord, TestOutcome, Threshold, Tier, WindowType } from '../types.js';
import type { TesseraConfig } from '../config.js';
import type { Grammar } from '../corpus/grammar.js';
import type { Pipeline } from '../pipeline.js';
import type { Checkpoint, CheckpointStore } from '../stats/permutation.js';

export type TestKind =
  | 'chi-square'
  | 'spearman'
  | 'pearson'
  | 'anova'
  | 'mann-whitney'
  | 'permutation'
  | 'gate';

export interface TestContext {
  pipeline: Pipeline;
  seed: number;
  shuffles: number;
  checkpointEvery: number;
  store?: CheckpointStore;
  signal: AbortSignal;
}

/**
 * A registered hypothesis test. The threshold is frozen and pre-registered
 * before `run` executes; `run` only measures, the harness decides.
 */
export interface TestDefinition {
  id: string;
  title: string;
  kind: TestKind;
  threshold: Threshold;
  /** Uses the permutation engine; seed and shuffle count apply. */
  permutation: boolean;
  statement: string;
  tier: Tier;
  /**
   * URL of a module that exports this definition in its `BATTERY`. When set,
   * the test runs on a worker thread and a timeout terminates it; otherwise
   * it runs on the calling thread and only asynchronous work is interrupted.
   */
  module?: string;
  run(ctx: TestContext): TestOutcome | Promise<TestOutcome>;
}

/** `workerData` of a test worker. Everything here survives structured cloning. */
export interface WorkerJob {
  module: string;
  testId: string;
  config: TesseraConfig;
  grammar: Grammar;
  records: readonly CorpusRecord[];
  corpusVersion: string;
  window: WindowType;
  seed: number;
  shuffles: number;
  checkpointEvery: number;
  checkpoints: Checkpoint[];
}

export type WorkerMessage =
  | { type: 'checkpoint'; checkpoint: Checkpoint }
  | { type: 'clear'; key: string }
  | { type: 'outcome'; outcome: TestOutcome }
  | { type: 'failed'; name: string; message: string };

export interface RunOptions {
  seed?: number;
  shuffles?: number;
  /** Constraint the verdict resolves, instead of proposing a new one. */
  constraint?: string;
}

import { Worker } from 'node:worker_threads';
import type Database from 'better-sqlite3';
import type { TestOutcome, TestResult, Threshold, Verdict } from '../types.js';
import type { TesseraConfig } from '../config.js';
import type { Pipeline } from '../pipeline.js';
import type { RunOptions, TestDefinition, WorkerJob, WorkerMessage } from './types.js';
import { StatisticalDegeneracyError, TesseraError, TestTimeoutError, errorMessage } from '../errors.js';
import { SqliteCheckpointStore } from '../stats/permutation.js';
import { insertPreregistration, insertTestResult } from '../db/queries.js';

export interface VerdictDecision {
  verdict: Verdict;
  reason: string | null;
}

/** Verdict from a frozen threshold. The test itself never decides. */
export function decideVerdict(outcome: TestOutcome, threshold: Threshold): VerdictDecision {
  if (threshold.minSample !== undefined && outcome.sampleSize < threshold.minSample) {
    return { verdict: 'INCONCLUSIVE', reason: `sample size ${outcome.sampleSize} below minimum ${threshold.minSample}` };
  }
  if (outcome.pValue === null || !Number.isFinite(outcome.pValue)) {
    return { verdict: 'INCONCLUSIVE', reason: 'no p-value' };
  }
  if (outcome.pValue >= threshold.alpha) {
    return { verdict: 'FAIL', reason: `p = ${outcome.pValue} ≥ α = ${threshold.alpha}` };
  }
  if (threshold.minEffect !== undefined) {
    if (outcome.effectSize === null || Math.abs(outcome.effectSize) < threshold.minEffect) {
      return { verdict: 'FAIL', reason: `|effect| below ${threshold.minEffect}` };
    }
  }
  return { verdict: 'PASS', reason: null };
}

export function freezeThreshold(def: TestDefinition, config: TesseraConfig): Readonly<Threshold> {
  return Object.freeze({
    ...def.threshold,
    minSample: def.threshold.minSample ?? config.harness.minSampleSize,
  });
}

function withTimeout<T>(work: () => T | Promise<T>, controller: AbortController, testId: string, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const err = new TestTimeoutError(testId, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
    void Promise.resolve()
      .then(work)
      .then(resolve, reject)
      .finally(() => clearTimeout(timer));
  });
}

interface RunParams {
  seed: number;
  shuffles: number;
  checkpointEvery: number;
}

function workerEntry(): { url: URL; isTs: boolean } {
  const isTs = import.meta.url.endsWith('.ts');
  return { url: new URL(isTs ? './worker.ts' : './worker.js', import.meta.url), isTs };
}

function workerFailure(testId: string, name: string, message: string): Error {
  if (name === 'StatisticalDegeneracyError') return new StatisticalDegeneracyError(message);
  const err = new TesseraError(`Test ${testId} failed: ${message}`);
  err.name = name;
  return err;
}

/**
 * Run a definition on its own thread. The timer lives on this thread, so a
 * test that never yields is still cut off; the worker is terminated before the
 * promise settles. Checkpoints the worker reports are written to `store`.
 */
function runIsolated(
  def: TestDefinition,
  module: string,
  pipeline: Pipeline,
  params: RunParams,
  store: SqliteCheckpointStore,
  timeoutMs: number,
): Promise<TestOutcome> {
  const job: WorkerJob = {
    module,
    testId: def.id,
    config: pipeline.config,
    grammar: pipeline.grammar,
    records: pipeline.records,
    corpusVersion: pipeline.corpusVersion,
    window: pipeline.window,
    ...params,
    checkpoints: store.forTest(def.id),
  };
  const entry = workerEntry();
  const worker = new Worker(entry.url, {
    workerData: job,
    // Sources load through tsx, resolved from this package rather than the cwd.
    execArgv: entry.isTs ? ['--import', import.meta.resolve('tsx')] : [],
  });

  return new Promise<TestOutcome>((resolve, reject) => {
    let done = false;
    const finish = (settle: () => void): void => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      worker.terminate().then(settle, settle);
    };
    const timer = setTimeout(() => finish(() => reject(new TestTimeoutError(def.id, timeoutMs))), timeoutMs);

    worker.on('message', (message: WorkerMessage) => {
      switch (message.type) {
        case 'checkpoint':
          if (!done) store.save(message.checkpoint);
          break;
        case 'clear':
          if (!done) store.clear(message.key);
          break;
        case 'outcome':
          finish(() => resolve(message.outcome));
          break;
        case 'failed':
          finish(() => reject(workerFailure(def.id, message.name, message.message)));
          break;
      }
    });
    worker.on('error', err => finish(() => reject(err)));
    worker.on('exit', code => finish(() => reject(new TesseraError(`Test ${def.id} worker exited with code ${code}`))));
  });
}

/**
 * Pre-register, execute, decide and persist one test. Degenerate data and
 * timeouts become INCONCLUSIVE; any other failure propagates with the
 * pre-registration left in place and no result row. Definitions that name
 * their module run on a worker thread.
 */
export async function runTest(
  def: TestDefinition,
  pipeline: Pipeline,
  db: Database.Database,
  options: RunOptions = {},
): Promise<TestResult> {
  const config = pipeline.config;
  const threshold = freezeThreshold(def, config);
  const seed = def.permutation ? options.seed ?? config.permutation.seed : null;
  const shuffles = def.permutation ? options.shuffles ?? config.permutation.shuffles : null;
  const preregistrationId = insertPreregistration(db, def.id, threshold, pipeline.corpusVersion, seed, shuffles);

  const params: RunParams = {
    seed: seed ?? config.permutation.seed,
    shuffles: shuffles ?? config.permutation.shuffles,
    checkpointEvery: config.permutation.checkpointEvery,
  };
  const store = new SqliteCheckpointStore(db);
  const timeoutMs = config.harness.timeoutMs;
  const controller = new AbortController();
  let outcome: TestOutcome | null = null;
  let decision: VerdictDecision;
  try {
    outcome = def.module
      ? await runIsolated(def, def.module, pipeline, params, store, timeoutMs)
      : await withTimeout(
        () => def.run({ pipeline, ...params, store, signal: controller.signal }),
        controller,
        def.id,
        timeoutMs,
      );
    decision = decideVerdict(outcome, threshold);
  } catch (err) {
    if (!(err instanceof StatisticalDegeneracyError) && !(err instanceof TestTimeoutError)) throw err;
    decision = { verdict: 'INCONCLUSIVE', reason: errorMessage(err) };
  }

  const id = insertTestResult(db, preregistrationId, def.id, decision.verdict, {
    statistic: outcome?.statistic ?? null,
    pValue: outcome?.pValue ?? null,
    effectSize: outcome?.effectSize ?? null,
    sampleSize: outcome?.sampleSize ?? null,
    reason: decision.reason,
    details: outcome?.details ?? null,
  });

  return {
    id,
    testId: def.id,
    verdict: decision.verdict,
    statistic: outcome?.statistic ?? null,
    pValue: outcome?.pValue ?? null,
    effectSize: outcome?.effectSize ?? null,
    sampleSize: outcome?.sampleSize ?? null,
    threshold,
    reason: decision.reason,
    seed,
    shuffles,
    corpusVersion: pipeline.corpusVersion,
    createdAt: new Date().toISOString(),
  };
}

/**
 * Map over `items` with at most `concurrency` in flight. Settles every item;
 * results keep input order.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const results = new Array<PromiseSettledResult<R>>(items.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const i = next++;
      try {
        results[i] = { status: 'fulfilled', value: await fn(items[i]) };
      } catch (reason) {
        results[i] = { status: 'rejected', reason };
      }
    }
  };
  await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, worker));
  return results;
}

export interface BatteryEntry {
  testId: string;
  result: TestResult | null;
  error: string | null;
}

/** Run tests over one shared pipeline with `harness.concurrency` workers. */
export async function runBattery(
  defs: readonly TestDefinition[],
  pipeline: Pipeline,
  db: Database.Database,
  options: RunOptions = {},
): Promise<BatteryEntry[]> {
  const settled = await mapPool(defs, pipeline.config.harness.concurrency, def => runTest(def, pipeline, db, options));
  return settled.map((s, i) => s.status === 'fulfilled'
    ? { testId: defs[i].id, result: s.value, error: null }
    : { testId: defs[i].id, result: null, error: errorMessage(s.reason) });
}

import { parentPort, workerData, type MessagePort } from 'node:worker_threads';
import { Pipeline } from '../pipeline.js';
import type { Checkpoint, CheckpointStore } from '../stats/permutation.js';
import type { TestDefinition, WorkerJob, WorkerMessage } from './types.js';
import { TesseraError, errorMessage } from '../errors.js';

// Entry point of one isolated test run. Rebuilds the pipeline from the cloned
// job, runs the definition, and reports back over the parent port.

/** Serves the checkpoints the parent preloaded; writes go back to the parent's database. */
class RelayCheckpointStore implements CheckpointStore {
  private readonly saved: Map<string, Checkpoint>;

  constructor(checkpoints: readonly Checkpoint[], private readonly port: MessagePort) {
    this.saved = new Map(checkpoints.map(cp => [cp.key, cp]));
  }

  load(key: string): Checkpoint | null {
    return this.saved.get(key) ?? null;
  }

  save(checkpoint: Checkpoint): void {
    this.saved.set(checkpoint.key, checkpoint);
    post(this.port, { type: 'checkpoint', checkpoint });
  }

  clear(key: string): void {
    this.saved.delete(key);
    post(this.port, { type: 'clear', key });
  }
}

function post(port: MessagePort, message: WorkerMessage): void {
  port.postMessage(message);
}

function findDefinition(mod: unknown, id: string): TestDefinition | undefined {
  if (typeof mod !== 'object' || mod === null || !('BATTERY' in mod) || !Array.isArray(mod.BATTERY)) {
    return undefined;
  }
  const defs: unknown[] = mod.BATTERY;
  return defs.find((d): d is TestDefinition =>
    typeof d === 'object' && d !== null
    && 'id' in d && d.id === id
    && 'run' in d && typeof d.run === 'function');
}

async function main(port: MessagePort, job: WorkerJob): Promise<void> {
  const mod: unknown = await import(job.module);
  const def = findDefinition(mod, job.testId);
  if (!def) throw new TesseraError(`Test ${job.testId} is not in the BATTERY of ${job.module}`);

  const pipeline = new Pipeline(job.config, job.grammar, job.records, job.corpusVersion, job.window);
  const outcome = await def.run({
    pipeline,
    seed: job.seed,
    shuffles: job.shuffles,
    checkpointEvery: job.checkpointEvery,
    store: new RelayCheckpointStore(job.checkpoints, port),
    // The parent terminates the thread on timeout; nothing aborts from inside.
    signal: new AbortController().signal,
  });
  post(port, { type: 'outcome', outcome });
}

const port = parentPort;
if (!port) throw new TesseraError('Test worker started without a parent port');
const job: WorkerJob = workerData;

main(port, job).catch((err: unknown) => {
  post(port, {
    type: 'failed',
    name: err instanceof Error ? err.name : 'Error',
    message: errorMessage(err),
  });
});

import { afterEach, beforeEach, describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import type Database from 'better-sqlite3';
import { openTestDb } from '../db/connection.js';
import { getTestResult, listTestResults } from '../db/queries.js';
import { BATTERY, findTest } from '../harness/battery.js';
import { decideVerdict, freezeThreshold, mapPool, runBattery, runTest } from '../harness/runner.js';
import { linkResult } from '../harness/linkage.js';
import type { TestDefinition } from '../harness/types.js';
import { Registry } from '../registry/registry.js';
import { ConstraintStatus } from '../state/types.js';
import { StatisticalDegeneracyError } from '../errors.js';
import type { CorpusRecord, TestResult } from '../types.js';
import { lineRecords, testConfig, testPipeline } from './fixtures.js';
import { workerTest } from './workerBattery.js';

function sectionedCorpus(perSection: number): CorpusRecord[] {
  const qo = Array.from({ length: perSection }, (_, i) => (i % 2 === 0 ? 'qokedy' : 'qoky'));
  const ch = Array.from({ length: perSection }, (_, i) => (i % 2 === 0 ? 'chor' : 'chedy'));
  return [...lineRecords('f1', 1, qo, 'A'), ...lineRecords('f2', 1, ch, 'B')];
}

function fakeTest(overrides: Partial<TestDefinition> = {}): TestDefinition {
  return {
    id: 'fake',
    title: 'Fake',
    kind: 'gate',
    threshold: { alpha: 0.05 },
    permutation: false,
    statement: 'Fake constraint holds',
    tier: 2,
    run: () => ({ statistic: 1, pValue: 0.001, effectSize: 0.5, sampleSize: 50 }),
    ...overrides,
  };
}

function result(verdict: TestResult['verdict']): TestResult {
  return {
    id: 7,
    testId: 'fake',
    verdict,
    statistic: 1,
    pValue: 0.001,
    effectSize: 0.5,
    sampleSize: 50,
    threshold: { alpha: 0.05 },
    reason: null,
    seed: null,
    shuffles: null,
    corpusVersion: 'test-version',
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('decideVerdict', () => {
  const outcome = { statistic: 3, pValue: 0.001, effectSize: 0.4, sampleSize: 100 };

  it('passes significant results with enough effect', () => {
    assert.deepEqual(decideVerdict(outcome, { alpha: 0.01, minEffect: 0.3 }), { verdict: 'PASS', reason: null });
  });

  it('uses the absolute effect size', () => {
    assert.equal(decideVerdict({ ...outcome, effectSize: -0.4 }, { alpha: 0.01, minEffect: 0.3 }).verdict, 'PASS');
  });

  it('fails on p at or above alpha', () => {
    assert.deepEqual(decideVerdict({ ...outcome, pValue: 0.01 }, { alpha: 0.01 }), {
      verdict: 'FAIL',
      reason: 'p = 0.01 ≥ α = 0.01',
    });
  });

  it('fails on a small or missing effect', () => {
    assert.equal(decideVerdict(outcome, { alpha: 0.01, minEffect: 0.5 }).verdict, 'FAIL');
    assert.equal(decideVerdict({ ...outcome, effectSize: null }, { alpha: 0.01, minEffect: 0.1 }).verdict, 'FAIL');
  });

  it('is inconclusive below the minimum sample or without a p-value', () => {
    assert.deepEqual(decideVerdict(outcome, { alpha: 0.01, minSample: 200 }), {
      verdict: 'INCONCLUSIVE',
      reason: 'sample size 100 below minimum 200',
    });
    assert.equal(decideVerdict({ ...outcome, pValue: null }, { alpha: 0.01 }).verdict, 'INCONCLUSIVE');
    assert.equal(decideVerdict({ ...outcome, pValue: NaN }, { alpha: 0.01 }).verdict, 'INCONCLUSIVE');
  });
});

describe('freezeThreshold', () => {
  it('fills the configured minimum sample and freezes', () => {
    const frozen = freezeThreshold(fakeTest(), testConfig());
    assert.deepEqual(frozen, { alpha: 0.05, minSample: 10 });
    assert.equal(Object.isFrozen(frozen), true);
  });

  it('keeps a test-specific minimum', () => {
    assert.equal(freezeThreshold(fakeTest({ threshold: { alpha: 0.05, minSample: 3 } }), testConfig()).minSample, 3);
  });
});

describe('runTest', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openTestDb();
  });

  afterEach(() => {
    db.close();
  });

  it('pre-registers and persists a battery test', async () => {
    const def = findTest('prefix-section-association');
    assert.ok(def);
    const pipeline = testPipeline(sectionedCorpus(20));
    const r = await runTest(def, pipeline, db);

    assert.equal(r.verdict, 'PASS');
    assert.equal(r.statistic, 40);
    assert.equal(r.effectSize, 1);
    assert.equal(r.sampleSize, 40);
    assert.equal(r.seed, null);

    const row = getTestResult(db, r.id);
    assert.equal(row?.verdict, 'PASS');
    assert.equal(row?.corpus_version, 'test-version');
    assert.deepEqual(JSON.parse(row?.threshold ?? 'null'), { alpha: 0.01, minEffect: 0.1, minSample: 10 });
  });

  it('is inconclusive when the sample is below the frozen minimum', async () => {
    const def = findTest('prefix-section-association');
    assert.ok(def);
    const r = await runTest(def, testPipeline(sectionedCorpus(4)), db);
    assert.equal(r.verdict, 'INCONCLUSIVE');
    assert.equal(r.reason, 'sample size 8 below minimum 10');
  });

  it('counts tokens whose section differs from their line', async () => {
    const def = findTest('prefix-section-association');
    assert.ok(def);
    const mixed: CorpusRecord[] = [
      ...sectionedCorpus(20),
      { token: 'chor', folio: 'f3', line: '1', section: 'A', regime: 'R1' },
      { token: 'chor', folio: 'f3', line: '1', section: 'C', regime: 'R1' },
    ];
    const r = await runTest(def, testPipeline(mixed), db);
    assert.equal(r.sampleSize, 42);
    const row = getTestResult(db, r.id);
    assert.deepEqual(JSON.parse(row?.details ?? 'null'), { df: 2 });
  });

  it('records seed and shuffles for permutation tests', async () => {
    const def = fakeTest({ permutation: true });
    const r = await runTest(def, testPipeline(sectionedCorpus(4)), db, { seed: 9, shuffles: 50 });
    assert.equal(r.seed, 9);
    assert.equal(r.shuffles, 50);
    assert.equal(listTestResults(db, 'fake')[0].shuffles, 50);
  });

  it('turns degenerate data into INCONCLUSIVE', async () => {
    const def = fakeTest({
      run: () => {
        throw new StatisticalDegeneracyError('Correlation of a constant sample');
      },
    });
    const r = await runTest(def, testPipeline(sectionedCorpus(4)), db);
    assert.equal(r.verdict, 'INCONCLUSIVE');
    assert.equal(r.reason, 'Correlation of a constant sample');
    assert.equal(r.pValue, null);
  });

  it('times out into INCONCLUSIVE and aborts the test', async () => {
    let aborted = false;
    const def = fakeTest({
      id: 'slow',
      run: ({ signal }) => new Promise((_, reject) => {
        signal.addEventListener('abort', () => {
          aborted = true;
          reject(signal.reason);
        });
      }),
    });
    const pipeline = testPipeline(sectionedCorpus(4), testConfig({ harness: { timeoutMs: 20 } }));
    const r = await runTest(def, pipeline, db);
    assert.equal(r.verdict, 'INCONCLUSIVE');
    assert.equal(r.reason, 'Test slow exceeded 20ms');
    assert.equal(aborted, true);
  });

  it('cuts off a test that never yields', async () => {
    const pipeline = testPipeline(sectionedCorpus(4), testConfig({ harness: { timeoutMs: 200 } }));
    const started = Date.now();
    const r = await runTest(workerTest('busy'), pipeline, db);
    assert.equal(r.verdict, 'INCONCLUSIVE');
    assert.equal(r.reason, 'Test busy exceeded 200ms');
    assert.ok(Date.now() - started < 5000);
    assert.equal(listTestResults(db, 'busy').length, 1);
  });

  it('runs a worker test against a rebuilt pipeline', async () => {
    const r = await runTest(workerTest('token-count'), testPipeline(sectionedCorpus(4)), db);
    assert.equal(r.verdict, 'PASS');
    assert.equal(r.statistic, 8);
    assert.deepEqual(JSON.parse(getTestResult(db, r.id)?.details ?? 'null'), { version: 'test-version' });
  });

  it('maps worker failures like inline ones', async () => {
    const flat = await runTest(workerTest('flat'), testPipeline(sectionedCorpus(4)), db);
    assert.equal(flat.verdict, 'INCONCLUSIVE');
    assert.equal(flat.reason, 'No variance');
    await assert.rejects(runTest(workerTest('crash'), testPipeline(sectionedCorpus(4)), db), (err: unknown) =>
      err instanceof Error && err.name === 'RangeError' && err.message === 'Test crash failed: bad index');
  });

  it('propagates other failures without a result row', async () => {
    const def = fakeTest({
      run: () => {
        throw new Error('boom');
      },
    });
    await assert.rejects(runTest(def, testPipeline(sectionedCorpus(4)), db), /boom/);
    assert.equal(listTestResults(db, 'fake').length, 0);
  });
});

describe('runBattery', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openTestDb();
  });

  afterEach(() => {
    db.close();
  });

  it('keeps going past a failing test and keeps input order', async () => {
    const defs = [
      fakeTest({ id: 'first' }),
      fakeTest({ id: 'broken', run: () => { throw new Error('boom'); } }),
      fakeTest({ id: 'last' }),
    ];
    const entries = await runBattery(defs, testPipeline(sectionedCorpus(4)), db);
    assert.deepEqual(entries.map(e => [e.testId, e.result?.verdict ?? null, e.error]), [
      ['first', 'PASS', null],
      ['broken', null, 'boom'],
      ['last', 'PASS', null],
    ]);
  });
});

describe('mapPool', () => {
  it('limits concurrency and keeps order', async () => {
    let inFlight = 0;
    let peak = 0;
    const settled = await mapPool([30, 5, 15, 1], 2, async ms => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(ms);
      inFlight--;
      return ms * 2;
    });
    assert.equal(peak, 2);
    assert.deepEqual(settled.map(s => (s.status === 'fulfilled' ? s.value : null)), [60, 10, 30, 2]);
  });

  it('captures rejections per item', async () => {
    const settled = await mapPool([1, 2], 4, async n => {
      if (n === 2) throw new Error('two');
      return n;
    });
    assert.equal(settled[0].status, 'fulfilled');
    assert.equal(settled[1].status, 'rejected');
  });
});

describe('linkResult', () => {
  let db: Database.Database;
  let registry: Registry;

  beforeEach(() => {
    db = openTestDb();
    registry = new Registry(db);
  });

  afterEach(() => {
    db.close();
  });

  it('proposes the test constraint on PASS', () => {
    const link = linkResult(registry, fakeTest(), result('PASS'), null, 3);
    assert.equal(link.action, 'proposed');
    assert.equal(link.constraint?.id, 'C001');
    assert.equal(link.constraint?.statement, 'Fake constraint holds');
    assert.deepEqual(link.constraint?.evidence, [{
      testId: 'fake', resultId: 7, pValue: 0.001, effectSize: 0.5, sampleSize: 50, note: 'PASS',
    }]);
  });

  it('writes nothing for an untargeted FAIL or any INCONCLUSIVE', () => {
    assert.deepEqual(linkResult(registry, fakeTest(), result('FAIL'), null, 3), { action: 'none', constraint: null });
    assert.deepEqual(linkResult(registry, fakeTest(), result('INCONCLUSIVE'), 'C001', 3), { action: 'none', constraint: null });
    assert.equal(registry.head(), 0);
  });

  it('confirms or falsifies a targeted constraint', () => {
    registry.propose({ statement: 'A', tier: 2 }, 0);
    registry.propose({ statement: 'B', tier: 2 }, 1);
    assert.equal(linkResult(registry, fakeTest(), result('PASS'), 'C001', 3).constraint?.status, ConstraintStatus.CONFIRMED);
    const falsified = linkResult(registry, fakeTest(), result('FAIL'), 'C002', 3);
    assert.equal(falsified.action, 'falsified');
    assert.equal(falsified.constraint?.status, ConstraintStatus.FALSIFIED);
  });
});

describe('BATTERY', () => {
  it('has unique ids and valid thresholds', () => {
    const ids = BATTERY.map(t => t.id);
    assert.equal(new Set(ids).size, ids.length);
    for (const t of BATTERY) assert.ok(t.threshold.alpha > 0 && t.threshold.alpha < 1, t.id);
    assert.equal(findTest('missing'), undefined);
  });
});

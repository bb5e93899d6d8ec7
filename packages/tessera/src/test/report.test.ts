import { afterEach, beforeEach, describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import type Database from 'better-sqlite3';
import { openTestDb } from '../db/connection.js';
import { listRecentRuns } from '../db/queries.js';
import { RunReport } from '../report.js';
import { stripAnsi } from '../output/format.js';
import type { TestResult } from '../types.js';

function result(testId: string, verdict: TestResult['verdict'], reason: string | null): TestResult {
  return {
    id: 1,
    testId,
    verdict,
    statistic: null,
    pValue: null,
    effectSize: null,
    sampleSize: null,
    threshold: { alpha: 0.05 },
    reason,
    seed: null,
    shuffles: null,
    corpusVersion: 'test-version',
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('RunReport', () => {
  it('sorts verdicts into outcomes', () => {
    const report = new RunReport('run-tests');
    report.verdict(result('a', 'PASS', null));
    report.verdict(result('b', 'FAIL', '|effect| below 0.3'));
    report.verdict(result('c', 'INCONCLUSIVE', 'no p-value'));

    const data = report.toJSON();
    assert.deepEqual(data.successes, [{ label: 'a', detail: null }]);
    assert.deepEqual(data.exclusions, [{ label: 'b', detail: '|effect| below 0.3' }]);
    assert.deepEqual(data.inconclusive, [{ label: 'c', detail: 'no p-value' }]);
  });

  it('counts unparseable tokens by reason and skips zero counts', () => {
    const report = new RunReport('decompose');
    report.unparseable({ EMPTY_TOKEN: 2, REJECTED_CHARACTER: 0, EMPTY_MIDDLE: 1, AMBIGUOUS_SPLIT: 0, UNKNOWN_AFFIX: 0 });
    report.error('TEST_ERROR');

    const errors = report.toJSON().errors;
    assert.deepEqual(Object.keys(errors), ['TEST_ERROR', 'UNPARSEABLE:EMPTY_MIDDLE', 'UNPARSEABLE:EMPTY_TOKEN']);
    assert.equal(errors['UNPARSEABLE:EMPTY_TOKEN'], 2);
    assert.equal(report.counts().errors, 4);
  });

  it('renders an empty report', () => {
    assert.equal(
      stripAnsi(new RunReport('status').render()),
      '  Nothing to report.\n  0 success(es), 0 exclusion(s), 0 inconclusive, 0 error(s)',
    );
  });

  it('renders entries as a table followed by the summary', () => {
    const report = new RunReport('build-graph');
    report.success('hubs', '5 hub(s)');
    report.error('UNPARSEABLE:EMPTY_TOKEN', 2);

    const lines = stripAnsi(report.render()).split('\n').map(l => l.trimEnd());
    assert.equal(lines[0], `Outcome  ${'Item'.padEnd(23)}  Detail`);
    assert.equal(lines[2], `success  ${'hubs'.padEnd(23)}  5 hub(s)`);
    assert.equal(lines[3], 'error    UNPARSEABLE:EMPTY_TOKEN  2');
    assert.equal(lines[lines.length - 1], '  1 success(es), 0 exclusion(s), 0 inconclusive, 2 error(s)');
  });

  describe('persist', () => {
    let db: Database.Database;

    beforeEach(() => {
      db = openTestDb();
    });

    afterEach(() => {
      db.close();
    });

    it('stores the counts and the full report', () => {
      const report = new RunReport('classify');
      report.corpusVersion = 'abc123';
      report.success('classes');
      report.inconclusiveResult('clustering', 'too few');
      const id = report.persist(db);

      const [run] = listRecentRuns(db);
      assert.equal(run.id, id);
      assert.equal(run.command, 'classify');
      assert.equal(run.corpus_version, 'abc123');
      assert.equal(run.successes, 1);
      assert.equal(run.inconclusive, 1);
      assert.equal(run.started_at, report.startedAt);
      assert.deepEqual(JSON.parse(run.report), report.toJSON());
    });
  });
});

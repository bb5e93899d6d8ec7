import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { formatValidation, validateProject } from '../validation.js';

const ready = {
  corpusPath: 'data/corpus.csv',
  hasCorpus: true,
  grammarVersion: 'v2',
  grammarIsDefault: false,
  window: 'line',
  alternativeWindow: 'record',
  registryVersion: 3,
  constraintCount: 2,
  permutationShuffles: 1000,
};

describe('validateProject', () => {
  it('passes every check for a ready project', () => {
    const checks = validateProject(ready);
    assert.deepEqual(checks.map(c => c.status), ['pass', 'pass', 'pass', 'pass', 'pass']);
    assert.equal(checks[4].detail, '2 constraint(s) at version 3');
  });

  it('fails a missing corpus and identical windows', () => {
    const checks = validateProject({ ...ready, hasCorpus: false, alternativeWindow: 'line' });
    assert.equal(checks[0].status, 'fail');
    assert.equal(checks[2].status, 'fail');
    assert.equal(checks[2].detail, 'Primary and alternative window are both line');
  });

  it('warns on the bundled grammar, few shuffles and an empty registry', () => {
    const checks = validateProject({ ...ready, grammarIsDefault: true, permutationShuffles: 99, constraintCount: 0 });
    assert.equal(checks[1].status, 'warn');
    assert.equal(checks[3].status, 'warn');
    assert.equal(checks[3].detail, '99 — p-values below 0.0100 are unreachable');
    assert.equal(checks[4].detail, 'Empty (version 3)');
  });

  it('fails an unloadable grammar and a missing database', () => {
    const checks = validateProject({ ...ready, grammarVersion: null, registryVersion: null });
    assert.equal(checks[1].status, 'fail');
    assert.equal(checks[4].status, 'fail');
  });
});

describe('formatValidation', () => {
  it('prints one line per check', () => {
    const out = formatValidation(validateProject(ready));
    assert.equal(out.split('\n').length, 5);
    assert.ok(out.includes('Corpus: Found at data/corpus.csv'));
  });
});

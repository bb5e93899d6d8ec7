import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { CorpusIndex, buildShard, majority, mergeShards, positionBin } from '../corpus/corpusIndex.js';
import { ConfigurationError, TesseraError } from '../errors.js';
import { lineRecords, testPipeline } from './fixtures.js';

function sampleIndex(): CorpusIndex {
  return testPipeline([
    ...lineRecords('f1', 1, ['a', 'b', 'c'], 'A', 'R1'),
    ...lineRecords('f1', 2, ['a', 'qo'], 'A', 'R1'),
    ...lineRecords('f2', 1, ['b', 'd'], 'B', 'R2'),
  ]).index();
}

describe('positionBin', () => {
  it('maps relative line position onto fixed-width bins', () => {
    assert.equal(positionBin(0, 3, 5), 0);
    assert.equal(positionBin(1, 3, 5), 2);
    assert.equal(positionBin(2, 3, 5), 4);
    assert.equal(positionBin(0, 1, 5), 0);
  });
});

describe('CorpusIndex', () => {
  it('summarises the ingested version', () => {
    assert.deepEqual(sampleIndex().summary(), {
      version: 'test-version',
      tokens: 7,
      parsed: 6,
      unparseable: 1,
      middleTypes: 4,
      lines: 3,
      folios: 2,
      sections: ['A', 'B'],
      regimes: ['R1', 'R2'],
      positionBins: 5,
    });
  });

  it('tracks frequency, positions and contexts per MIDDLE', () => {
    const index = sampleIndex();
    const b = index.middle('b');
    assert.ok(b);
    assert.equal(b.frequency, 2);
    assert.deepEqual(b.positional, [1, 0, 1, 0, 0]);
    assert.deepEqual(b.sectionCounts, { A: 1, B: 1 });
    assert.deepEqual(b.regimeCounts, { R1: 1, R2: 1 });
    assert.equal(b.folioCount, 2);
    assert.equal(b.lineInitial, 1);
    assert.equal(b.lineFinal, 0);

    const a = index.middle('a');
    assert.ok(a);
    assert.deepEqual(a.positional, [2, 0, 0, 0, 0]);
    assert.equal(a.lineInitial, 2);
    assert.equal(index.middle('zz'), null);
  });

  it('builds distinct MIDDLE sets per window', () => {
    const index = sampleIndex();
    assert.deepEqual(index.contexts('line'), [
      { id: 'f1.1', middles: ['a', 'b', 'c'] },
      { id: 'f1.2', middles: ['a'] },
      { id: 'f2.1', middles: ['b', 'd'] },
    ]);
    assert.deepEqual(index.contexts('record'), [
      { id: 'f1#r0', middles: ['a', 'b', 'c'] },
      { id: 'f2#r0', middles: ['b', 'd'] },
    ]);
    assert.deepEqual(index.contexts('folio').map(c => c.id), ['f1', 'f2']);
  });

  it('ingests a version once and refuses a second one', () => {
    const index = sampleIndex();
    assert.equal(index.ingest([], 'test-version'), false);
    assert.throws(() => index.ingest([], 'other-version'), TesseraError);
  });

  it('lists folios with their majority regime', () => {
    const folios = sampleIndex().folios();
    assert.deepEqual(folios.map(f => [f.id, f.section, f.regime, f.lineIds]), [
      ['f1', 'A', 'R1', ['f1.1', 'f1.2']],
      ['f2', 'B', 'R2', ['f2.1']],
    ]);
  });
});

describe('shards', () => {
  it('refuses to merge shards with different bin counts', () => {
    assert.throws(() => mergeShards(buildShard([], 5), buildShard([], 4)), ConfigurationError);
  });

  it('merges counts additively', () => {
    const tokens = sampleIndex().tokens();
    const whole = buildShard(tokens, 5);
    const merged = mergeShards(buildShard(tokens.slice(0, 3), 5), buildShard(tokens.slice(3), 5));
    assert.equal(merged.tokenCount, whole.tokenCount);
    assert.equal(merged.unparseableCount, whole.unparseableCount);
    assert.equal(merged.middles.get('b')?.frequency, 2);
    assert.deepEqual(merged.middles.get('b')?.positional, whole.middles.get('b')?.positional);
  });
});

describe('majority', () => {
  it('breaks ties lexicographically', () => {
    assert.equal(majority(new Map([['R2', 3], ['R1', 3]])), 'R1');
    assert.equal(majority(new Map([['R2', 4], ['R1', 3]])), 'R2');
    assert.equal(majority(new Map()), 'UNKNOWN');
  });
});

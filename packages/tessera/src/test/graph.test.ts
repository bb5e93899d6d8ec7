import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import {
  buildGraph,
  countCooccurrence,
  graphOptions,
  mergePairCounts,
  pairKey,
  robustnessReport,
  splitKey,
  validateRobustness,
  type GraphOptions,
} from '../graph/builder.js';
import type { CorpusRecord } from '../types.js';
import { GraphInstabilityError } from '../errors.js';
import { lineRecords, testConfig, testPipeline } from './fixtures.js';

const lineVsFolio: GraphOptions = { window: 'line', alternativeWindow: 'folio', minCount: 1, minAgreement: 0.9 };

describe('co-occurrence counting', () => {
  it('counts each unordered pair once per window', () => {
    const counts = countCooccurrence([
      { id: 'w1', middles: ['b', 'a', 'a'] },
      { id: 'w2', middles: ['a', 'b', 'c'] },
    ]);
    assert.equal(counts.get(pairKey('a', 'b')), 2);
    assert.equal(counts.get(pairKey('c', 'a')), 1);
    assert.equal(counts.size, 3);
  });

  it('merges shard counts additively', () => {
    const merged = mergePairCounts(new Map([[pairKey('a', 'b'), 2]]), new Map([[pairKey('b', 'a'), 3]]));
    assert.equal(merged.get(pairKey('a', 'b')), 5);
  });

  it('orders pair keys', () => {
    assert.deepEqual(splitKey(pairKey('z', 'k')), ['k', 'z']);
  });
});

describe('graphOptions', () => {
  it('takes windows from config', () => {
    const opts = graphOptions(testConfig());
    assert.deepEqual(opts, { window: 'line', alternativeWindow: 'record', minCount: 1, minAgreement: 0.9 });
  });

  it('moves the alternative off an overriding primary window', () => {
    assert.equal(graphOptions(testConfig(), 'record').alternativeWindow, 'line');
    assert.equal(graphOptions(testConfig(), 'folio').alternativeWindow, 'record');
  });
});

describe('CompatibilityGraph', () => {
  const index = testPipeline([
    ...lineRecords('f1', 1, ['a', 'b']),
    ...lineRecords('f1', 2, ['c']),
  ]).index();

  it('keeps every seen pair and marks window disagreements UNSTABLE', () => {
    const graph = buildGraph(index, lineVsFolio);
    assert.deepEqual(graph.nodes, ['a', 'b', 'c']);
    assert.deepEqual(graph.edges.map(e => [e.a, e.b, e.count, e.altCount, e.stability]), [
      ['a', 'b', 1, 1, 'STABLE'],
      ['a', 'c', 0, 1, 'UNSTABLE'],
      ['b', 'c', 0, 1, 'UNSTABLE'],
    ]);
    assert.ok(Math.abs(graph.agreement - 1 / 3) < 1e-12);
    assert.equal(graph.passed, false);
    assert.ok(graph.instability instanceof GraphInstabilityError);
  });

  it('is symmetric in its legality relation', () => {
    const graph = buildGraph(index, lineVsFolio);
    for (const x of graph.nodes) {
      for (const y of graph.nodes) assert.equal(graph.isLegal(x, y), graph.isLegal(y, x));
    }
  });

  it('trusts only legal STABLE edges downstream', () => {
    const graph = buildGraph(index, lineVsFolio);
    assert.equal(graph.isTrusted('b', 'a'), true);
    assert.equal(graph.isTrusted('a', 'c'), false);
    const adj = graph.adjacency();
    assert.deepEqual([...(adj.get('a') ?? [])], ['b']);
    assert.deepEqual([...(adj.get('c') ?? [])], []);
    assert.equal(graph.density(), 1 / 3);
  });

  it('reports the robustness gate without throwing', () => {
    const report = robustnessReport(buildGraph(index, lineVsFolio));
    assert.equal(report.passed, false);
    assert.equal(report.legalEdges, 1);
    assert.deepEqual(report.unstableEdges.map(e => `${e.a}-${e.b}`), ['a-c', 'b-c']);
    assert.equal(report.error, 'Edge legality agreement 33.33% is below the 90% gate (2 unstable edge(s))');
  });

  it('agrees across line and record windows on a sparse corpus', () => {
    // 10 folios of 3 lines of 4 tokens over 100 MIDDLEs: every line is 4 distinct MIDDLEs.
    const records: CorpusRecord[] = [];
    let slot = 0;
    for (let f = 0; f < 10; f++) {
      for (let l = 1; l <= 3; l++) {
        const tokens: string[] = [];
        for (let k = 0; k < 4; k++) tokens.push(`m${slot++ % 100}`);
        records.push(...lineRecords(`f${f}`, l, tokens));
      }
    }
    const sparse = testPipeline(records).index();
    const report = validateRobustness(sparse, { window: 'line', alternativeWindow: 'record', minCount: 1, minAgreement: 0.9 });
    const graph = buildGraph(sparse, { window: 'line', alternativeWindow: 'record', minCount: 1, minAgreement: 0.9 });

    assert.equal(graph.nodes.length, 100);
    assert.ok(graph.density() < 0.05);
    assert.ok(report.agreement >= 0.9 && report.agreement < 1);
    assert.equal(report.passed, true);
  });
});

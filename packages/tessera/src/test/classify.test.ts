import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import type { ParsedToken } from '../types.js';
import { ClassConfidence } from '../state/types.js';
import { OTHER_CLASS, RARE_CLASS, buildClasses } from '../classify/classes.js';
import { firstAgreeingRule, ruleAgreement, ruleMatches, type RoleRule } from '../classify/rules.js';
import { chooseK, kmeans } from '../classify/kmeans.js';
import { categorize, forbiddenTransitions, type HazardOptions } from '../classify/hazards.js';
import { coMembershipAgreement } from '../classify/engine.js';
import { Rng } from '../stats/random.js';
import { lineRecords, testConfig, testPipeline } from './fixtures.js';

function tok(raw: string, prefix: string | null, middle: string, suffix: string | null): ParsedToken {
  return {
    kind: 'parsed',
    raw,
    prefix,
    middle,
    suffix,
    position: 0,
    lineLength: 1,
    lineId: 'f1.1',
    folioId: 'f1',
    section: 'A',
    regime: 'R1',
  };
}

const QOKEDY = tok('qokedy', 'qo', 'ke', 'dy');
const QOKY = tok('qoky', 'qo', 'k', 'y');
const CHOR = tok('chor', 'ch', 'or', null);
const DAL = tok('dal', null, 'dal', null);

describe('buildClasses', () => {
  it('matches configured patterns and pools the rest into OTHER', () => {
    const table = buildClasses([QOKEDY, QOKEDY, CHOR, DAL, DAL, DAL], {
      classes: [{ id: 'Q', patterns: ['^qo'] }, { id: 'C', patterns: ['^ch'] }],
      minClassFrequency: 5,
    });
    assert.deepEqual(table.ids(), ['Q', 'C', OTHER_CLASS]);
    assert.deepEqual(table.get('Q')?.members, ['qokedy']);
    assert.equal(table.get('Q')?.frequency, 2);
    assert.equal(table.get(OTHER_CLASS)?.frequency, 3);
    assert.equal(table.classOf('dal'), OTHER_CLASS);
    assert.equal(table.classOf('unseen'), null);
    assert.equal(table.get('C')?.confidence, ClassConfidence.UNCLASSIFIED);
  });

  it('gives the first matching class precedence', () => {
    const table = buildClasses([QOKEDY], {
      classes: [{ id: 'SUFFIXED', patterns: ['dy$'] }, { id: 'Q', patterns: ['^qo'] }],
      minClassFrequency: 1,
    });
    assert.equal(table.classOf('qokedy'), 'SUFFIXED');
    assert.deepEqual(table.ids(), ['SUFFIXED', 'Q']);
  });

  it('makes frequent token types their own class without configuration', () => {
    const table = buildClasses([DAL, DAL, DAL, CHOR, CHOR, QOKY], { classes: [], minClassFrequency: 2 });
    assert.deepEqual(table.ids(), ['chor', 'dal', RARE_CLASS]);
    assert.equal(table.classOf('qoky'), RARE_CLASS);
    assert.deepEqual(table.get(RARE_CLASS)?.members, ['qoky']);
  });

  it('collects occurrences per class', () => {
    const table = buildClasses([QOKEDY, CHOR, QOKY], {
      classes: [{ id: 'Q', patterns: ['^qo'] }],
      minClassFrequency: 1,
    });
    const occ = table.occurrences([QOKEDY, CHOR, QOKY]);
    assert.deepEqual(occ.get('Q')?.map(t => t.raw), ['qokedy', 'qoky']);
    assert.deepEqual(occ.get(OTHER_CLASS)?.map(t => t.raw), ['chor']);
  });
});

describe('role rules', () => {
  const escape: RoleRule = { role: 'ESC', prefixes: ['qo'] };

  it('matches on every family the rule sets', () => {
    assert.equal(ruleMatches(QOKEDY, escape), true);
    assert.equal(ruleMatches(CHOR, escape), false);
    assert.equal(ruleMatches(QOKEDY, { role: 'X', prefixes: ['qo'], suffixes: ['y'] }), false);
    assert.equal(ruleMatches(DAL, { role: 'X', prefixes: [''] }), true);
  });

  it('never matches a rule with no families', () => {
    assert.equal(ruleMatches(QOKEDY, { role: 'EMPTY' }), false);
  });

  it('takes the first rule reaching the agreement threshold', () => {
    const occurrences = [QOKEDY, QOKY, CHOR];
    assert.equal(ruleAgreement(occurrences, escape), 2 / 3);
    assert.equal(firstAgreeingRule(occurrences, [escape], 0.6), escape);
    assert.equal(firstAgreeingRule(occurrences, [escape], 0.8), null);
    assert.equal(firstAgreeingRule([], [escape], 0), null);
  });
});

describe('kmeans', () => {
  it('separates distant groups', () => {
    const labels = kmeans([[0], [0.1], [10], [10.1]], 2, new Rng(1));
    assert.equal(labels[0], labels[1]);
    assert.equal(labels[2], labels[3]);
    assert.notEqual(labels[0], labels[2]);
  });

  it('chooses k by silhouette', () => {
    const points = [[0], [0.1], [5], [5.1], [10], [10.1]];
    const choice = chooseK(points, [2, 4], new Rng(1));
    assert.ok(choice);
    assert.equal(choice.k, 3);
    assert.ok(choice.silhouette > 0.9);
    assert.deepEqual(choice.tried.map(t => t.k), [2, 3, 4]);
  });

  it('returns null when no k fits the points', () => {
    assert.equal(chooseK([[0], [1]], [2, 4], new Rng(1)), null);
  });
});

describe('coMembershipAgreement', () => {
  it('ignores how clusters are numbered', () => {
    assert.equal(coMembershipAgreement(0, [0, 0, 1, 1], [1, 1, 0, 0]), 1);
    assert.equal(coMembershipAgreement(0, [0, 0, 1, 1], [0, 1, 1, 1]), 2 / 3);
  });
});

describe('forbiddenTransitions', () => {
  const options: HazardOptions = { alpha: 0.01, minExpected: 5, shuffles: 200, categories: [] };

  it('flags a transition the shuffle baseline expects but the corpus never shows', () => {
    const seqs = Array.from({ length: 40 }, () => ['A', 'B']);
    const transitions = forbiddenTransitions(seqs, () => null, options, new Rng(5));
    assert.deepEqual(transitions.map(t => [t.from, t.to, t.observed]), [['A', 'B', 40], ['B', 'A', 0]]);

    const [ab, ba] = transitions;
    assert.equal(ab.forbidden, false);
    assert.equal(ab.pValue, null);
    assert.equal(ba.forbidden, true);
    assert.equal(ba.pValue, 1 / 201);
    assert.equal(ba.category, 'UNSPECIFIED');
    assert.ok(Math.abs(ab.expected + ba.expected - 40) < 1e-9);
  });

  it('skips unobserved pairs the baseline rarely expects', () => {
    const seqs = Array.from({ length: 40 }, () => ['A', 'B']);
    const transitions = forbiddenTransitions(seqs, () => null, { ...options, minExpected: 100 }, new Rng(5));
    assert.deepEqual(transitions.map(t => `${t.from}>${t.to}`), ['A>B']);
  });

  it('breaks lines at unclassified tokens', () => {
    const transitions = forbiddenTransitions([['A', null, 'B']], () => null, { ...options, minExpected: 1000, shuffles: 1 }, new Rng(5));
    assert.equal(transitions.length, 0);
  });
});

describe('categorize', () => {
  const options: HazardOptions = {
    alpha: 0.01,
    minExpected: 5,
    shuffles: 10,
    categories: [{ fromRole: 'HEAT', toRole: 'SEAL', category: 'PHASE_ORDERING' }],
  };

  it('looks up the role pair', () => {
    assert.equal(categorize('HEAT', 'SEAL', options), 'PHASE_ORDERING');
    assert.equal(categorize('SEAL', 'HEAT', options), 'UNSPECIFIED');
    assert.equal(categorize(null, 'SEAL', options), 'UNSPECIFIED');
  });
});

describe('classify', () => {
  const records = [
    ...lineRecords('f1', 1, ['qokedy', 'chor', 'dal']),
    ...lineRecords('f1', 2, ['qoky', 'chor']),
    ...lineRecords('f2', 1, ['qokedy', 'dal']),
    ...lineRecords('f2', 2, ['chor', 'qoky']),
  ];
  const config = testConfig({
    classification: {
      classes: [{ id: 'Q', patterns: ['^qo'] }, { id: 'C', patterns: ['^ch'] }],
      roleRules: [{ role: 'ESC', prefixes: ['qo'] }],
      escapeRoles: ['ESC'],
    },
    hazards: { minExpected: 1000 },
  });

  it('assigns rule roles and validates them in both halves', () => {
    const result = testPipeline(records, config).classification();
    const byId = new Map(result.classes.map(c => [c.id, c]));
    assert.equal(byId.get('Q')?.role, 'ESC');
    assert.equal(byId.get('Q')?.confidence, ClassConfidence.VALIDATED);
  });

  it('reports too few unresolved classes as ambiguous rather than guessing', () => {
    const result = testPipeline(records, config).classification();
    const byId = new Map(result.classes.map(c => [c.id, c]));
    assert.equal(byId.get('C')?.role, null);
    assert.equal(byId.get('C')?.confidence, ClassConfidence.AMBIGUOUS);
    assert.equal(byId.get(OTHER_CLASS)?.confidence, ClassConfidence.AMBIGUOUS);
    assert.equal(result.clustering.k, null);
    assert.equal(result.clustering.note, '2 unresolved class(es); too few to cluster');
  });

  it('profiles each folio', () => {
    const result = testPipeline(records, config).classification();
    assert.deepEqual(result.forbidden, []);
    assert.deepEqual(result.profiles.map(p => [p.id, p.tokenCount, p.escapeDensity, p.middleDiversity, p.hazardDensity]), [
      ['f1', 5, 0.4, 0.8, 0],
      ['f2', 4, 0.5, 1, 0],
    ]);
  });
});

import { afterEach, beforeEach, describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type Database from 'better-sqlite3';
import { openDbAt, openTestDb } from '../db/connection.js';
import { Registry, formatConstraintId, parseTier, withRetry } from '../registry/registry.js';
import { ConstraintStatus } from '../state/types.js';
import { RegistryConflictError, RegistryError } from '../errors.js';
import type { EvidenceRef } from '../types.js';

const EVIDENCE: EvidenceRef = {
  testId: 'T-hub-rationing',
  resultId: null,
  pValue: 0.001,
  effectSize: 0.4,
  sampleSize: 120,
  note: null,
};

describe('Registry', () => {
  let db: Database.Database;
  let registry: Registry;

  beforeEach(() => {
    db = openTestDb();
    registry = new Registry(db);
  });

  afterEach(() => {
    db.close();
  });

  it('assigns sequential ids and bumps the head on every write', () => {
    const a = registry.propose({ statement: 'Hubs are rationed', tier: 2 }, 0);
    const b = registry.propose({ statement: '  Lines open with a prefix  ', tier: 1 }, 1);
    assert.equal(a.id, 'C001');
    assert.equal(a.status, ConstraintStatus.PROPOSED);
    assert.equal(a.revision, 1);
    assert.equal(a.version, 1);
    assert.equal(b.id, 'C002');
    assert.equal(b.statement, 'Lines open with a prefix');
    assert.equal(registry.head(), 2);
  });

  it('rejects an empty statement', () => {
    assert.throws(() => registry.propose({ statement: '   ', tier: 0 }, 0), RegistryError);
    assert.equal(registry.head(), 0);
  });

  it('rejects a stale version and writes nothing', () => {
    registry.propose({ statement: 'First', tier: 1 }, 0);
    assert.throws(
      () => registry.propose({ statement: 'Second', tier: 1 }, 0),
      (err: unknown) => err instanceof RegistryConflictError && err.expectedVersion === 0 && err.currentVersion === 1,
    );
    assert.equal(registry.list().length, 1);
    assert.equal(registry.head(), 1);
  });

  it('appends a revision with evidence on resolve', () => {
    registry.propose({ statement: 'Hubs are rationed', tier: 2 }, 0);
    const resolved = registry.resolve('C001', ConstraintStatus.CONFIRMED, [EVIDENCE], 1);
    assert.equal(resolved.status, ConstraintStatus.CONFIRMED);
    assert.equal(resolved.revision, 2);
    assert.equal(resolved.version, 2);
    assert.deepEqual(resolved.evidence, [EVIDENCE]);

    const history = registry.history('C001');
    assert.deepEqual(history.map(h => [h.revision, h.status, h.reason]), [
      [1, ConstraintStatus.PROPOSED, 'proposed'],
      [2, ConstraintStatus.CONFIRMED, 'PROPOSED → CONFIRMED'],
    ]);
    assert.deepEqual(history[0].evidence, []);
    assert.deepEqual(history[1].evidence, [EVIDENCE]);
  });

  it('can change the tier on resolve', () => {
    registry.propose({ statement: 'Hubs are rationed', tier: 2 }, 0);
    assert.equal(registry.resolve('C001', ConstraintStatus.PARTIAL, [], 1, 3).tier, 3);
  });

  it('rolls back an invalid transition, head included', () => {
    registry.propose({ statement: 'Hubs are rationed', tier: 2 }, 0);
    registry.resolve('C001', ConstraintStatus.FALSIFIED, [], 1);
    assert.throws(() => registry.resolve('C001', ConstraintStatus.CONFIRMED, [], 2), RegistryError);
    assert.equal(registry.head(), 2);
    assert.equal(registry.history('C001').length, 2);
  });

  it('sends SUPERSEDED through supersede only', () => {
    registry.propose({ statement: 'A', tier: 1 }, 0);
    assert.throws(() => registry.resolve('C001', ConstraintStatus.SUPERSEDED, [], 1), RegistryError);
  });

  it('links superseded constraints both ways', () => {
    registry.propose({ statement: 'Old', tier: 1 }, 0);
    registry.propose({ statement: 'New', tier: 1 }, 1);
    const old = registry.supersede('C001', 'C002', 2);
    assert.equal(old.status, ConstraintStatus.SUPERSEDED);
    assert.equal(old.supersededBy, 'C002');
    assert.deepEqual(registry.get('C002')?.supersedes, ['C001']);
  });

  it('refuses supersession cycles and self-supersession', () => {
    registry.propose({ statement: 'Old', tier: 1 }, 0);
    registry.propose({ statement: 'New', tier: 1 }, 1);
    registry.supersede('C001', 'C002', 2);
    assert.throws(() => registry.supersede('C002', 'C001', 3), /cycle/);
    assert.throws(() => registry.supersede('C002', 'C002', 3), /cannot supersede itself/);
    assert.equal(registry.head(), 3);
  });

  it('reports unknown ids', () => {
    assert.throws(() => registry.resolve('C404', ConstraintStatus.CONFIRMED, [], 0), RegistryError);
    assert.throws(() => registry.history('C404'), RegistryError);
    assert.equal(registry.get('C404'), null);
  });

  it('only ever grows its history', () => {
    const lengths: number[] = [registry.historyLength()];
    registry.propose({ statement: 'A', tier: 1 }, 0);
    lengths.push(registry.historyLength());
    registry.resolve('C001', ConstraintStatus.PARTIAL, [], 1);
    lengths.push(registry.historyLength());
    registry.resolve('C001', ConstraintStatus.CONFIRMED, [], 2);
    lengths.push(registry.historyLength());
    assert.deepEqual(lengths, [0, 1, 2, 3]);
  });

  it('blocks updates and deletes at the storage layer', () => {
    registry.propose({ statement: 'A', tier: 1 }, 0);
    assert.throws(() => db.prepare("UPDATE constraints SET statement = 'B'").run(), /append-only/);
    assert.throws(() => db.prepare('DELETE FROM constraint_revisions').run(), /append-only/);
    assert.throws(() => db.prepare('DELETE FROM registry_head').run(), /cannot be deleted/);
  });

  it('filters snapshots by tier and status', () => {
    registry.propose({ statement: 'Low tier', tier: 1 }, 0);
    registry.propose({ statement: 'High tier', tier: 3 }, 1);
    registry.resolve('C002', ConstraintStatus.CONFIRMED, [], 2);

    assert.deepEqual(registry.exportSnapshot({ maxTier: 2 }).constraints.map(c => c.id), ['C001']);
    assert.deepEqual(
      registry.exportSnapshot({ statuses: [ConstraintStatus.CONFIRMED] }).constraints.map(c => c.id),
      ['C002'],
    );
    const all = registry.exportSnapshot();
    assert.equal(all.version, 3);
    assert.deepEqual(all.filter, { maxTier: null, statuses: null });
    assert.equal(all.constraints.length, 2);
  });
});

describe('concurrent writers', () => {
  let root: string;
  let first: Database.Database;
  let second: Database.Database;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'tessera-registry-'));
    fs.mkdirSync(path.join(root, '.tessera'));
    first = openDbAt(root);
    second = openDbAt(root);
  });

  afterEach(() => {
    first.close();
    second.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('lets exactly one of two writers at the same version land', () => {
    const a = new Registry(first);
    const b = new Registry(second);
    const seen = a.head();

    b.propose({ statement: 'From B', tier: 1 }, seen);
    assert.throws(() => a.propose({ statement: 'From A', tier: 1 }, seen), RegistryConflictError);

    const retried = withRetry(a, v => a.propose({ statement: 'From A', tier: 1 }, v), 3);
    assert.equal(retried.id, 'C002');
    assert.equal(a.head(), 2);
  });
});

describe('withRetry', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openTestDb();
  });

  afterEach(() => {
    db.close();
  });

  it('retries conflicts up to the limit', () => {
    const registry = new Registry(db);
    let calls = 0;
    const result = withRetry(registry, v => {
      calls++;
      if (calls < 3) throw new RegistryConflictError(v, v + 1);
      return calls;
    }, 3);
    assert.equal(result, 3);
  });

  it('rethrows the last conflict once retries run out', () => {
    const registry = new Registry(db);
    let calls = 0;
    assert.throws(() => withRetry(registry, v => {
      calls++;
      throw new RegistryConflictError(v, v + 1);
    }, 1), RegistryConflictError);
    assert.equal(calls, 2);
  });

  it('does not retry other errors', () => {
    const registry = new Registry(db);
    let calls = 0;
    assert.throws(() => withRetry(registry, () => {
      calls++;
      throw new RegistryError('nope');
    }, 3), RegistryError);
    assert.equal(calls, 1);
  });
});

describe('tiers and ids', () => {
  it('parses tiers 0 to 4', () => {
    assert.equal(parseTier('2'), 2);
    assert.equal(parseTier(0), 0);
    assert.throws(() => parseTier('5'), RegistryError);
    assert.throws(() => parseTier('1.5'), RegistryError);
    assert.throws(() => parseTier(''), RegistryError);
  });

  it('pads constraint ids', () => {
    assert.equal(formatConstraintId(12), 'C012');
    assert.equal(formatConstraintId(1234), 'C1234');
  });
});

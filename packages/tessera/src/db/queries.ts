import type Database from 'better-sqlite3';
import type { ConstraintRevision, Threshold, Verdict } from '../types.js';

/**
 * All database operations as named functions using prepared statements.
 * Each function takes a db instance so we can test with in-memory DBs.
 */

// ── Registry head ────────────────────────────────────────────

export function getRegistryVersion(db: Database.Database): number {
  const row = db.prepare<[], { version: number }>('SELECT version FROM registry_head WHERE id = 1').get();
  return row?.version ?? 0;
}

/**
 * Compare-and-swap on the registry head. Returns false when the head moved.
 */
export function bumpRegistryVersion(db: Database.Database, expected: number): boolean {
  const result = db.prepare(`
    UPDATE registry_head SET version = version + 1 WHERE id = 1 AND version = ?
  `).run(expected);
  return result.changes === 1;
}

// ── Constraints ──────────────────────────────────────────────

export interface ConstraintRow {
  id: string;
  seq: number;
  statement: string;
  created_version: number;
  created_at: string;
}

export function nextConstraintSeq(db: Database.Database): number {
  const row = db.prepare<[], { max_seq: number | null }>('SELECT MAX(seq) AS max_seq FROM constraints').get();
  return (row?.max_seq ?? 0) + 1;
}

export function insertConstraint(
  db: Database.Database,
  id: string,
  seq: number,
  statement: string,
  version: number,
): void {
  db.prepare(`
    INSERT INTO constraints (id, seq, statement, created_version) VALUES (?, ?, ?, ?)
  `).run(id, seq, statement, version);
}

export function getConstraintRow(db: Database.Database, id: string): ConstraintRow | null {
  return db.prepare<[string], ConstraintRow>('SELECT * FROM constraints WHERE id = ?').get(id) ?? null;
}

export function listConstraintRows(db: Database.Database): ConstraintRow[] {
  return db.prepare<[], ConstraintRow>('SELECT * FROM constraints ORDER BY seq').all();
}

// ── Revisions ────────────────────────────────────────────────

export function insertRevision(
  db: Database.Database,
  constraintId: string,
  revision: number,
  status: string,
  tier: number,
  version: number,
  reason: string,
): void {
  db.prepare(`
    INSERT INTO constraint_revisions (constraint_id, revision, status, tier, version, reason)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(constraintId, revision, status, tier, version, reason);
}

export function getLatestRevision(db: Database.Database, constraintId: string): ConstraintRevision | null {
  return db.prepare<[string], ConstraintRevision>(`
    SELECT * FROM constraint_revisions WHERE constraint_id = ?
    ORDER BY revision DESC LIMIT 1
  `).get(constraintId) ?? null;
}

export function listRevisions(db: Database.Database, constraintId: string): ConstraintRevision[] {
  return db.prepare<[string], ConstraintRevision>(`
    SELECT * FROM constraint_revisions WHERE constraint_id = ? ORDER BY revision
  `).all(constraintId);
}

export function countRevisions(db: Database.Database): number {
  const row = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM constraint_revisions').get();
  return row?.n ?? 0;
}

export function countByStatus(db: Database.Database): Array<{ status: string; tier: number; n: number }> {
  return db.prepare<[], { status: string; tier: number; n: number }>(`
    SELECT r.status, r.tier, COUNT(*) AS n
    FROM constraint_revisions r
    WHERE r.revision = (
      SELECT MAX(revision) FROM constraint_revisions WHERE constraint_id = r.constraint_id
    )
    GROUP BY r.status, r.tier
    ORDER BY r.tier, r.status
  `).all();
}

// ── Evidence ─────────────────────────────────────────────────

export interface EvidenceRow {
  id: number;
  constraint_id: string;
  revision: number;
  test_id: string | null;
  result_id: number | null;
  p_value: number | null;
  effect_size: number | null;
  sample_size: number | null;
  note: string | null;
  created_at: string;
}

export function insertEvidence(
  db: Database.Database,
  constraintId: string,
  revision: number,
  ref: {
    testId: string | null;
    resultId: number | null;
    pValue: number | null;
    effectSize: number | null;
    sampleSize: number | null;
    note: string | null;
  },
): void {
  db.prepare(`
    INSERT INTO evidence (constraint_id, revision, test_id, result_id, p_value, effect_size, sample_size, note)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    constraintId, revision, ref.testId, ref.resultId,
    ref.pValue, ref.effectSize, ref.sampleSize, ref.note,
  );
}

export function listEvidence(db: Database.Database, constraintId: string): EvidenceRow[] {
  return db.prepare<[string], EvidenceRow>(`
    SELECT * FROM evidence WHERE constraint_id = ? ORDER BY id
  `).all(constraintId);
}

// ── Supersessions ────────────────────────────────────────────

export function insertSupersession(db: Database.Database, oldId: string, newId: string, version: number): void {
  db.prepare(`
    INSERT INTO supersessions (old_id, new_id, version) VALUES (?, ?, ?)
  `).run(oldId, newId, version);
}

export function getSupersededBy(db: Database.Database, oldId: string): string | null {
  const row = db.prepare<[string], { new_id: string }>('SELECT new_id FROM supersessions WHERE old_id = ?').get(oldId);
  return row?.new_id ?? null;
}

export function listSupersedes(db: Database.Database, newId: string): string[] {
  return db.prepare<[string], { old_id: string }>(`
    SELECT old_id FROM supersessions WHERE new_id = ? ORDER BY version
  `).all(newId).map(r => r.old_id);
}

// ── Pre-registrations and results ────────────────────────────

export function insertPreregistration(
  db: Database.Database,
  testId: string,
  threshold: Threshold,
  corpusVersion: string,
  seed: number | null,
  shuffles: number | null,
): number {
  const result = db.prepare(`
    INSERT INTO preregistrations (test_id, threshold, corpus_version, seed, shuffles)
    VALUES (?, ?, ?, ?, ?)
  `).run(testId, JSON.stringify(threshold), corpusVersion, seed, shuffles);
  return Number(result.lastInsertRowid);
}

export interface TestResultRow {
  id: number;
  preregistration_id: number;
  test_id: string;
  verdict: Verdict;
  statistic: number | null;
  p_value: number | null;
  effect_size: number | null;
  sample_size: number | null;
  reason: string | null;
  details: string | null;
  created_at: string;
  threshold: string;
  corpus_version: string;
  seed: number | null;
  shuffles: number | null;
}

export function insertTestResult(
  db: Database.Database,
  preregistrationId: number,
  testId: string,
  verdict: Verdict,
  values: {
    statistic: number | null;
    pValue: number | null;
    effectSize: number | null;
    sampleSize: number | null;
    reason: string | null;
    details: Record<string, unknown> | null;
  },
): number {
  const result = db.prepare(`
    INSERT INTO test_results
      (preregistration_id, test_id, verdict, statistic, p_value, effect_size, sample_size, reason, details)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    preregistrationId, testId, verdict,
    finiteOrNull(values.statistic), finiteOrNull(values.pValue), finiteOrNull(values.effectSize),
    values.sampleSize, values.reason,
    values.details ? JSON.stringify(values.details) : null,
  );
  return Number(result.lastInsertRowid);
}

const RESULT_SELECT = `
  SELECT r.*, p.threshold, p.corpus_version, p.seed, p.shuffles
  FROM test_results r JOIN preregistrations p ON p.id = r.preregistration_id
`;

export function getTestResult(db: Database.Database, id: number): TestResultRow | null {
  return db.prepare<[number], TestResultRow>(`${RESULT_SELECT} WHERE r.id = ?`).get(id) ?? null;
}

export function listTestResults(db: Database.Database, testId?: string, limit = 50): TestResultRow[] {
  if (testId) {
    return db.prepare<[string, number], TestResultRow>(
      `${RESULT_SELECT} WHERE r.test_id = ? ORDER BY r.id DESC LIMIT ?`,
    ).all(testId, limit);
  }
  return db.prepare<[number], TestResultRow>(`${RESULT_SELECT} ORDER BY r.id DESC LIMIT ?`).all(limit);
}

// ── Permutation checkpoints ──────────────────────────────────

export interface CheckpointRow {
  key: string;
  test_id: string;
  target: number;
  completed: number;
  exceed: number;
  observed: number;
  rng_state: number;
  updated_at: string;
}

export function upsertCheckpoint(
  db: Database.Database,
  row: Omit<CheckpointRow, 'updated_at'>,
): void {
  db.prepare(`
    INSERT INTO permutation_checkpoints (key, test_id, target, completed, exceed, observed, rng_state)
    VALUES (@key, @test_id, @target, @completed, @exceed, @observed, @rng_state)
    ON CONFLICT(key) DO UPDATE SET
      test_id = excluded.test_id,
      target = excluded.target,
      observed = excluded.observed,
      completed = excluded.completed,
      exceed = excluded.exceed,
      rng_state = excluded.rng_state,
      updated_at = CURRENT_TIMESTAMP
  `).run(row);
}

export function getCheckpoint(db: Database.Database, key: string): CheckpointRow | null {
  return db.prepare<[string], CheckpointRow>('SELECT * FROM permutation_checkpoints WHERE key = ?').get(key) ?? null;
}

export function listCheckpoints(db: Database.Database, testId: string): CheckpointRow[] {
  return db.prepare<[string], CheckpointRow>('SELECT * FROM permutation_checkpoints WHERE test_id = ? ORDER BY key').all(testId);
}

export function deleteCheckpoint(db: Database.Database, key: string): void {
  db.prepare('DELETE FROM permutation_checkpoints WHERE key = ?').run(key);
}

// ── Runs ─────────────────────────────────────────────────────

export interface RunRow {
  id: number;
  command: string;
  corpus_version: string | null;
  successes: number;
  exclusions: number;
  inconclusive: number;
  report: string;
  started_at: string;
  finished_at: string;
}

export function insertRun(
  db: Database.Database,
  command: string,
  corpusVersion: string | null,
  counts: { successes: number; exclusions: number; inconclusive: number },
  report: string,
  startedAt: string,
): number {
  const result = db.prepare(`
    INSERT INTO runs (command, corpus_version, successes, exclusions, inconclusive, report, started_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(command, corpusVersion, counts.successes, counts.exclusions, counts.inconclusive, report, startedAt);
  return Number(result.lastInsertRowid);
}

export function listRecentRuns(db: Database.Database, limit = 10): RunRow[] {
  return db.prepare<[number], RunRow>('SELECT * FROM runs ORDER BY id DESC LIMIT ?').all(limit);
}

function finiteOrNull(v: number | null): number | null {
  return v !== null && Number.isFinite(v) ? v : null;
}

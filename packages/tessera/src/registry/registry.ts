import type Database from 'better-sqlite3';
import type { ConstraintRecord, ConstraintRevision, EvidenceRef, Tier } from '../types.js';
import { ConstraintStatus } from '../state/types.js';
import { transitionStatus } from '../state/machine.js';
import { RegistryConflictError, RegistryError } from '../errors.js';
import {
  bumpRegistryVersion,
  countRevisions,
  getConstraintRow,
  getLatestRevision,
  getRegistryVersion,
  getSupersededBy,
  insertConstraint,
  insertEvidence,
  insertRevision,
  insertSupersession,
  listConstraintRows,
  listEvidence,
  listRevisions,
  listSupersedes,
  nextConstraintSeq,
  type EvidenceRow,
} from '../db/queries.js';

export interface ProposeInput {
  statement: string;
  tier: Tier;
  evidence?: EvidenceRef[];
  reason?: string;
}

export interface HistoryEntry extends ConstraintRevision {
  evidence: EvidenceRef[];
}

export interface SnapshotFilter {
  maxTier?: Tier;
  statuses?: ConstraintStatus[];
}

export interface RegistrySnapshot {
  version: number;
  exportedAt: string;
  filter: { maxTier: Tier | null; statuses: ConstraintStatus[] | null };
  constraints: ConstraintRecord[];
}

const TIERS: readonly Tier[] = [0, 1, 2, 3, 4];

export function parseTier(raw: unknown): Tier {
  const n = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof n === 'number' && Number.isInteger(n) && n >= 0 && n < TIERS.length) return TIERS[n];
  throw new RegistryError(`Tier must be an integer 0..4, got ${String(raw)}`);
}

export function formatConstraintId(seq: number): string {
  return `C${String(seq).padStart(3, '0')}`;
}

/**
 * Append-only constraint store. Every write names the registry version it was
 * computed against; the head is compared and bumped inside the same
 * transaction, so a stale writer gets RegistryConflictError and nothing lands.
 */
export class Registry {
  constructor(private readonly db: Database.Database) {}

  head(): number {
    return getRegistryVersion(this.db);
  }

  historyLength(): number {
    return countRevisions(this.db);
  }

  propose(input: ProposeInput, expectedVersion: number): ConstraintRecord {
    const statement = input.statement.trim();
    if (statement === '') throw new RegistryError('Constraint statement is empty');
    const tier = parseTier(input.tier);

    const id = this.write(expectedVersion, version => {
      const seq = nextConstraintSeq(this.db);
      const newId = formatConstraintId(seq);
      insertConstraint(this.db, newId, seq, statement, version);
      insertRevision(this.db, newId, 1, ConstraintStatus.PROPOSED, tier, version, input.reason ?? 'proposed');
      for (const ref of input.evidence ?? []) insertEvidence(this.db, newId, 1, ref);
      return newId;
    });
    return this.require(id);
  }

  resolve(
    id: string,
    status: ConstraintStatus,
    evidence: EvidenceRef[],
    expectedVersion: number,
    tier?: Tier,
  ): ConstraintRecord {
    if (status === ConstraintStatus.SUPERSEDED) {
      throw new RegistryError('Use supersede to mark a constraint SUPERSEDED');
    }
    this.write(expectedVersion, version => {
      const latest = this.latest(id);
      transitionStatus(latest.status, status);
      const revision = latest.revision + 1;
      insertRevision(
        this.db, id, revision, status, tier ?? latest.tier, version,
        `${latest.status} → ${status}`,
      );
      for (const ref of evidence) insertEvidence(this.db, id, revision, ref);
    });
    return this.require(id);
  }

  supersede(oldId: string, newId: string, expectedVersion: number): ConstraintRecord {
    if (oldId === newId) throw new RegistryError(`${oldId} cannot supersede itself`);
    this.write(expectedVersion, version => {
      const latest = this.latest(oldId);
      this.latest(newId);
      if (this.chainReaches(newId, oldId)) {
        throw new RegistryError(`Superseding ${oldId} by ${newId} would create a cycle`);
      }
      transitionStatus(latest.status, ConstraintStatus.SUPERSEDED);
      insertRevision(
        this.db, oldId, latest.revision + 1, ConstraintStatus.SUPERSEDED, latest.tier, version,
        `superseded by ${newId}`,
      );
      insertSupersession(this.db, oldId, newId, version);
    });
    return this.require(oldId);
  }

  get(id: string): ConstraintRecord | null {
    const row = getConstraintRow(this.db, id);
    const latest = getLatestRevision(this.db, id);
    if (!row || !latest) return null;
    return {
      id: row.id,
      statement: row.statement,
      tier: parseTier(latest.tier),
      status: latest.status,
      evidence: listEvidence(this.db, id).map(toEvidenceRef),
      supersedes: listSupersedes(this.db, id),
      supersededBy: getSupersededBy(this.db, id),
      revision: latest.revision,
      version: latest.version,
      createdAt: row.created_at,
      updatedAt: latest.created_at,
    };
  }

  history(id: string): HistoryEntry[] {
    if (!getConstraintRow(this.db, id)) throw new RegistryError(`Unknown constraint ${id}`);
    const evidence = listEvidence(this.db, id);
    return listRevisions(this.db, id).map(rev => ({
      ...rev,
      evidence: evidence.filter(e => e.revision === rev.revision).map(toEvidenceRef),
    }));
  }

  list(): ConstraintRecord[] {
    return listConstraintRows(this.db)
      .map(row => this.get(row.id))
      .filter((r): r is ConstraintRecord => r !== null);
  }

  exportSnapshot(filter: SnapshotFilter = {}): RegistrySnapshot {
    const constraints = this.list().filter(c =>
      (filter.maxTier === undefined || c.tier <= filter.maxTier) &&
      (filter.statuses === undefined || filter.statuses.includes(c.status)),
    );
    return {
      version: this.head(),
      exportedAt: new Date().toISOString(),
      filter: { maxTier: filter.maxTier ?? null, statuses: filter.statuses ?? null },
      constraints,
    };
  }

  /** Compare-and-swap the head, then apply `fn` at the new version, atomically. */
  private write<T>(expectedVersion: number, fn: (version: number) => T): T {
    return this.db.transaction(() => {
      if (!bumpRegistryVersion(this.db, expectedVersion)) {
        throw new RegistryConflictError(expectedVersion, getRegistryVersion(this.db));
      }
      return fn(expectedVersion + 1);
    })();
  }

  private latest(id: string): ConstraintRevision {
    const rev = getLatestRevision(this.db, id);
    if (!rev) throw new RegistryError(`Unknown constraint ${id}`);
    return rev;
  }

  private require(id: string): ConstraintRecord {
    const record = this.get(id);
    if (!record) throw new RegistryError(`Unknown constraint ${id}`);
    return record;
  }

  /** Follow superseded-by links from `from`; true if `target` is on the chain. */
  private chainReaches(from: string, target: string): boolean {
    const seen = new Set<string>();
    let cur: string | null = from;
    while (cur !== null && !seen.has(cur)) {
      if (cur === target) return true;
      seen.add(cur);
      cur = getSupersededBy(this.db, cur);
    }
    return false;
  }
}

function toEvidenceRef(row: EvidenceRow): EvidenceRef {
  return {
    testId: row.test_id,
    resultId: row.result_id,
    pValue: row.p_value,
    effectSize: row.effect_size,
    sampleSize: row.sample_size,
    note: row.note,
  };
}

/**
 * Re-run `op` against a fresh head after each version conflict, up to
 * `maxRetries` times. The last conflict propagates.
 */
export function withRetry<T>(registry: Registry, op: (expectedVersion: number) => T, maxRetries: number): T {
  for (let attempt = 0; ; attempt++) {
    try {
      return op(registry.head());
    } catch (err) {
      if (!(err instanceof RegistryConflictError) || attempt >= maxRetries) throw err;
    }
  }
}

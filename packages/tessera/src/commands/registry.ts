import * as path from 'node:path';
import { z } from 'zod';
import { writeFileAtomic } from 'tessera-shared';
import type { ConstraintRecord, EvidenceRef, Tier } from '../types.js';
import { getFlagValue, positionalArgs } from '../config.js';
import { Registry, parseTier, withRetry, type SnapshotFilter } from '../registry/registry.js';
import { parseStatus } from '../state/machine.js';
import { RegistryError, TesseraError, errorMessage } from '../errors.js';
import { openProject } from './project.js';
import * as fmt from '../output/format.js';

const evidenceSchema = z.object({
  testId: z.string().nullable().default(null),
  resultId: z.number().int().nullable().default(null),
  pValue: z.number().nullable().default(null),
  effectSize: z.number().nullable().default(null),
  sampleSize: z.number().int().nullable().default(null),
  note: z.string().nullable().default(null),
});

/** `--evidence` takes one evidence object or an array of them. */
export function parseEvidence(raw: string | undefined): EvidenceRef[] {
  if (raw === undefined) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new RegistryError(`--evidence is not valid JSON: ${errorMessage(err)}`);
  }
  const result = z.union([evidenceSchema, z.array(evidenceSchema)]).safeParse(parsed);
  if (!result.success) {
    throw new RegistryError(`Invalid evidence: ${result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`);
  }
  return Array.isArray(result.data) ? result.data : [result.data];
}

/** Both `--tier<=T` and `--max-tier T`. */
export function parseMaxTier(args: string[]): Tier | undefined {
  const inline = args.find(a => a.startsWith('--tier<='));
  if (inline !== undefined) return parseTier(inline.slice('--tier<='.length));
  const flag = getFlagValue(args, '--max-tier');
  return flag === undefined ? undefined : parseTier(flag);
}

function printConstraint(c: ConstraintRecord): void {
  console.log(`  ${fmt.bold(c.id)} ${fmt.tierColor(c.tier)} ${fmt.statusColor(c.status)}  ${fmt.dim(`rev ${c.revision} @ v${c.version}`)}`);
  console.log(`  ${c.statement}`);
  if (c.supersedes.length > 0) console.log(`  ${fmt.dim(`supersedes ${c.supersedes.join(', ')}`)}`);
  if (c.supersededBy) console.log(`  ${fmt.dim(`superseded by ${c.supersededBy}`)}`);
  console.log();
}

export async function propose(args: string[], isJson: boolean): Promise<void> {
  const [statement] = positionalArgs(args, ['--tier', '--evidence']);
  const tierRaw = getFlagValue(args, '--tier');
  if (!statement || tierRaw === undefined) {
    throw new TesseraError('Usage: tessera propose "statement" --tier T [--evidence JSON]');
  }
  const tier = parseTier(tierRaw);
  const evidence = parseEvidence(getFlagValue(args, '--evidence'));
  const { config, db } = openProject();
  const registry = new Registry(db);

  const record = withRetry(registry, v => registry.propose({ statement, tier, evidence }, v), config.registry.maxRetries);
  if (isJson) {
    fmt.json(record);
    return;
  }
  fmt.success(`Proposed ${record.id}`);
  printConstraint(record);
}

export async function resolve(args: string[], isJson: boolean): Promise<void> {
  const [id, statusRaw] = positionalArgs(args, ['--tier', '--evidence']);
  if (!id || !statusRaw) {
    throw new TesseraError('Usage: tessera resolve <id> <CONFIRMED|PARTIAL|FALSIFIED> [--tier T] [--evidence JSON]');
  }
  const status = parseStatus(statusRaw);
  const tierRaw = getFlagValue(args, '--tier');
  const tier = tierRaw === undefined ? undefined : parseTier(tierRaw);
  const evidence = parseEvidence(getFlagValue(args, '--evidence'));
  const { config, db } = openProject();
  const registry = new Registry(db);

  const record = withRetry(registry, v => registry.resolve(id, status, evidence, v, tier), config.registry.maxRetries);
  if (isJson) {
    fmt.json(record);
    return;
  }
  fmt.success(`${record.id} is now ${record.status}`);
  printConstraint(record);
}

export async function supersede(args: string[], isJson: boolean): Promise<void> {
  const [oldId, newId] = positionalArgs(args);
  if (!oldId || !newId) throw new TesseraError('Usage: tessera supersede <old> <new>');
  const { config, db } = openProject();
  const registry = new Registry(db);

  const record = withRetry(registry, v => registry.supersede(oldId, newId, v), config.registry.maxRetries);
  if (isJson) {
    fmt.json(record);
    return;
  }
  fmt.success(`${oldId} superseded by ${newId}`);
  printConstraint(record);
}

export async function history(args: string[], isJson: boolean): Promise<void> {
  const [id] = positionalArgs(args);
  if (!id) throw new TesseraError('Usage: tessera history <id>');
  const { db } = openProject();
  const registry = new Registry(db);
  const entries = registry.history(id);

  if (isJson) {
    fmt.json({ constraint: registry.get(id), history: entries });
    return;
  }
  const current = registry.get(id);
  if (current) {
    fmt.header(`History — ${id}`);
    printConstraint(current);
  }
  console.log(fmt.table(
    ['Rev', 'Version', 'Status', 'Tier', 'Reason', 'Evidence', 'At'],
    entries.map(e => [
      String(e.revision),
      String(e.version),
      fmt.statusColor(e.status),
      fmt.tierColor(e.tier),
      e.reason,
      e.evidence.map(ev => ev.testId ?? ev.note ?? '?').join(', ') || '—',
      e.created_at,
    ]),
  ));
  console.log();
}

export async function exportRegistry(args: string[], isJson: boolean): Promise<void> {
  const filter: SnapshotFilter = {};
  const maxTier = parseMaxTier(args);
  if (maxTier !== undefined) filter.maxTier = maxTier;
  const statusRaw = getFlagValue(args, '--status');
  if (statusRaw !== undefined) {
    filter.statuses = statusRaw.split(',').map(s => parseStatus(s));
  }
  const out = getFlagValue(args, '--out');

  const { db } = openProject();
  const snapshot = new Registry(db).exportSnapshot(filter);
  const document = JSON.stringify(snapshot, null, 2);

  if (out === undefined) {
    console.log(document);
    return;
  }
  const file = path.resolve(out);
  writeFileAtomic(file, document);
  if (isJson) {
    fmt.json({ out: file, version: snapshot.version, constraints: snapshot.constraints.length });
    return;
  }
  fmt.success(`Exported ${snapshot.constraints.length} constraint(s) at version ${snapshot.version} to ${file}`);
}

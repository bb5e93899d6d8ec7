import * as path from 'node:path';
import type Database from 'better-sqlite3';
import { writeFileAtomic } from 'tessera-shared';
import { getDb, requireProjectRoot } from '../db/connection.js';
import { CONFIG_DIR, loadConfig, type TesseraConfig } from '../config.js';
import type { RunReport } from '../report.js';
import type { WindowType } from '../types.js';
import { ConfigurationError } from '../errors.js';
import * as fmt from '../output/format.js';

export interface Project {
  root: string;
  config: TesseraConfig;
  db: Database.Database;
}

/** Root, validated config and database. Config errors surface before any stage runs. */
export function openProject(): Project {
  const root = requireProjectRoot();
  const config = loadConfig(root);
  return { root, config, db: getDb(root) };
}

const WINDOWS: readonly WindowType[] = ['line', 'record', 'folio'];

export function parseWindow(raw: string | undefined): WindowType | undefined {
  if (raw === undefined) return undefined;
  const window = WINDOWS.find(w => w === raw);
  if (!window) throw new ConfigurationError(`--window must be one of ${WINDOWS.join(', ')}, got "${raw}"`);
  return window;
}

export function artifactPath(root: string, name: string): string {
  return path.join(root, CONFIG_DIR, 'artifacts', name);
}

export function writeArtifact(root: string, name: string, data: unknown): string {
  const file = artifactPath(root, name);
  writeFileAtomic(file, JSON.stringify(data, null, 2));
  return file;
}

/**
 * Persist the report, then print it: as a `report` key of the command's JSON
 * document, or as the closing table.
 */
export function finishReport(db: Database.Database, report: RunReport, isJson: boolean, payload: Record<string, unknown>): void {
  const runId = report.persist(db);
  if (isJson) {
    fmt.json({ ...payload, report: { runId, ...report.toJSON() } });
    return;
  }
  console.log(`\n${fmt.bold('Run report')} ${fmt.dim(`#${runId}`)}\n`);
  console.log(report.render());
  console.log();
}

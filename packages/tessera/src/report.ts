import type Database from 'better-sqlite3';
import type { TestResult, UnparseableReason } from './types.js';
import { insertRun } from './db/queries.js';
import * as fmt from './output/format.js';

export interface ReportEntry {
  label: string;
  detail: string | null;
}

export interface RunReportData {
  command: string;
  corpusVersion: string | null;
  startedAt: string;
  successes: ReportEntry[];
  exclusions: ReportEntry[];
  inconclusive: ReportEntry[];
  /** error kind → count */
  errors: Record<string, number>;
}

/**
 * What a stage-running command did. Every command that touches the corpus
 * builds one, prints it last and persists it to `runs`.
 */
export class RunReport {
  readonly startedAt = new Date().toISOString();
  corpusVersion: string | null = null;
  private readonly successes: ReportEntry[] = [];
  private readonly exclusions: ReportEntry[] = [];
  private readonly inconclusive: ReportEntry[] = [];
  private readonly errors = new Map<string, number>();

  constructor(readonly command: string) {}

  success(label: string, detail: string | null = null): void {
    this.successes.push({ label, detail });
  }

  exclude(label: string, detail: string | null = null): void {
    this.exclusions.push({ label, detail });
  }

  inconclusiveResult(label: string, detail: string | null = null): void {
    this.inconclusive.push({ label, detail });
  }

  error(kind: string, count = 1): void {
    if (count <= 0) return;
    this.errors.set(kind, (this.errors.get(kind) ?? 0) + count);
  }

  /** Unparseable tokens are recovered, but still counted by reason. */
  unparseable(counts: Record<UnparseableReason, number>): void {
    for (const [reason, n] of Object.entries(counts)) this.error(`UNPARSEABLE:${reason}`, n);
  }

  /** PASS → success, FAIL → exclusion, INCONCLUSIVE → inconclusive. */
  verdict(result: TestResult): void {
    const detail = result.reason;
    switch (result.verdict) {
      case 'PASS': this.success(result.testId, detail); break;
      case 'FAIL': this.exclude(result.testId, detail); break;
      case 'INCONCLUSIVE': this.inconclusiveResult(result.testId, detail); break;
    }
  }

  counts(): { successes: number; exclusions: number; inconclusive: number; errors: number } {
    let errors = 0;
    for (const n of this.errors.values()) errors += n;
    return {
      successes: this.successes.length,
      exclusions: this.exclusions.length,
      inconclusive: this.inconclusive.length,
      errors,
    };
  }

  toJSON(): RunReportData {
    const errors: Record<string, number> = {};
    for (const [kind, n] of [...this.errors.entries()].sort(([a], [b]) => a.localeCompare(b))) errors[kind] = n;
    return {
      command: this.command,
      corpusVersion: this.corpusVersion,
      startedAt: this.startedAt,
      successes: [...this.successes],
      exclusions: [...this.exclusions],
      inconclusive: [...this.inconclusive],
      errors,
    };
  }

  render(): string {
    const rows: string[][] = [
      ...this.successes.map(e => [fmt.green('success'), e.label, e.detail ?? '']),
      ...this.exclusions.map(e => [fmt.red('exclusion'), e.label, e.detail ?? '']),
      ...this.inconclusive.map(e => [fmt.yellow('inconclusive'), e.label, e.detail ?? '']),
      ...Object.entries(this.toJSON().errors).map(([kind, n]) => [fmt.dim('error'), kind, String(n)]),
    ];
    const c = this.counts();
    const summary =
      `${c.successes} success(es), ${c.exclusions} exclusion(s), ` +
      `${c.inconclusive} inconclusive, ${c.errors} error(s)`;
    if (rows.length === 0) return `  ${fmt.dim('Nothing to report.')}\n  ${summary}`;
    return `${fmt.table(['Outcome', 'Item', 'Detail'], rows)}\n\n  ${summary}`;
  }

  persist(db: Database.Database): number {
    return insertRun(db, this.command, this.corpusVersion, this.counts(), JSON.stringify(this.toJSON()), this.startedAt);
  }
}

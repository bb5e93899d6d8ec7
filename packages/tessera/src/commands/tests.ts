import { getFlagValue, getIntFlag, positionalArgs } from '../config.js';
import { loadPipeline } from '../pipeline.js';
import { RunReport } from '../report.js';
import { Registry } from '../registry/registry.js';
import { BATTERY, findTest } from '../harness/battery.js';
import { runBattery, runTest } from '../harness/runner.js';
import { linkResult, type LinkOutcome } from '../harness/linkage.js';
import type { TestDefinition } from '../harness/types.js';
import type { TestResult } from '../types.js';
import { TesseraError } from '../errors.js';
import { finishReport, openProject } from './project.js';
import * as fmt from '../output/format.js';

const VALUE_FLAGS = ['--shuffles', '--seed', '--constraint'];

export async function listTests(isJson: boolean): Promise<void> {
  if (isJson) {
    fmt.json(BATTERY.map(t => ({
      id: t.id,
      title: t.title,
      kind: t.kind,
      threshold: t.threshold,
      permutation: t.permutation,
      tier: t.tier,
      statement: t.statement,
    })));
    return;
  }
  fmt.header('Registered tests');
  console.log(fmt.table(
    ['ID', 'Kind', 'α', 'Min effect', 'Tier', 'Title'],
    BATTERY.map(t => [
      t.id,
      t.kind,
      String(t.threshold.alpha),
      t.threshold.minEffect === undefined ? '—' : String(t.threshold.minEffect),
      fmt.tierColor(t.tier),
      t.title,
    ]),
  ));
  console.log();
}

function requireTest(id: string): TestDefinition {
  const def = findTest(id);
  if (!def) throw new TesseraError(`Unknown test "${id}". Run \`tessera list-tests\`.`);
  return def;
}

export async function runTestCmd(args: string[], isJson: boolean): Promise<void> {
  const [id] = positionalArgs(args, VALUE_FLAGS);
  if (!id) throw new TesseraError('Usage: tessera run-test <id> [--shuffles N] [--seed S] [--constraint C###]');
  const def = requireTest(id);
  const shuffles = getIntFlag(args, '--shuffles');
  const seed = getIntFlag(args, '--seed');
  const constraint = getFlagValue(args, '--constraint') ?? null;

  const { root, config, db } = openProject();
  const pipeline = loadPipeline(root, config);
  const registry = new Registry(db);
  const report = new RunReport('run-test');
  report.corpusVersion = pipeline.corpusVersion;

  const result = await runTest(def, pipeline, db, { shuffles, seed });
  report.verdict(result);
  const link = linkResult(registry, def, result, constraint, config.registry.maxRetries);

  if (isJson) {
    finishReport(db, report, true, { result, link: linkJson(link) });
    return;
  }
  fmt.header(`${def.id} — ${def.title}`);
  printResults([{ def, result, link }]);
  finishReport(db, report, false, {});
}

export async function runTests(args: string[], isJson: boolean): Promise<void> {
  const ids = positionalArgs(args, VALUE_FLAGS);
  const defs = ids.length === 0 ? [...BATTERY] : ids.map(requireTest);
  const shuffles = getIntFlag(args, '--shuffles');
  const seed = getIntFlag(args, '--seed');

  const { root, config, db } = openProject();
  const pipeline = loadPipeline(root, config);
  const registry = new Registry(db);
  const report = new RunReport('run-tests');
  report.corpusVersion = pipeline.corpusVersion;
  report.unparseable(pipeline.decomposition().unparseable);

  if (!isJson) fmt.info(`Running ${defs.length} test(s) with ${config.harness.concurrency} worker(s)...`);
  const entries = await runBattery(defs, pipeline, db, { shuffles, seed });

  // Registry writes run one at a time, after the battery settles.
  const done: Array<{ def: TestDefinition; result: TestResult; link: LinkOutcome }> = [];
  entries.forEach((entry, i) => {
    if (entry.result === null) {
      report.error('TEST_ERROR');
      report.exclude(entry.testId, entry.error);
      return;
    }
    report.verdict(entry.result);
    const link = linkResult(registry, defs[i], entry.result, null, config.registry.maxRetries);
    done.push({ def: defs[i], result: entry.result, link });
  });

  if (isJson) {
    finishReport(db, report, true, {
      results: done.map(d => ({ ...d.result, link: linkJson(d.link) })),
      errors: entries.filter(e => e.error !== null).map(e => ({ testId: e.testId, error: e.error })),
    });
    return;
  }
  fmt.header('Test battery');
  printResults(done);
  for (const e of entries) {
    if (e.error !== null) fmt.error(`${e.testId}: ${e.error}`);
  }
  finishReport(db, report, false, {});
}

function linkJson(link: LinkOutcome): { action: string; constraint: string | null } {
  return { action: link.action, constraint: link.constraint?.id ?? null };
}

function printResults(rows: Array<{ def: TestDefinition; result: TestResult; link: LinkOutcome }>): void {
  console.log(fmt.table(
    ['Test', 'Verdict', 'Statistic', 'p', 'Effect', 'n', 'Registry'],
    rows.map(({ result, link }) => [
      result.testId,
      fmt.verdictColor(result.verdict),
      fmt.num(result.statistic),
      fmt.num(result.pValue),
      fmt.num(result.effectSize),
      result.sampleSize === null ? '—' : String(result.sampleSize),
      link.constraint ? `${link.action} ${link.constraint.id}` : '—',
    ]),
  ));
  console.log();
  for (const { result } of rows) {
    if (result.reason) console.log(`  ${fmt.dim(`${result.testId}: ${result.reason}`)}`);
  }
}

import * as fs from 'node:fs';
import * as path from 'node:path';
import { formatValidation, validateProject } from 'tessera-shared';
import { countByStatus, getRegistryVersion, listConstraintRows, listRecentRuns } from '../db/queries.js';
import { isDefaultGrammar, loadGrammar, type Grammar } from '../corpus/grammar.js';
import { ConfigurationError } from '../errors.js';
import { openProject } from './project.js';
import * as fmt from '../output/format.js';

export async function status(isJson: boolean): Promise<void> {
  const { root, config, db } = openProject();

  const head = getRegistryVersion(db);
  const counts = countByStatus(db);
  const constraintCount = listConstraintRows(db).length;
  const runs = listRecentRuns(db, 5);

  let grammar: Grammar | null = null;
  try {
    grammar = loadGrammar(config, root);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
  }
  const corpusPath = path.resolve(root, config.corpus.path);
  const checks = validateProject({
    corpusPath: config.corpus.path,
    hasCorpus: fs.existsSync(corpusPath),
    grammarVersion: grammar?.version ?? null,
    grammarIsDefault: grammar !== null && isDefaultGrammar(grammar),
    window: config.graph.window,
    alternativeWindow: config.robustness.alternativeWindow,
    registryVersion: head,
    constraintCount,
    permutationShuffles: config.permutation.shuffles,
  });

  if (isJson) {
    fmt.json({
      project: config.project.name,
      registry: { version: head, constraints: constraintCount, byStatus: counts },
      runs: runs.map(r => ({
        id: r.id,
        command: r.command,
        corpusVersion: r.corpus_version,
        successes: r.successes,
        exclusions: r.exclusions,
        inconclusive: r.inconclusive,
        finishedAt: r.finished_at,
      })),
      checks,
    });
    return;
  }

  fmt.header(`Status${config.project.name ? ` — ${config.project.name}` : ''}`);
  console.log(`  ${fmt.bold('Registry version:')} ${head}  ${fmt.dim(`(${constraintCount} constraint(s))`)}\n`);

  if (counts.length > 0) {
    console.log(fmt.table(
      ['Tier', 'Status', 'Count'],
      counts.map(c => [fmt.tierColor(c.tier), fmt.statusColor(c.status), String(c.n)]),
    ));
    console.log();
  }

  if (runs.length === 0) {
    console.log(`  ${fmt.dim('No runs yet.')}\n`);
  } else {
    console.log(fmt.table(
      ['Run', 'Command', 'Corpus', 'Pass', 'Excl', 'Inconcl', 'Finished'],
      runs.map(r => [
        String(r.id),
        r.command,
        r.corpus_version ?? '—',
        fmt.green(String(r.successes)),
        fmt.red(String(r.exclusions)),
        fmt.yellow(String(r.inconclusive)),
        r.finished_at,
      ]),
    ));
    console.log();
  }

  console.log(formatValidation(checks));
  console.log();
}

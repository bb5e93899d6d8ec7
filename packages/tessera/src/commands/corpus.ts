import { positionalArgs } from '../config.js';
import { loadPipeline } from '../pipeline.js';
import { RunReport } from '../report.js';
import { finishReport, openProject, writeArtifact } from './project.js';
import * as fmt from '../output/format.js';

export async function decompose(args: string[], isJson: boolean): Promise<void> {
  const { root, config, db } = openProject();
  const [corpusPath] = positionalArgs(args);
  const pipeline = loadPipeline(root, config, { corpusPath });
  const report = new RunReport('decompose');
  report.corpusVersion = pipeline.corpusVersion;

  const decomposition = pipeline.decomposition();
  const index = pipeline.index();
  const summary = index.summary();
  report.unparseable(decomposition.unparseable);
  report.success('decomposition', `${decomposition.parsed}/${summary.tokens} tokens parsed`);

  const artifact = writeArtifact(root, `index-${pipeline.corpusVersion}.json`, {
    grammar: pipeline.grammar.version,
    ...index.snapshot(),
  });
  report.success('index', `${summary.middleTypes} MIDDLE types → ${artifact}`);

  const unparseable = Object.entries(decomposition.unparseable).filter(([, n]) => n > 0);
  if (isJson) {
    finishReport(db, report, true, { summary, grammar: pipeline.grammar.version, unparseable: decomposition.unparseable, artifact });
    return;
  }

  fmt.header(`Decompose — corpus ${pipeline.corpusVersion}`);
  console.log(`  ${fmt.bold('Grammar:')} ${pipeline.grammar.version}`);
  console.log(`  ${fmt.bold('Tokens:')} ${summary.tokens} (${summary.parsed} parsed, ${summary.unparseable} unparseable)`);
  console.log(`  ${fmt.bold('MIDDLE types:')} ${summary.middleTypes}`);
  console.log(`  ${fmt.bold('Lines / folios:')} ${summary.lines} / ${summary.folios}`);
  console.log(`  ${fmt.bold('Sections:')} ${summary.sections.join(', ') || '—'}\n`);
  if (unparseable.length > 0) {
    console.log(fmt.table(['Reason', 'Count'], unparseable.map(([reason, n]) => [reason, String(n)])));
    console.log();
  }
  finishReport(db, report, false, {});
}

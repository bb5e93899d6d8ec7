import { loadPipeline } from '../pipeline.js';
import { RunReport } from '../report.js';
import { ClassConfidence } from '../state/types.js';
import { finishReport, openProject } from './project.js';
import * as fmt from '../output/format.js';

export async function classifyCmd(_args: string[], isJson: boolean): Promise<void> {
  const { root, config, db } = openProject();
  const pipeline = loadPipeline(root, config);
  const report = new RunReport('classify');
  report.corpusVersion = pipeline.corpusVersion;
  report.unparseable(pipeline.decomposition().unparseable);

  const result = pipeline.classification();
  for (const cls of result.classes) {
    if (cls.confidence === ClassConfidence.AMBIGUOUS) {
      report.inconclusiveResult(`class ${cls.id}`, 'ambiguous role');
    }
  }
  const resolved = result.classes.filter(c => c.role !== null).length;
  report.success('classes', `${resolved}/${result.classes.length} with a role`);
  report.success('hazards', `${result.forbidden.length} forbidden transition(s)`);
  if (result.clustering.note) report.inconclusiveResult('clustering', result.clustering.note);

  if (isJson) {
    finishReport(db, report, true, {
      classes: result.classes,
      clustering: {
        k: result.clustering.k,
        silhouette: result.clustering.silhouette,
        tried: result.clustering.tried,
        clustered: result.clustering.clustered,
        note: result.clustering.note,
      },
      transitions: result.transitions,
      forbidden: result.forbidden,
      profiles: result.profiles,
    });
    return;
  }

  fmt.header('Instruction classes');
  console.log(fmt.table(
    ['Class', 'Tokens', 'Members', 'Role', 'Confidence', 'Hazard'],
    result.classes.map(c => [
      c.id,
      String(c.frequency),
      String(c.members.length),
      c.role ?? '—',
      fmt.confidenceColor(c.confidence),
      c.hazard ? fmt.red('yes') : '',
    ]),
  ));
  console.log();

  const cl = result.clustering;
  if (cl.k !== null) {
    console.log(`  ${fmt.bold('Clustering:')} k = ${cl.k}, silhouette ${fmt.num(cl.silhouette)} over ${cl.clustered.length} class(es)\n`);
  }

  if (result.forbidden.length === 0) {
    console.log(`  ${fmt.dim('No forbidden transitions.')}\n`);
  } else {
    console.log(fmt.table(
      ['From', 'To', 'Expected', 'p', 'Category'],
      result.forbidden.map(t => [t.from, t.to, fmt.num(t.expected, 2), fmt.num(t.pValue), t.category ?? '—']),
    ));
    console.log();
  }

  console.log(fmt.table(
    ['Folio', 'Section', 'Regime', 'Tokens', 'Hazard', 'Escape', 'Diversity'],
    result.profiles.map(p => [
      p.id, p.section, p.regime, String(p.tokenCount),
      fmt.num(p.hazardDensity), fmt.num(p.escapeDensity), fmt.num(p.middleDiversity),
    ]),
  ));
  console.log();
  finishReport(db, report, false, {});
}

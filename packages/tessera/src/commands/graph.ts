import { getFlagValue } from '../config.js';
import { loadPipeline } from '../pipeline.js';
import { RunReport } from '../report.js';
import { robustnessReport } from '../graph/builder.js';
import { finishReport, openProject, parseWindow, writeArtifact } from './project.js';
import * as fmt from '../output/format.js';

const MAX_ROWS = 20;

export async function buildGraphCmd(args: string[], isJson: boolean): Promise<void> {
  const { root, config, db } = openProject();
  const window = parseWindow(getFlagValue(args, '--window'));
  const pipeline = loadPipeline(root, config, { window });
  const report = new RunReport('build-graph');
  report.corpusVersion = pipeline.corpusVersion;
  report.unparseable(pipeline.decomposition().unparseable);

  const graph = pipeline.graph();
  const analysis = pipeline.analysis();
  const robustness = robustnessReport(graph);

  if (robustness.passed) {
    report.success('edge stability', `agreement ${fmt.num(robustness.agreement)}`);
  } else {
    report.exclude('edge stability', robustness.error);
  }
  report.success('connectivity', `${analysis.connectivity.components} component(s)`);
  report.success('hubs', `${analysis.hubs.hubs.length} hub(s)`);
  if (analysis.coverage.rationingRatio === null) {
    report.inconclusiveResult('rationing', analysis.coverage.rationingNote);
  } else {
    report.success('rationing', `ratio ${fmt.num(analysis.coverage.rationingRatio)}`);
  }

  const artifact = writeArtifact(root, `graph-${pipeline.corpusVersion}-${graph.options.window}.json`, {
    options: graph.options,
    agreement: graph.agreement,
    nodes: graph.nodes,
    edges: graph.edges,
  });

  const edgeSummary = {
    window: graph.options.window,
    alternativeWindow: graph.options.alternativeWindow,
    nodes: graph.nodes.length,
    rawEdges: graph.edges.length,
    legalEdges: graph.legalEdges().length,
    trustedEdges: graph.trustedEdges().length,
    unstableEdges: robustness.unstableEdges.length,
    density: graph.density(),
    agreement: graph.agreement,
  };

  if (isJson) {
    finishReport(db, report, true, { edges: edgeSummary, ...analysis, artifact });
    return;
  }

  fmt.header(`Compatibility graph — ${graph.options.window} window`);
  console.log(`  ${fmt.bold('Nodes:')} ${edgeSummary.nodes}`);
  console.log(`  ${fmt.bold('Edges:')} ${edgeSummary.legalEdges} legal, ${edgeSummary.trustedEdges} trusted, ${edgeSummary.unstableEdges} unstable (density ${fmt.num(edgeSummary.density)})`);
  console.log(`  ${fmt.bold('Agreement:')} ${fmt.num(graph.agreement)} vs ${graph.options.alternativeWindow} (gate ${graph.options.minAgreement})\n`);

  const c = analysis.connectivity;
  console.log(`  ${fmt.bold('Components:')} ${c.components}, giant ${c.giantSize} (${fmt.num(c.giantFraction * 100, 1)}%), ${c.isolates} isolate(s)`);
  console.log(`  ${fmt.bold('Without hubs:')} ${analysis.hubs.componentsWithoutHubs} component(s)\n`);

  if (analysis.hubs.candidates.length > 0) {
    const rows = [...analysis.hubs.candidates]
      .sort((a, b) => b.degree - a.degree)
      .slice(0, MAX_ROWS)
      .map(h => [h.id, String(h.degree), fmt.num(h.z, 2), String(h.percolation), h.hub ? fmt.green('hub') : fmt.dim('candidate')]);
    console.log(fmt.table(['MIDDLE', 'Degree', 'z', 'Percolation', ''], rows));
    console.log();
  }

  const cov = analysis.coverage;
  console.log(`  ${fmt.bold('Coverage:')} ${cov.covered}/${cov.contexts} contexts with ${cov.baseline.length} MIDDLE(s)`);
  console.log(`  ${fmt.bold('Hub fraction:')} baseline ${fmt.num(cov.baselineHubFraction)}, observed ${fmt.num(cov.observedHubFraction)}, ratio ${fmt.num(cov.rationingRatio)}`);
  if (analysis.tailActivation !== null) {
    console.log(`  ${fmt.bold('Tail activation:')} ${fmt.num(analysis.tailActivation)}`);
  }
  fmt.info(`Edge table written to ${artifact}`);
  finishReport(db, report, false, {});
}

export async function validateRobustnessCmd(args: string[], isJson: boolean): Promise<void> {
  const { root, config, db } = openProject();
  const window = parseWindow(getFlagValue(args, '--window'));
  const pipeline = loadPipeline(root, config, { window });
  const report = new RunReport('validate-robustness');
  report.corpusVersion = pipeline.corpusVersion;

  const robustness = robustnessReport(pipeline.graph());
  if (robustness.passed) {
    report.success('edge stability', `agreement ${fmt.num(robustness.agreement)} ≥ ${robustness.required}`);
  } else {
    report.exclude('edge stability', robustness.error);
  }

  if (isJson) {
    finishReport(db, report, true, { robustness });
    return;
  }

  fmt.header('Edge robustness');
  console.log(`  ${fmt.bold('Windows:')} ${robustness.window} vs ${robustness.alternativeWindow}`);
  console.log(`  ${fmt.bold('Agreement:')} ${fmt.num(robustness.agreement)} (gate ${robustness.required})`);
  console.log(`  ${fmt.bold('Legal edges:')} ${robustness.legalEdges}, unstable ${robustness.unstableEdges.length}`);
  console.log(`  ${fmt.bold('Gate:')} ${robustness.passed ? fmt.green('passed') : fmt.red('failed')}\n`);
  if (robustness.unstableEdges.length > 0) {
    const rows = robustness.unstableEdges.slice(0, MAX_ROWS).map(e => [
      e.a, e.b, String(e.count), String(e.altCount),
      e.legal ? 'legal' : '—', e.altLegal ? 'legal' : '—',
    ]);
    console.log(fmt.table(['A', 'B', 'Count', 'Alt count', robustness.window, robustness.alternativeWindow], rows));
    console.log();
  }
  finishReport(db, report, false, {});
}

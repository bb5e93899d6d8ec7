import * as path from 'node:path';
import type { CorpusRecord, WindowType } from './types.js';
import type { TesseraConfig } from './config.js';
import { loadGrammar, type Grammar } from './corpus/grammar.js';
import { readCorpus } from './corpus/reader.js';
import { decomposeStream, type DecompositionSummary } from './corpus/decompose.js';
import { CorpusIndex } from './corpus/corpusIndex.js';
import { buildGraph, graphOptions, type CompatibilityGraph } from './graph/builder.js';
import { analyzeGraph, type GraphAnalysis } from './graph/analyzer.js';
import { classificationOptions, classify, type ClassificationResult } from './classify/engine.js';

/**
 * Reader → decomposer → index → graph → analyzer → classification. Each
 * stage is computed on first use and memoised; later stages only read the
 * earlier ones, so a single instance can be shared by concurrent tests.
 */
export class Pipeline {
  private _decomposition: DecompositionSummary | null = null;
  private _index: CorpusIndex | null = null;
  private _graph: CompatibilityGraph | null = null;
  private _analysis: GraphAnalysis | null = null;
  private _classification: ClassificationResult | null = null;

  constructor(
    readonly config: TesseraConfig,
    readonly grammar: Grammar,
    readonly records: readonly CorpusRecord[],
    readonly corpusVersion: string,
    readonly window: WindowType = config.graph.window,
  ) {}

  static load(projectRoot: string, config: TesseraConfig, overrides: { corpusPath?: string; window?: WindowType } = {}): Pipeline {
    const grammar = loadGrammar(config, projectRoot);
    const corpusPath = path.resolve(projectRoot, overrides.corpusPath ?? config.corpus.path);
    const corpus = readCorpus(corpusPath, { format: config.corpus.format, delimiter: config.corpus.delimiter });
    return new Pipeline(config, grammar, corpus.records, corpus.version, overrides.window);
  }

  decomposition(): DecompositionSummary {
    if (!this._decomposition) this._decomposition = decomposeStream(this.records, this.grammar);
    return this._decomposition;
  }

  index(): CorpusIndex {
    if (!this._index) {
      const index = new CorpusIndex(this.config.index.positionBins, this.config.graph.recordSize);
      index.ingest(this.decomposition().tokens, this.corpusVersion);
      this._index = index;
    }
    return this._index;
  }

  graph(): CompatibilityGraph {
    if (!this._graph) this._graph = buildGraph(this.index(), graphOptions(this.config, this.window));
    return this._graph;
  }

  analysis(): GraphAnalysis {
    if (!this._analysis) this._analysis = analyzeGraph(this.graph(), this.index(), this.config.hubs);
    return this._analysis;
  }

  classification(): ClassificationResult {
    if (!this._classification) this._classification = classify(this.index(), classificationOptions(this.config));
    return this._classification;
  }
}

export function loadPipeline(
  projectRoot: string,
  config: TesseraConfig,
  overrides: { corpusPath?: string; window?: WindowType } = {},
): Pipeline {
  return Pipeline.load(projectRoot, config, overrides);
}

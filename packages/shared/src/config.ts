export interface ConfigTemplateAnswers {
  name: string;
  corpusPath: string;
  window?: 'line' | 'record' | 'folio';
  seed?: number;
}

export interface ClassPattern { id: string; patterns: string[] }
export interface RoleRule { role: string; prefixes?: string[]; middles?: string[]; suffixes?: string[] }
export interface HazardCategoryRule { fromRole: string; toRole: string; category: string }

const noClasses: ClassPattern[] = [];
const noRoleRules: RoleRule[] = [];
const noEscapeRoles: string[] = [];
const noCategories: HazardCategoryRule[] = [];
const grammarPath: string | null = null;
const kRange: [number, number] = [2, 6];

export const DEFAULT_CONFIG = {
  project: {
    name: '',
    description: '',
  },
  corpus: {
    path: 'data/corpus.csv',
    format: 'auto',
    delimiter: ',',
  },
  grammar: {
    path: grammarPath,
  },
  index: {
    positionBins: 5,
  },
  graph: {
    window: 'line',
    recordSize: 3,
    minCount: 1,
  },
  robustness: {
    alternativeWindow: 'record',
    minAgreement: 0.9,
  },
  hubs: {
    degreeZ: 2,
    percolationThreshold: 1,
  },
  classification: {
    classes: noClasses,
    minClassFrequency: 5,
    roleRules: noRoleRules,
    ruleAgreement: 0.8,
    kRange,
    minSilhouette: 0.25,
    stabilityThreshold: 0.8,
    escapeRoles: noEscapeRoles,
  },
  hazards: {
    alpha: 0.01,
    minExpected: 5,
    shuffles: 200,
    categories: noCategories,
  },
  permutation: {
    shuffles: 1000,
    seed: 1,
    checkpointEvery: 100,
  },
  harness: {
    concurrency: 4,
    timeoutMs: 120_000,
    minSampleSize: 10,
  },
  registry: {
    maxRetries: 3,
  },
};

export type DefaultConfig = typeof DEFAULT_CONFIG;

export function configTemplate(answers: ConfigTemplateAnswers): string {
  return JSON.stringify({
    project: {
      name: answers.name,
      description: '',
    },
    corpus: {
      ...DEFAULT_CONFIG.corpus,
      path: answers.corpusPath,
    },
    graph: {
      ...DEFAULT_CONFIG.graph,
      window: answers.window ?? DEFAULT_CONFIG.graph.window,
    },
    robustness: {
      ...DEFAULT_CONFIG.robustness,
      alternativeWindow: answers.window === 'record' ? 'line' : DEFAULT_CONFIG.robustness.alternativeWindow,
    },
    hubs: { ...DEFAULT_CONFIG.hubs },
    permutation: {
      ...DEFAULT_CONFIG.permutation,
      seed: answers.seed ?? DEFAULT_CONFIG.permutation.seed,
    },
    harness: { ...DEFAULT_CONFIG.harness },
    registry: { ...DEFAULT_CONFIG.registry },
  }, null, 2);
}

import type { FolioProfile, InstructionClass, Transition } from '../types.js';
import type { TesseraConfig } from '../config.js';
import type { CorpusIndex, LineView } from '../corpus/corpusIndex.js';
import { ClassConfidence } from '../state/types.js';
import { transitionConfidence } from '../state/machine.js';
import { Rng } from '../stats/random.js';
import { buildClasses, type ClassTable } from './classes.js';
import { firstAgreeingRule, ruleAgreement, type RoleRule } from './rules.js';
import { classFeatures } from './features.js';
import { chooseK, kmeans, type ClusterChoice } from './kmeans.js';
import { forbiddenTransitions, type ClassSequence } from './hazards.js';
import { folioProfiles } from './profiles.js';

export interface ClusteringSummary {
  k: number | null;
  silhouette: number | null;
  tried: ClusterChoice['tried'];
  clustered: string[];
  /** Feature vectors and labels of the clustered classes, in `clustered` order. */
  points: number[][];
  labels: number[];
  note: string | null;
}

export interface ClassificationResult {
  classes: InstructionClass[];
  table: ClassTable;
  clustering: ClusteringSummary;
  transitions: Transition[];
  forbidden: Transition[];
  profiles: FolioProfile[];
}

export interface ClassificationOptions {
  classification: TesseraConfig['classification'];
  hazards: TesseraConfig['hazards'];
  positionBins: number;
  seed: number;
}

export function classificationOptions(config: TesseraConfig): ClassificationOptions {
  return {
    classification: config.classification,
    hazards: config.hazards,
    positionBins: config.index.positionBins,
    seed: config.permutation.seed,
  };
}

/** Folios split into two context halves by alternating order. */
export function splitHalves(index: CorpusIndex): [Set<string>, Set<string>] {
  const a = new Set<string>();
  const b = new Set<string>();
  index.folios().forEach((f, i) => (i % 2 === 0 ? a : b).add(f.id));
  return [a, b];
}

export function classify(index: CorpusIndex, options: ClassificationOptions): ClassificationResult {
  const opts = options.classification;
  const parsed = index.parsedTokens();
  const table = buildClasses(parsed, opts);
  const occurrences = table.occurrences(parsed);
  const halves = splitHalves(index);
  const halfTokens = halves.map(h => parsed.filter(t => h.has(t.folioId)));
  const halfLines = halves.map(h => index.lines().filter(l => h.has(l.folio)));

  // Stage 1: rules
  const assignedRule = new Map<string, RoleRule>();
  for (const cls of table.classes) {
    const rule = firstAgreeingRule(occurrences.get(cls.id) ?? [], opts.roleRules, opts.ruleAgreement);
    if (!rule) continue;
    cls.role = rule.role;
    cls.confidence = transitionConfidence(cls.confidence, ClassConfidence.RULE_ASSIGNED);
    assignedRule.set(cls.id, rule);
  }

  // Stage 2: clustering of whatever the rules left
  const unresolved = table.classes.filter(c => c.role === null).map(c => c.id);
  const clustering = clusterUnresolved(unresolved, index.lines(), halfLines, table, options);

  // Cross-context stability
  for (const cls of table.classes) {
    if (cls.confidence === ClassConfidence.RULE_ASSIGNED) {
      const rule = assignedRule.get(cls.id);
      if (!rule) continue;
      const holds = halfTokens.every(tokens => {
        const inHalf = tokens.filter(t => table.classOf(t.raw) === cls.id);
        return ruleAgreement(inHalf, rule) >= opts.ruleAgreement;
      });
      if (holds) cls.confidence = transitionConfidence(cls.confidence, ClassConfidence.VALIDATED);
    } else if (cls.confidence === ClassConfidence.CLUSTER_ASSIGNED && clustering.validated.has(cls.id)) {
      cls.confidence = transitionConfidence(cls.confidence, ClassConfidence.VALIDATED);
    }
  }

  // Forbidden transitions
  const seqs: ClassSequence[] = index.lines().map(line => classSequence(line, table));
  const transitions = forbiddenTransitions(seqs, id => table.roleOf(id), options.hazards, new Rng(options.seed));
  const forbidden = transitions.filter(t => t.forbidden);
  const hazardClasses = new Set(forbidden.flatMap(t => [t.from, t.to]));
  for (const cls of table.classes) cls.hazard = hazardClasses.has(cls.id);

  const escapeClasses = new Set(
    table.classes.filter(c => c.role !== null && opts.escapeRoles.includes(c.role)).map(c => c.id),
  );

  return {
    classes: table.classes,
    table,
    clustering: clustering.summary,
    transitions,
    forbidden,
    profiles: folioProfiles(index, raw => table.classOf(raw), hazardClasses, escapeClasses),
  };
}

export function classSequence(line: LineView, table: ClassTable): Array<string | null> {
  return line.tokens.map(t => (t.kind === 'parsed' ? table.classOf(t.raw) : null));
}

function clusterUnresolved(
  ids: string[],
  lines: readonly LineView[],
  halfLines: LineView[][],
  table: ClassTable,
  options: ClassificationOptions,
): { summary: ClusteringSummary; validated: Set<string> } {
  const opts = options.classification;
  const validated = new Set<string>();
  const ambiguous = (note: string, choice: ClusterChoice | null): { summary: ClusteringSummary; validated: Set<string> } => {
    for (const id of ids) {
      const cls = table.get(id);
      if (cls) cls.confidence = transitionConfidence(cls.confidence, ClassConfidence.AMBIGUOUS);
    }
    return {
      summary: {
        k: choice?.k ?? null,
        silhouette: choice?.silhouette ?? null,
        tried: choice?.tried ?? [],
        clustered: [],
        points: [],
        labels: [],
        note,
      },
      validated,
    };
  };

  if (ids.length === 0) {
    return { summary: { k: null, silhouette: null, tried: [], clustered: [], points: [], labels: [], note: null }, validated };
  }
  if (ids.length < 3) return ambiguous(`${ids.length} unresolved class(es); too few to cluster`, null);

  // Feature snapshots are taken before any cluster role exists.
  const full = classFeatures(ids, lines, table, options.positionBins);
  const halves = halfLines.map(h => classFeatures(ids, h, table, options.positionBins));
  const points = ids.map(id => full.get(id) ?? []);

  const choice = chooseK(points, opts.kRange, new Rng(options.seed));
  if (!choice) return ambiguous('no usable clustering in kRange', null);
  if (choice.silhouette < opts.minSilhouette) {
    return ambiguous(
      `best silhouette ${choice.silhouette.toFixed(3)} below ${opts.minSilhouette}`,
      choice,
    );
  }

  ids.forEach((id, i) => {
    const cls = table.get(id);
    if (!cls) return;
    cls.role = `cluster-${choice.labels[i] + 1}`;
    cls.confidence = transitionConfidence(cls.confidence, ClassConfidence.CLUSTER_ASSIGNED);
  });

  const halfLabels = halves.map(h => kmeans(ids.map(id => h.get(id) ?? []), choice.k, new Rng(options.seed)));
  ids.forEach((id, i) => {
    const stable = halfLabels.every(labels => coMembershipAgreement(i, choice.labels, labels) >= opts.stabilityThreshold);
    if (stable) validated.add(id);
  });

  return {
    summary: {
      k: choice.k,
      silhouette: choice.silhouette,
      tried: choice.tried,
      clustered: ids,
      points,
      labels: choice.labels,
      note: null,
    },
    validated,
  };
}

/** Share of other points whose same-cluster relation to point `i` matches between two labelings. */
export function coMembershipAgreement(i: number, a: readonly number[], b: readonly number[]): number {
  let agree = 0;
  let total = 0;
  for (let j = 0; j < a.length; j++) {
    if (j === i) continue;
    total++;
    if ((a[i] === a[j]) === (b[i] === b[j])) agree++;
  }
  return total === 0 ? 1 : agree / total;
}


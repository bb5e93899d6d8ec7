import type { ClassConfidence, ConstraintStatus } from './state/types.js';

// ── Corpus ────────────────────────────────────────────────────

/** One row of the external transcription table. */
export interface CorpusRecord {
  token: string;
  folio: string;
  line: string;
  section: string;
  regime: string;
}

export type UnparseableReason =
  | 'EMPTY_TOKEN'
  | 'REJECTED_CHARACTER'
  | 'EMPTY_MIDDLE'
  | 'AMBIGUOUS_SPLIT'
  | 'UNKNOWN_AFFIX';

interface TokenContext {
  raw: string;
  position: number;      // index within its line, counting unparseable tokens
  lineLength: number;
  lineId: string;        // `${folio}.${line}`
  folioId: string;
  section: string;
  regime: string;
}

export interface ParsedToken extends TokenContext {
  kind: 'parsed';
  prefix: string | null;
  middle: string;
  suffix: string | null;
}

export interface UnparseableToken extends TokenContext {
  kind: 'unparseable';
  reason: UnparseableReason;
}

export type DecomposedToken = ParsedToken | UnparseableToken;

export type WindowType = 'line' | 'record' | 'folio';

// ── Index ─────────────────────────────────────────────────────

export interface MiddleType {
  id: string;
  frequency: number;
  positional: number[];                 // fixed-width bins over relative line position
  sectionCounts: Record<string, number>;
  regimeCounts: Record<string, number>;
  folioCount: number;
  lineInitial: number;
  lineFinal: number;
  role: string | null;
  hub: boolean;
}

// ── Graph ─────────────────────────────────────────────────────

export type EdgeStability = 'STABLE' | 'UNSTABLE';

export interface CompatibilityEdge {
  a: string;              // a < b
  b: string;
  count: number;
  altCount: number;
  legal: boolean;
  altLegal: boolean;
  stability: EdgeStability;
}

// ── Classification ────────────────────────────────────────────

export interface InstructionClass {
  id: string;
  patterns: string[];
  members: string[];       // token types
  frequency: number;
  role: string | null;
  confidence: ClassConfidence;
  hazard: boolean;
}

export const HAZARD_CATEGORIES = [
  'PHASE_ORDERING',
  'COMPOSITION_JUMP',
  'CONTAINMENT_TIMING',
  'RATE_MISMATCH',
  'ENERGY_OVERSHOOT',
  'UNSPECIFIED',
] as const;

export type HazardCategory = typeof HAZARD_CATEGORIES[number];

export interface Transition {
  from: string;
  to: string;
  observed: number;
  expected: number;
  pValue: number | null;
  forbidden: boolean;
  category: HazardCategory | null;
}

export interface FolioProfile {
  id: string;
  section: string;
  regime: string;
  tokenCount: number;
  unparseableCount: number;
  hazardDensity: number;
  escapeDensity: number;
  middleDiversity: number;
}

// ── Registry ──────────────────────────────────────────────────

export type Tier = 0 | 1 | 2 | 3 | 4;

export interface EvidenceRef {
  testId: string | null;
  resultId: number | null;
  pValue: number | null;
  effectSize: number | null;
  sampleSize: number | null;
  note: string | null;
}

export interface ConstraintRecord {
  id: string;
  statement: string;
  tier: Tier;
  status: ConstraintStatus;
  evidence: EvidenceRef[];
  supersedes: string[];
  supersededBy: string | null;
  revision: number;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface ConstraintRevision {
  constraint_id: string;
  revision: number;
  status: ConstraintStatus;
  tier: number;
  version: number;
  reason: string;
  created_at: string;
}

// ── Harness ───────────────────────────────────────────────────

export type Verdict = 'PASS' | 'FAIL' | 'INCONCLUSIVE';

export interface Threshold {
  alpha: number;
  minEffect?: number;
  minSample?: number;
}

export interface TestOutcome {
  statistic: number;
  pValue: number | null;
  effectSize: number | null;
  sampleSize: number;
  details?: Record<string, unknown>;
}

export interface TestResult {
  id: number;
  testId: string;
  verdict: Verdict;
  statistic: number | null;
  pValue: number | null;
  effectSize: number | null;
  sampleSize: number | null;
  threshold: Threshold;
  reason: string | null;
  seed: number | null;
  shuffles: number | null;
  corpusVersion: string;
  createdAt: string;
}

import type {
  CorpusRecord,
  DecomposedToken,
  ParsedToken,
  UnparseableReason,
} from '../types.js';
import type { Grammar } from './grammar.js';
import { ParseError } from '../errors.js';

export interface Split {
  prefix: string | null;
  middle: string;
  suffix: string | null;
}

export type SplitResult =
  | { ok: true; split: Split }
  | { ok: false; reason: UnparseableReason };

/**
 * Decompose one token into PREFIX? MIDDLE SUFFIX?.
 *
 * Every split that leaves a middle of at least `minMiddleLength` is a
 * candidate. The longest prefix wins, then the longest suffix on the
 * remainder; an affix that would leave too short a middle is skipped in
 * favour of the next one. Remaining ties go to the grammar's priority ranks,
 * then to lexicographic order. Only identical candidates are AMBIGUOUS_SPLIT.
 */
export function decompose(raw: string, grammar: Grammar): SplitResult {
  if (raw.length === 0) return { ok: false, reason: 'EMPTY_TOKEN' };
  if (grammar.reject && grammar.reject.test(raw)) return { ok: false, reason: 'REJECTED_CHARACTER' };
  if (grammar.prefixes.includes(raw) || grammar.suffixes.includes(raw)) {
    return { ok: false, reason: 'EMPTY_MIDDLE' };
  }

  const candidates = candidateSplits(raw, grammar);
  if (candidates.length === 0) return { ok: false, reason: 'EMPTY_MIDDLE' };

  candidates.sort((x, y) => compareSplits(x, y, grammar));
  const [best, runnerUp] = candidates;
  if (runnerUp && compareSplits(best, runnerUp, grammar) === 0) {
    return { ok: false, reason: 'AMBIGUOUS_SPLIT' };
  }
  if (grammar.requireAffix && best.prefix === null && best.suffix === null) {
    return { ok: false, reason: 'UNKNOWN_AFFIX' };
  }
  return { ok: true, split: best };
}

/** Single-token form of `decompose` for callers without a recovery path. */
export function parseToken(raw: string, grammar: Grammar): Split {
  const result = decompose(raw, grammar);
  if (!result.ok) throw new ParseError(raw, result.reason);
  return result.split;
}

/** Inverse of decompose for a parsed token. */
export function recompose(split: Split): string {
  return `${split.prefix ?? ''}${split.middle}${split.suffix ?? ''}`;
}

function candidateSplits(raw: string, grammar: Grammar): Split[] {
  const out: Split[] = [];
  const prefixes: Array<string | null> = [null, ...grammar.prefixes.filter(p => raw.startsWith(p))];
  for (const prefix of prefixes) {
    const rest = prefix ? raw.slice(prefix.length) : raw;
    const suffixes: Array<string | null> = [null, ...grammar.suffixes.filter(s => rest.endsWith(s))];
    for (const suffix of suffixes) {
      const middle = suffix ? rest.slice(0, rest.length - suffix.length) : rest;
      if (middle.length >= grammar.minMiddleLength) {
        out.push({ prefix, middle, suffix });
      }
    }
  }
  return out;
}

function rankVector(s: Split, grammar: Grammar): number[] {
  const ranks: number[] = [];
  for (const affix of [s.prefix, s.suffix]) {
    if (affix !== null) ranks.push(grammar.rank.get(affix) ?? Number.MAX_SAFE_INTEGER);
  }
  return ranks.sort((a, b) => a - b);
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Negative when `x` is preferred. */
function compareSplits(x: Split, y: Split, grammar: Grammar): number {
  const byPrefix = (y.prefix?.length ?? 0) - (x.prefix?.length ?? 0);
  if (byPrefix !== 0) return byPrefix;
  const bySuffix = (y.suffix?.length ?? 0) - (x.suffix?.length ?? 0);
  if (bySuffix !== 0) return bySuffix;
  const rx = rankVector(x, grammar);
  const ry = rankVector(y, grammar);
  for (let i = 0; i < Math.min(rx.length, ry.length); i++) {
    if (rx[i] !== ry[i]) return rx[i] - ry[i];
  }
  if (rx.length !== ry.length) return ry.length - rx.length;
  return compareText(x.prefix ?? '', y.prefix ?? '') || compareText(x.suffix ?? '', y.suffix ?? '');
}

export interface DecompositionSummary {
  tokens: DecomposedToken[];
  parsed: number;
  unparseable: Record<UnparseableReason, number>;
}

/**
 * Decompose a record stream. Records keep their input order within a line;
 * positions count every token, so unparseable tokens still occupy a slot.
 */
export function decomposeStream(records: readonly CorpusRecord[], grammar: Grammar): DecompositionSummary {
  const lines = new Map<string, CorpusRecord[]>();
  for (const r of records) {
    const lineId = `${r.folio}.${r.line}`;
    const bucket = lines.get(lineId);
    if (bucket) bucket.push(r);
    else lines.set(lineId, [r]);
  }

  const tokens: DecomposedToken[] = [];
  const unparseable: Record<UnparseableReason, number> = {
    EMPTY_TOKEN: 0,
    REJECTED_CHARACTER: 0,
    EMPTY_MIDDLE: 0,
    AMBIGUOUS_SPLIT: 0,
    UNKNOWN_AFFIX: 0,
  };
  let parsed = 0;

  for (const [lineId, lineRecords] of lines) {
    lineRecords.forEach((r, position) => {
      const context = {
        raw: r.token,
        position,
        lineLength: lineRecords.length,
        lineId,
        folioId: r.folio,
        section: r.section,
        regime: r.regime,
      };
      const result = decompose(r.token, grammar);
      if (result.ok) {
        const token: ParsedToken = { kind: 'parsed', ...context, ...result.split };
        tokens.push(token);
        parsed++;
      } else {
        tokens.push({ kind: 'unparseable', ...context, reason: result.reason });
        unparseable[result.reason]++;
      }
    });
  }

  return { tokens, parsed, unparseable };
}

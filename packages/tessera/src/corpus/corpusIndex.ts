import type { DecomposedToken, MiddleType, ParsedToken, WindowType } from '../types.js';
import { ConfigurationError, TesseraError } from '../errors.js';

/** Per-MIDDLE counters. Merging two of these is associative and commutative. */
export interface MiddleCounts {
  frequency: number;
  positional: number[];
  sectionCounts: Record<string, number>;
  regimeCounts: Record<string, number>;
  folios: Set<string>;
  lineInitial: number;
  lineFinal: number;
}

export interface IndexShard {
  bins: number;
  tokenCount: number;
  unparseableCount: number;
  middles: Map<string, MiddleCounts>;
}

export interface LineView {
  id: string;
  folio: string;
  section: string;
  regime: string;
  tokens: DecomposedToken[];
}

export interface FolioView {
  id: string;
  section: string;
  regime: string;
  lineIds: string[];
}

export interface Context {
  id: string;
  middles: string[];
}

export interface IndexSummary {
  version: string | null;
  tokens: number;
  parsed: number;
  unparseable: number;
  middleTypes: number;
  lines: number;
  folios: number;
  sections: string[];
  regimes: string[];
  positionBins: number;
}

/** Fixed-width bin for a token's relative position in its line. */
export function positionBin(position: number, lineLength: number, bins: number): number {
  const rel = lineLength > 1 ? position / (lineLength - 1) : 0;
  return Math.min(bins - 1, Math.floor(rel * bins));
}

export function buildShard(tokens: readonly DecomposedToken[], bins: number): IndexShard {
  const middles = new Map<string, MiddleCounts>();
  let unparseableCount = 0;
  for (const t of tokens) {
    if (t.kind !== 'parsed') {
      unparseableCount++;
      continue;
    }
    let c = middles.get(t.middle);
    if (!c) {
      c = emptyCounts(bins);
      middles.set(t.middle, c);
    }
    c.frequency++;
    c.positional[positionBin(t.position, t.lineLength, bins)]++;
    c.sectionCounts[t.section] = (c.sectionCounts[t.section] ?? 0) + 1;
    c.regimeCounts[t.regime] = (c.regimeCounts[t.regime] ?? 0) + 1;
    c.folios.add(t.folioId);
    if (t.position === 0) c.lineInitial++;
    if (t.position === t.lineLength - 1) c.lineFinal++;
  }
  return { bins, tokenCount: tokens.length, unparseableCount, middles };
}

export function mergeShards(a: IndexShard, b: IndexShard): IndexShard {
  if (a.bins !== b.bins) {
    throw new ConfigurationError(`Cannot merge shards with ${a.bins} and ${b.bins} position bins`);
  }
  const middles = new Map<string, MiddleCounts>();
  for (const source of [a.middles, b.middles]) {
    for (const [id, c] of source) {
      const into = middles.get(id);
      middles.set(id, into ? addCounts(into, c) : addCounts(emptyCounts(a.bins), c));
    }
  }
  return {
    bins: a.bins,
    tokenCount: a.tokenCount + b.tokenCount,
    unparseableCount: a.unparseableCount + b.unparseableCount,
    middles,
  };
}

function emptyCounts(bins: number): MiddleCounts {
  return {
    frequency: 0,
    positional: new Array<number>(bins).fill(0),
    sectionCounts: {},
    regimeCounts: {},
    folios: new Set(),
    lineInitial: 0,
    lineFinal: 0,
  };
}

function addCounts(into: MiddleCounts, c: MiddleCounts): MiddleCounts {
  const sectionCounts = { ...into.sectionCounts };
  for (const [k, v] of Object.entries(c.sectionCounts)) sectionCounts[k] = (sectionCounts[k] ?? 0) + v;
  const regimeCounts = { ...into.regimeCounts };
  for (const [k, v] of Object.entries(c.regimeCounts)) regimeCounts[k] = (regimeCounts[k] ?? 0) + v;
  return {
    frequency: into.frequency + c.frequency,
    positional: into.positional.map((v, i) => v + c.positional[i]),
    sectionCounts,
    regimeCounts,
    folios: new Set([...into.folios, ...c.folios]),
    lineInitial: into.lineInitial + c.lineInitial,
    lineFinal: into.lineFinal + c.lineFinal,
  };
}

/**
 * Frequency, positional and contextual statistics per MIDDLE type for one
 * immutable corpus version. Downstream stages only read from it.
 */
export class CorpusIndex {
  private _version: string | null = null;
  private _tokens: DecomposedToken[] = [];
  private _shard: IndexShard;
  private _lines: LineView[] = [];
  private _folios: FolioView[] = [];

  constructor(readonly positionBins: number, readonly recordSize: number) {
    this._shard = buildShard([], positionBins);
  }

  get version(): string | null {
    return this._version;
  }

  /**
   * Ingest a decomposed token stream. Sharded by folio and merged.
   * Returns false when this version is already ingested (no state change).
   */
  ingest(tokens: readonly DecomposedToken[], version: string): boolean {
    if (this._version === version) return false;
    if (this._version !== null) {
      throw new TesseraError(`Index already holds corpus version ${this._version}; cannot ingest ${version}`);
    }

    const byFolio = new Map<string, DecomposedToken[]>();
    for (const t of tokens) {
      const bucket = byFolio.get(t.folioId);
      if (bucket) bucket.push(t);
      else byFolio.set(t.folioId, [t]);
    }

    let shard = buildShard([], this.positionBins);
    for (const folioTokens of byFolio.values()) {
      shard = mergeShards(shard, buildShard(folioTokens, this.positionBins));
    }

    this._shard = shard;
    this._tokens = [...tokens];
    this._lines = groupLines(this._tokens);
    this._folios = groupFolios(this._lines);
    this._version = version;
    return true;
  }

  tokens(): readonly DecomposedToken[] {
    return this._tokens;
  }

  parsedTokens(): ParsedToken[] {
    return this._tokens.filter((t): t is ParsedToken => t.kind === 'parsed');
  }

  lines(): readonly LineView[] {
    return this._lines;
  }

  folios(): readonly FolioView[] {
    return this._folios;
  }

  middleIds(): string[] {
    return [...this._shard.middles.keys()].sort();
  }

  middle(id: string): MiddleType | null {
    const c = this._shard.middles.get(id);
    return c ? toMiddleType(id, c) : null;
  }

  middleTypes(): MiddleType[] {
    return this.middleIds().map(id => toMiddleType(id, this.countsFor(id)));
  }

  /**
   * Distinct MIDDLE sets per co-occurrence window. Records are runs of
   * `recordSize` consecutive lines inside one folio.
   */
  contexts(window: WindowType): Context[] {
    const groups = new Map<string, Set<string>>();
    const add = (key: string, middle: string | null): void => {
      let set = groups.get(key);
      if (!set) {
        set = new Set();
        groups.set(key, set);
      }
      if (middle !== null) set.add(middle);
    };

    for (const folio of this._folios) {
      folio.lineIds.forEach((lineId, lineIdx) => {
        const key = window === 'line' ? lineId
          : window === 'record' ? `${folio.id}#r${Math.floor(lineIdx / this.recordSize)}`
          : folio.id;
        const line = this.line(lineId);
        if (!line) return;
        for (const t of line.tokens) add(key, t.kind === 'parsed' ? t.middle : null);
      });
    }

    return [...groups.entries()].map(([id, set]) => ({ id, middles: [...set].sort() }));
  }

  line(id: string): LineView | undefined {
    return this._lineById().get(id);
  }

  sections(): string[] {
    return [...new Set(this._lines.map(l => l.section))].sort();
  }

  regimes(): string[] {
    return [...new Set(this._tokens.map(t => t.regime))].sort();
  }

  summary(): IndexSummary {
    return {
      version: this._version,
      tokens: this._shard.tokenCount,
      parsed: this._shard.tokenCount - this._shard.unparseableCount,
      unparseable: this._shard.unparseableCount,
      middleTypes: this._shard.middles.size,
      lines: this._lines.length,
      folios: this._folios.length,
      sections: this.sections(),
      regimes: this.regimes(),
      positionBins: this.positionBins,
    };
  }

  /** JSON-serialisable view for artifacts. */
  snapshot(): { summary: IndexSummary; middles: MiddleType[] } {
    return { summary: this.summary(), middles: this.middleTypes() };
  }

  private countsFor(id: string): MiddleCounts {
    const c = this._shard.middles.get(id);
    if (!c) throw new TesseraError(`Unknown MIDDLE ${id}`);
    return c;
  }

  private _lineMap: Map<string, LineView> | null = null;

  private _lineById(): Map<string, LineView> {
    if (!this._lineMap || this._lineMap.size !== this._lines.length) {
      this._lineMap = new Map(this._lines.map(l => [l.id, l]));
    }
    return this._lineMap;
  }
}

function toMiddleType(id: string, c: MiddleCounts): MiddleType {
  return {
    id,
    frequency: c.frequency,
    positional: [...c.positional],
    sectionCounts: { ...c.sectionCounts },
    regimeCounts: { ...c.regimeCounts },
    folioCount: c.folios.size,
    lineInitial: c.lineInitial,
    lineFinal: c.lineFinal,
    role: null,
    hub: false,
  };
}

function groupLines(tokens: readonly DecomposedToken[]): LineView[] {
  const lines = new Map<string, LineView>();
  for (const t of tokens) {
    let line = lines.get(t.lineId);
    if (!line) {
      line = { id: t.lineId, folio: t.folioId, section: t.section, regime: t.regime, tokens: [] };
      lines.set(t.lineId, line);
    }
    line.tokens.push(t);
  }
  for (const line of lines.values()) line.tokens.sort((a, b) => a.position - b.position);
  return [...lines.values()];
}

function groupFolios(lines: readonly LineView[]): FolioView[] {
  const folios = new Map<string, { section: string; regimes: Map<string, number>; lineIds: string[] }>();
  for (const line of lines) {
    let f = folios.get(line.folio);
    if (!f) {
      f = { section: line.section, regimes: new Map(), lineIds: [] };
      folios.set(line.folio, f);
    }
    f.lineIds.push(line.id);
    f.regimes.set(line.regime, (f.regimes.get(line.regime) ?? 0) + line.tokens.length);
  }
  return [...folios.entries()].map(([id, f]) => ({
    id,
    section: f.section,
    regime: majority(f.regimes),
    lineIds: f.lineIds,
  }));
}

/** Most frequent key; ties go to the lexicographically first. */
export function majority(counts: ReadonlyMap<string, number>): string {
  let best = 'UNKNOWN';
  let bestCount = -1;
  for (const [key, n] of [...counts.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    if (n > bestCount) {
      best = key;
      bestCount = n;
    }
  }
  return best;
}

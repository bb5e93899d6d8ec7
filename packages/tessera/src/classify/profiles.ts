import type { FolioProfile } from '../types.js';
import type { CorpusIndex } from '../corpus/corpusIndex.js';

/**
 * Per-folio densities. Hazard density is the share of adjacent transitions
 * touching a hazard class; escape density the share of parsed tokens in an
 * escape-role class; MIDDLE diversity the type/token ratio of MIDDLEs.
 */
export function folioProfiles(
  index: CorpusIndex,
  classOf: (raw: string) => string | null,
  hazardClasses: ReadonlySet<string>,
  escapeClasses: ReadonlySet<string>,
): FolioProfile[] {
  return index.folios().map(folio => {
    let tokenCount = 0;
    let unparseable = 0;
    let parsed = 0;
    let escapes = 0;
    let transitions = 0;
    let hazardous = 0;
    const middles = new Set<string>();

    for (const lineId of folio.lineIds) {
      const line = index.line(lineId);
      if (!line) continue;
      const seq = line.tokens.map(t => (t.kind === 'parsed' ? classOf(t.raw) : null));
      for (const t of line.tokens) {
        tokenCount++;
        if (t.kind !== 'parsed') {
          unparseable++;
          continue;
        }
        parsed++;
        middles.add(t.middle);
        const id = classOf(t.raw);
        if (id !== null && escapeClasses.has(id)) escapes++;
      }
      for (let i = 0; i + 1 < seq.length; i++) {
        const a = seq[i];
        const b = seq[i + 1];
        if (a === null || b === null) continue;
        transitions++;
        if (hazardClasses.has(a) || hazardClasses.has(b)) hazardous++;
      }
    }

    return {
      id: folio.id,
      section: folio.section,
      regime: folio.regime,
      tokenCount,
      unparseableCount: unparseable,
      hazardDensity: transitions === 0 ? 0 : hazardous / transitions,
      escapeDensity: parsed === 0 ? 0 : escapes / parsed,
      middleDiversity: parsed === 0 ? 0 : middles.size / parsed,
    };
  });
}

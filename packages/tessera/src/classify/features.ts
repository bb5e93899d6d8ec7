import type { LineView } from '../corpus/corpusIndex.js';
import { positionBin } from '../corpus/corpusIndex.js';
import type { ClassTable } from './classes.js';

const UNRESOLVED = '?';
const BOUNDARY = '|';

/**
 * Behavioural feature vectors for the given classes, computed over `lines`:
 * positional histogram, line-initial and line-final rates, successor and
 * predecessor role profiles, and line co-occurrence with each role group.
 * Every component is a share, so vectors are comparable across halves.
 */
export function classFeatures(
  targets: readonly string[],
  lines: readonly LineView[],
  table: ClassTable,
  bins: number,
): Map<string, number[]> {
  const roles = [...new Set(table.classes.map(c => c.role).filter((r): r is string => r !== null))].sort();
  const groups = [...roles, UNRESOLVED];
  const neighbourGroups = [...groups, BOUNDARY];
  const groupOf = (classId: string | null): string => {
    if (classId === null) return BOUNDARY;
    return table.roleOf(classId) ?? UNRESOLVED;
  };

  const wanted = new Set(targets);
  const acc = new Map(targets.map(id => [id, {
    n: 0,
    positional: new Array<number>(bins).fill(0),
    initial: 0,
    final: 0,
    succ: new Map<string, number>(),
    pred: new Map<string, number>(),
    lines: 0,
    cooc: new Map<string, number>(),
  }]));

  for (const line of lines) {
    const seq = line.tokens.map(t => (t.kind === 'parsed' ? table.classOf(t.raw) : null));
    const present = new Set<string>();
    line.tokens.forEach((t, i) => {
      const id = seq[i];
      if (id === null || !wanted.has(id)) return;
      const a = acc.get(id);
      if (!a) return;
      a.n++;
      a.positional[positionBin(t.position, t.lineLength, bins)]++;
      if (t.position === 0) a.initial++;
      if (t.position === t.lineLength - 1) a.final++;
      const next = groupOf(i + 1 < seq.length ? seq[i + 1] : null);
      const prev = groupOf(i > 0 ? seq[i - 1] : null);
      a.succ.set(next, (a.succ.get(next) ?? 0) + 1);
      a.pred.set(prev, (a.pred.get(prev) ?? 0) + 1);
      present.add(id);
    });

    for (const id of present) {
      const a = acc.get(id);
      if (!a) continue;
      a.lines++;
      const others = new Set<string>();
      seq.forEach(other => {
        if (other !== null && other !== id) others.add(groupOf(other));
      });
      for (const g of others) a.cooc.set(g, (a.cooc.get(g) ?? 0) + 1);
    }
  }

  const out = new Map<string, number[]>();
  for (const id of targets) {
    const a = acc.get(id);
    if (!a) continue;
    const share = (x: number, of: number): number => (of === 0 ? 0 : x / of);
    out.set(id, [
      ...a.positional.map(x => share(x, a.n)),
      share(a.initial, a.n),
      share(a.final, a.n),
      ...neighbourGroups.map(g => share(a.succ.get(g) ?? 0, a.n)),
      ...neighbourGroups.map(g => share(a.pred.get(g) ?? 0, a.n)),
      ...groups.map(g => share(a.cooc.get(g) ?? 0, a.lines)),
    ]);
  }
  return out;
}

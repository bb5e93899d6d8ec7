import type { InstructionClass, ParsedToken } from '../types.js';
import { ClassConfidence } from '../state/types.js';

export const RARE_CLASS = 'RARE';
export const OTHER_CLASS = 'OTHER';

export interface ClassSpec {
  id: string;
  patterns: string[];
}

export interface ClassOptions {
  classes: ClassSpec[];
  minClassFrequency: number;
}

/** Token type → instruction class lookup plus the class records themselves. */
export class ClassTable {
  private readonly byId: Map<string, InstructionClass>;

  constructor(readonly classes: InstructionClass[], private readonly byToken: ReadonlyMap<string, string>) {
    this.byId = new Map(classes.map(c => [c.id, c]));
  }

  classOf(raw: string): string | null {
    return this.byToken.get(raw) ?? null;
  }

  get(id: string): InstructionClass | undefined {
    return this.byId.get(id);
  }

  ids(): string[] {
    return this.classes.map(c => c.id);
  }

  roleOf(id: string): string | null {
    return this.byId.get(id)?.role ?? null;
  }

  occurrences(tokens: readonly ParsedToken[]): Map<string, ParsedToken[]> {
    const out = new Map<string, ParsedToken[]>(this.classes.map(c => [c.id, []]));
    for (const t of tokens) {
      const id = this.classOf(t.raw);
      if (id !== null) out.get(id)?.push(t);
    }
    return out;
  }
}

/**
 * Configured classes match token types by regex, first class wins, and
 * anything unmatched pools into OTHER. With no classes configured, every
 * token type at or above `minClassFrequency` is its own class and the rest
 * pool into RARE.
 */
export function buildClasses(tokens: readonly ParsedToken[], options: ClassOptions): ClassTable {
  const typeCounts = new Map<string, number>();
  for (const t of tokens) typeCounts.set(t.raw, (typeCounts.get(t.raw) ?? 0) + 1);
  const types = [...typeCounts.keys()].sort();

  const byToken = new Map<string, string>();
  let order: ClassSpec[];
  let pool: string;

  if (options.classes.length > 0) {
    const compiled = options.classes.map(c => ({ id: c.id, res: c.patterns.map(p => new RegExp(p)) }));
    for (const type of types) {
      const hit = compiled.find(c => c.res.some(re => re.test(type)));
      byToken.set(type, hit ? hit.id : OTHER_CLASS);
    }
    order = options.classes;
    pool = OTHER_CLASS;
  } else {
    const frequent = types.filter(t => (typeCounts.get(t) ?? 0) >= options.minClassFrequency);
    const frequentSet = new Set(frequent);
    for (const type of types) byToken.set(type, frequentSet.has(type) ? type : RARE_CLASS);
    order = frequent.map(t => ({ id: t, patterns: [`^${escapeRegex(t)}$`] }));
    pool = RARE_CLASS;
  }

  const members = new Map<string, string[]>();
  const frequency = new Map<string, number>();
  for (const type of types) {
    const id = byToken.get(type) ?? pool;
    members.set(id, [...(members.get(id) ?? []), type]);
    frequency.set(id, (frequency.get(id) ?? 0) + (typeCounts.get(type) ?? 0));
  }

  const classes: InstructionClass[] = [];
  for (const cls of order) {
    classes.push(record(cls.id, cls.patterns, members.get(cls.id) ?? [], frequency.get(cls.id) ?? 0));
  }
  if (members.has(pool)) {
    classes.push(record(pool, [], members.get(pool) ?? [], frequency.get(pool) ?? 0));
  }
  return new ClassTable(classes, byToken);
}

function record(id: string, patterns: string[], members: string[], frequency: number): InstructionClass {
  return {
    id,
    patterns,
    members,
    frequency,
    role: null,
    confidence: ClassConfidence.UNCLASSIFIED,
    hazard: false,
  };
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

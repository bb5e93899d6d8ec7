import * as path from 'node:path';
import { DEFAULT_GRAMMAR_PATH, readGrammarFile } from 'tessera-shared';
import { grammarRulesSchema, type TesseraConfig } from '../config.js';
import { ConfigurationError, errorMessage } from '../errors.js';

/**
 * Compiled segmentation rule set. Grammars evolve between corpus studies, so
 * the rule set is always data; nothing in the decomposer hardcodes an affix.
 */
export interface Grammar {
  version: string;
  prefixes: readonly string[];
  suffixes: readonly string[];
  minMiddleLength: number;
  /** Affix → rank; lower wins ties. Unlisted affixes rank last. */
  rank: ReadonlyMap<string, number>;
  reject: RegExp | null;
  requireAffix: boolean;
  source: string;
}

export function compileGrammar(raw: unknown, source = 'inline'): Grammar {
  const parsed = grammarRulesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid grammar (${source})`,
      parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  const rules = parsed.data;

  let reject: RegExp | null = null;
  if (rules.rejectPattern) {
    try {
      reject = new RegExp(rules.rejectPattern);
    } catch (err) {
      throw new ConfigurationError(`Invalid grammar rejectPattern (${source}): ${errorMessage(err)}`);
    }
  }

  const rank = new Map<string, number>();
  rules.priority.forEach((affix, i) => {
    if (!rank.has(affix)) rank.set(affix, i);
  });

  return {
    version: rules.version,
    prefixes: dedupe(rules.prefixes),
    suffixes: dedupe(rules.suffixes),
    minMiddleLength: rules.minMiddleLength,
    rank,
    reject,
    requireAffix: rules.requireAffix,
    source,
  };
}

/**
 * Resolve the grammar for a project: inline rules, then `grammar.path`
 * relative to the project root, then the bundled default.
 */
export function loadGrammar(config: TesseraConfig, projectRoot: string): Grammar {
  if (config.grammar.rules) {
    return compileGrammar(config.grammar.rules, 'config.grammar.rules');
  }
  const file = config.grammar.path
    ? path.resolve(projectRoot, config.grammar.path)
    : DEFAULT_GRAMMAR_PATH;
  let raw: unknown;
  try {
    raw = readGrammarFile(file);
  } catch (err) {
    throw new ConfigurationError(`Cannot read grammar ${file}: ${errorMessage(err)}`);
  }
  return compileGrammar(raw, file);
}

export function isDefaultGrammar(grammar: Grammar): boolean {
  return grammar.source === DEFAULT_GRAMMAR_PATH;
}

function dedupe(items: string[]): string[] {
  return [...new Set(items)];
}

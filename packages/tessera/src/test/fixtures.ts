import type { CorpusRecord } from '../types.js';
import { mergeWithDefaults, parseConfig, type TesseraConfig } from '../config.js';
import { compileGrammar, type Grammar } from '../corpus/grammar.js';
import { Pipeline } from '../pipeline.js';

/** Small grammar: tokens that neither start with qo/ch nor end in dy/y are bare MIDDLEs. */
export const TEST_GRAMMAR: Grammar = compileGrammar({
  version: 'test-1',
  prefixes: ['qo', 'ch'],
  suffixes: ['dy', 'y'],
  priority: ['qo', 'ch', 'dy'],
  rejectPattern: '[*?]',
}, 'test');

export function testConfig(overrides: Record<string, unknown> = {}): TesseraConfig {
  return parseConfig(mergeWithDefaults(overrides));
}

export function lineRecords(
  folio: string,
  line: string | number,
  tokens: readonly string[],
  section = 'A',
  regime = 'R1',
): CorpusRecord[] {
  return tokens.map(token => ({ token, folio, line: String(line), section, regime }));
}

export function testPipeline(records: readonly CorpusRecord[], config: TesseraConfig = testConfig()): Pipeline {
  return new Pipeline(config, TEST_GRAMMAR, records, 'test-version');
}

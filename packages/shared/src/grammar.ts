import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Segmentation rule set as stored on disk. The engine validates it before use;
 * this package only knows where the bundled default lives.
 */
export interface GrammarRules {
  version: string;
  prefixes: string[];
  suffixes: string[];
  minMiddleLength: number;
  priority: string[];
  rejectPattern: string | null;
  requireAffix: boolean;
}

export const DEFAULT_GRAMMAR_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  'grammar',
  'default.json',
);

/** Read a grammar file as untyped JSON. */
export function readGrammarFile(filePath: string = DEFAULT_GRAMMAR_PATH): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_CONFIG, configTemplate } from '../config.js';
import { DEFAULT_GRAMMAR_PATH, readGrammarFile } from '../grammar.js';
import { writeFileAtomic } from '../utils.js';

describe('configTemplate', () => {
  it('fills in name and corpus path over the defaults', () => {
    const parsed = JSON.parse(configTemplate({ name: 'demo', corpusPath: 'data/tokens.csv' }));
    assert.equal(parsed.project.name, 'demo');
    assert.equal(parsed.corpus.path, 'data/tokens.csv');
    assert.equal(parsed.corpus.format, 'auto');
    assert.equal(parsed.graph.window, 'line');
    assert.equal(parsed.robustness.alternativeWindow, 'record');
    assert.equal(parsed.permutation.seed, DEFAULT_CONFIG.permutation.seed);
  });

  it('swaps the alternative window when the primary is record', () => {
    const parsed = JSON.parse(configTemplate({ name: 'demo', corpusPath: 'c.csv', window: 'record', seed: 42 }));
    assert.equal(parsed.graph.window, 'record');
    assert.equal(parsed.robustness.alternativeWindow, 'line');
    assert.equal(parsed.permutation.seed, 42);
  });
});

describe('default grammar', () => {
  it('is readable from the bundled path', () => {
    const raw = readGrammarFile(DEFAULT_GRAMMAR_PATH);
    assert.ok(typeof raw === 'object' && raw !== null && 'prefixes' in raw);
  });
});

describe('writeFileAtomic', () => {
  it('creates parent directories and leaves no partial file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tessera-shared-'));
    try {
      const target = path.join(dir, 'nested', 'out.json');
      writeFileAtomic(target, '{"ok":true}');
      assert.equal(fs.readFileSync(target, 'utf-8'), '{"ok":true}');
      assert.deepEqual(fs.readdirSync(path.join(dir, 'nested')), ['out.json']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

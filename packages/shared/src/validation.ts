/**
 * Project readiness validation for tessera.
 * Surfaces what is configured, what is missing, and what that means for the
 * next run. Informational only; never blocks.
 */

export interface ValidationCheck {
  label: string;
  status: 'pass' | 'warn' | 'fail';
  detail: string;
}

/**
 * Validate project readiness given pre-resolved facts.
 * The caller does the filesystem and database work.
 */
export function validateProject(checks: {
  corpusPath: string;
  hasCorpus: boolean;
  grammarVersion: string | null;
  grammarIsDefault: boolean;
  window: string;
  alternativeWindow: string;
  registryVersion: number | null;
  constraintCount: number;
  permutationShuffles: number;
}): ValidationCheck[] {
  const results: ValidationCheck[] = [];

  results.push(checks.hasCorpus
    ? { label: 'Corpus', status: 'pass', detail: `Found at ${checks.corpusPath}` }
    : { label: 'Corpus', status: 'fail', detail: `Missing ${checks.corpusPath} — no stage can run` }
  );

  if (checks.grammarVersion === null) {
    results.push({ label: 'Grammar', status: 'fail', detail: 'Rule set could not be loaded' });
  } else if (checks.grammarIsDefault) {
    results.push({ label: 'Grammar', status: 'warn', detail: `Bundled default (${checks.grammarVersion}) — set grammar.path to pin a rule set` });
  } else {
    results.push({ label: 'Grammar', status: 'pass', detail: `Rule set ${checks.grammarVersion}` });
  }

  results.push(checks.window !== checks.alternativeWindow
    ? { label: 'Robustness windows', status: 'pass', detail: `${checks.window} vs ${checks.alternativeWindow}` }
    : { label: 'Robustness windows', status: 'fail', detail: `Primary and alternative window are both ${checks.window}` }
  );

  if (checks.permutationShuffles < 1000) {
    results.push({ label: 'Permutation shuffles', status: 'warn', detail: `${checks.permutationShuffles} — p-values below ${(1 / (checks.permutationShuffles + 1)).toFixed(4)} are unreachable` });
  } else {
    results.push({ label: 'Permutation shuffles', status: 'pass', detail: String(checks.permutationShuffles) });
  }

  if (checks.registryVersion === null) {
    results.push({ label: 'Registry', status: 'fail', detail: 'Database not initialised — run `tessera init`' });
  } else if (checks.constraintCount === 0) {
    results.push({ label: 'Registry', status: 'warn', detail: `Empty (version ${checks.registryVersion})` });
  } else {
    results.push({ label: 'Registry', status: 'pass', detail: `${checks.constraintCount} constraint(s) at version ${checks.registryVersion}` });
  }

  return results;
}

// Local NO_COLOR gate; shared does not import the engine.
const _useColor = !process.env.NO_COLOR && (process.stderr?.isTTY !== false);

/**
 * Format validation results for terminal output.
 */
export function formatValidation(checks: ValidationCheck[]): string {
  const lines: string[] = [];
  for (const c of checks) {
    const icon = c.status === 'pass' ? (_useColor ? '\x1b[32m✓\x1b[0m' : '✓')
               : c.status === 'warn' ? (_useColor ? '\x1b[33m⚠\x1b[0m' : '⚠')
               : (_useColor ? '\x1b[31m✗\x1b[0m' : '✗');
    lines.push(`  ${icon} ${c.label}: ${c.detail}`);
  }
  return lines.join('\n');
}

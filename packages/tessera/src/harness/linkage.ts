import type { ConstraintRecord, EvidenceRef, TestResult } from '../types.js';
import type { TestDefinition } from './types.js';
import { ConstraintStatus } from '../state/types.js';
import { withRetry, type Registry } from '../registry/registry.js';

export type LinkAction = 'proposed' | 'confirmed' | 'falsified' | 'none';

export interface LinkOutcome {
  action: LinkAction;
  constraint: ConstraintRecord | null;
}

export function evidenceFromResult(result: TestResult): EvidenceRef {
  return {
    testId: result.testId,
    resultId: result.id,
    pValue: result.pValue,
    effectSize: result.effectSize,
    sampleSize: result.sampleSize,
    note: result.reason ? `${result.verdict}: ${result.reason}` : result.verdict,
  };
}

/**
 * Feed a verdict into the registry. Without a target a PASS proposes the
 * test's constraint; with one, PASS confirms and FAIL falsifies it.
 * INCONCLUSIVE never writes.
 */
export function linkResult(
  registry: Registry,
  def: TestDefinition,
  result: TestResult,
  target: string | null,
  maxRetries: number,
): LinkOutcome {
  if (result.verdict === 'INCONCLUSIVE') return { action: 'none', constraint: null };
  const evidence = [evidenceFromResult(result)];

  if (target === null) {
    if (result.verdict !== 'PASS') return { action: 'none', constraint: null };
    const constraint = withRetry(
      registry,
      version => registry.propose({ statement: def.statement, tier: def.tier, evidence, reason: `proposed by ${def.id}` }, version),
      maxRetries,
    );
    return { action: 'proposed', constraint };
  }

  const status = result.verdict === 'PASS' ? ConstraintStatus.CONFIRMED : ConstraintStatus.FALSIFIED;
  const constraint = withRetry(registry, version => registry.resolve(target, status, evidence, version), maxRetries);
  return { action: status === ConstraintStatus.CONFIRMED ? 'confirmed' : 'falsified', constraint };
}

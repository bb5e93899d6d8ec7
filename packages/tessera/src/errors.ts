/**
 * Error taxonomy. Each class carries the CLI exit code it maps to; only
 * configuration errors, corpus format errors and unresolved registry conflicts
 * ever reach the top level.
 */
export class TesseraError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed token. Recovered locally as UNPARSEABLE; never escapes the decomposer. */
export class ParseError extends TesseraError {
  constructor(readonly token: string, readonly reason: string) {
    super(`Cannot decompose "${token}": ${reason}`);
  }
}

/** Malformed input table. */
export class CorpusFormatError extends TesseraError {
  override readonly exitCode = 1;

  constructor(message: string, readonly row: number | null = null) {
    super(row === null ? message : `Row ${row}: ${message}`);
  }
}

export class GraphInstabilityError extends TesseraError {
  constructor(readonly agreement: number, readonly required: number, readonly unstableEdges: number) {
    super(
      `Edge legality agreement ${(agreement * 100).toFixed(2)}% is below the ` +
      `${(required * 100).toFixed(0)}% gate (${unstableEdges} unstable edge(s))`,
    );
  }
}

/** Zero variance, empty input or a singular computation. */
export class StatisticalDegeneracyError extends TesseraError {}

export class RegistryConflictError extends TesseraError {
  override readonly exitCode = 2;

  constructor(readonly expectedVersion: number, readonly currentVersion: number) {
    super(`Registry version conflict: expected ${expectedVersion}, head is ${currentVersion}`);
  }
}

/** Illegal registry operation (unknown id, invalid status transition, cycle). */
export class RegistryError extends TesseraError {}

export class ConfigurationError extends TesseraError {
  override readonly exitCode = 3;

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
  }
}

export class TestTimeoutError extends TesseraError {
  constructor(readonly testId: string, readonly timeoutMs: number) {
    super(`Test ${testId} exceeded ${timeoutMs}ms`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

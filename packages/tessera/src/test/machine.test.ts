import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { ClassConfidence, ConstraintStatus } from '../state/types.js';
import {
  isTerminalStatus,
  parseStatus,
  transitionConfidence,
  transitionStatus,
  validNextStatus,
} from '../state/machine.js';
import { RegistryError, TesseraError } from '../errors.js';

describe('constraint status machine', () => {
  it('allows the documented transitions', () => {
    assert.equal(transitionStatus(ConstraintStatus.PROPOSED, ConstraintStatus.PARTIAL), ConstraintStatus.PARTIAL);
    assert.equal(transitionStatus(ConstraintStatus.PARTIAL, ConstraintStatus.CONFIRMED), ConstraintStatus.CONFIRMED);
    assert.equal(transitionStatus(ConstraintStatus.CONFIRMED, ConstraintStatus.FALSIFIED), ConstraintStatus.FALSIFIED);
  });

  it('rejects moves out of terminal states', () => {
    assert.throws(
      () => transitionStatus(ConstraintStatus.FALSIFIED, ConstraintStatus.CONFIRMED),
      RegistryError,
    );
    assert.throws(
      () => transitionStatus(ConstraintStatus.SUPERSEDED, ConstraintStatus.PROPOSED),
      RegistryError,
    );
    assert.equal(isTerminalStatus(ConstraintStatus.FALSIFIED), true);
    assert.equal(isTerminalStatus(ConstraintStatus.CONFIRMED), false);
  });

  it('never returns to PROPOSED or PARTIAL from CONFIRMED', () => {
    assert.deepEqual(validNextStatus(ConstraintStatus.CONFIRMED), [
      ConstraintStatus.FALSIFIED,
      ConstraintStatus.SUPERSEDED,
    ]);
  });

  it('parses status names case-insensitively', () => {
    assert.equal(parseStatus('confirmed'), ConstraintStatus.CONFIRMED);
    assert.throws(() => parseStatus('maybe'), RegistryError);
  });
});

describe('class confidence machine', () => {
  it('moves assigned classes to VALIDATED only', () => {
    assert.equal(
      transitionConfidence(ClassConfidence.RULE_ASSIGNED, ClassConfidence.VALIDATED),
      ClassConfidence.VALIDATED,
    );
    assert.throws(
      () => transitionConfidence(ClassConfidence.RULE_ASSIGNED, ClassConfidence.CLUSTER_ASSIGNED),
      TesseraError,
    );
  });

  it('keeps AMBIGUOUS final', () => {
    assert.throws(
      () => transitionConfidence(ClassConfidence.AMBIGUOUS, ClassConfidence.VALIDATED),
      TesseraError,
    );
  });
});

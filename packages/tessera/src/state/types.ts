// Constraint lifecycle. Enforced on every registry write.
export enum ConstraintStatus {
  PROPOSED = 'PROPOSED',
  CONFIRMED = 'CONFIRMED',
  PARTIAL = 'PARTIAL',
  FALSIFIED = 'FALSIFIED',
  SUPERSEDED = 'SUPERSEDED',
}

export const STATUS_TRANSITIONS: Record<ConstraintStatus, ConstraintStatus[]> = {
  [ConstraintStatus.PROPOSED]:   [ConstraintStatus.CONFIRMED, ConstraintStatus.PARTIAL, ConstraintStatus.FALSIFIED, ConstraintStatus.SUPERSEDED],
  [ConstraintStatus.PARTIAL]:    [ConstraintStatus.CONFIRMED, ConstraintStatus.FALSIFIED, ConstraintStatus.SUPERSEDED],
  [ConstraintStatus.CONFIRMED]:  [ConstraintStatus.FALSIFIED, ConstraintStatus.SUPERSEDED],
  [ConstraintStatus.FALSIFIED]:  [],
  [ConstraintStatus.SUPERSEDED]: [],
};

// Instruction-class confidence
export enum ClassConfidence {
  UNCLASSIFIED = 'UNCLASSIFIED',
  RULE_ASSIGNED = 'RULE_ASSIGNED',
  CLUSTER_ASSIGNED = 'CLUSTER_ASSIGNED',
  VALIDATED = 'VALIDATED',
  AMBIGUOUS = 'AMBIGUOUS',
}

export const CONFIDENCE_TRANSITIONS: Record<ClassConfidence, ClassConfidence[]> = {
  [ClassConfidence.UNCLASSIFIED]:     [ClassConfidence.RULE_ASSIGNED, ClassConfidence.CLUSTER_ASSIGNED, ClassConfidence.AMBIGUOUS],
  [ClassConfidence.RULE_ASSIGNED]:    [ClassConfidence.VALIDATED],
  [ClassConfidence.CLUSTER_ASSIGNED]: [ClassConfidence.VALIDATED],
  [ClassConfidence.VALIDATED]:        [],
  [ClassConfidence.AMBIGUOUS]:        [],  // reported, never guessed
};

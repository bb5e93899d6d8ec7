import {
  ClassConfidence,
  CONFIDENCE_TRANSITIONS,
  ConstraintStatus,
  STATUS_TRANSITIONS,
} from './types.js';
import { RegistryError, TesseraError } from '../errors.js';

/**
 * Validate a constraint status change.
 * Throws RegistryError if the transition is invalid.
 */
export function transitionStatus(current: ConstraintStatus, target: ConstraintStatus): ConstraintStatus {
  const valid = STATUS_TRANSITIONS[current];
  if (!valid.includes(target)) {
    throw new RegistryError(
      `Invalid transition: ${current} → ${target}. Valid: [${valid.join(', ')}]`
    );
  }
  return target;
}

export function validNextStatus(current: ConstraintStatus): ConstraintStatus[] {
  return STATUS_TRANSITIONS[current];
}

export function isTerminalStatus(status: ConstraintStatus): boolean {
  return STATUS_TRANSITIONS[status].length === 0;
}

/** Parse user input (case-insensitive) into a status. */
export function parseStatus(raw: string): ConstraintStatus {
  const upper = raw.toUpperCase();
  const found = Object.values(ConstraintStatus).find(s => s === upper);
  if (!found) {
    throw new RegistryError(`Unknown status "${raw}". Valid: [${Object.values(ConstraintStatus).join(', ')}]`);
  }
  return found;
}

export function transitionConfidence(current: ClassConfidence, target: ClassConfidence): ClassConfidence {
  const valid = CONFIDENCE_TRANSITIONS[current];
  if (!valid.includes(target)) {
    throw new TesseraError(
      `Invalid confidence transition: ${current} → ${target}. Valid: [${valid.join(', ')}]`
    );
  }
  return target;
}

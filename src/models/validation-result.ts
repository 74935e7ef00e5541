import { CollectionName } from './invoice-document';

export enum ValidationStep {
  MISSING_VALUES = 'Step 1: Missing Values',
  DATA_TYPES = 'Step 2: Data Types',
  RELATIONS = 'Step 3: Relations',
  ALL_STEPS = 'All Steps',
}

export const VALIDATION_SUCCESS_MESSAGE = 'Validation successful';

export type ValidationMode = 'first' | 'all';

export const VALIDATION_MODES: readonly ValidationMode[] = ['first', 'all'];

export type ReconciliationRelation =
  | 'invoice-value'
  | 'tax-estimates'
  | 'final-amount'
  | 'total-invoice-value';

interface ViolationBase {
  collection: CollectionName;
  rowIndex: number;
  message: string;
}

export interface MissingFieldViolation extends ViolationBase {
  kind: 'missing-field';
  /** Only reported for the invoice header. */
  missingFields?: string[];
}

export interface TypeCoercionViolation extends ViolationBase {
  kind: 'type-coercion';
  field: string;
  rawValue: string;
}

export interface ReconciliationMismatchViolation extends ViolationBase {
  kind: 'reconciliation-mismatch';
  relation: ReconciliationRelation;
  actual: number;
  expected: number;
}

export type Violation =
  | MissingFieldViolation
  | TypeCoercionViolation
  | ReconciliationMismatchViolation;

export interface ValidationVerdict {
  passed: boolean;
  failedStep: ValidationStep;
  details: string;
  violation?: Violation;
}

export interface ValidationReport {
  passed: boolean;
  failedStep: ValidationStep;
  violations: Violation[];
}

export type VerdictTuple = [passed: boolean, step: string, details: string];

export function toVerdictTuple(verdict: ValidationVerdict): VerdictTuple {
  return [verdict.passed, verdict.failedStep, verdict.details];
}

/**
 * Submission Type Definitions
 *
 * - StepName: the six backend steps, in execution order
 * - StepResult: outcome of one step; failures keep the error, never throw it away
 * - SubmissionResult: every step gathered so far plus the final context
 * - SubmissionOptions: per-run step switches, call timeout and clock
 */

import type { CanonicalRecord } from '../parsing/index.js';

export const STEP_ORDER = [
  'CheckDuplicate',
  'CreateCustomer',
  'AuditCustomer',
  'CheckOpportunityDuplicate',
  'CreateOpportunity',
  'CreateTasks',
] as const;

export type StepName = typeof STEP_ORDER[number];

export interface StepError {
  name: string;
  message: string;
  retryable: boolean;
  backendCode?: string;
}

export interface StepResult {
  stepName: StepName;
  success: boolean;
  /** True when the step was not attempted (disabled, not needed, or blocked by an earlier failure) */
  skipped: boolean;
  responseData?: unknown;
  error?: StepError;
}

export type SubmissionWarningCode = 'divergent-identifier' | 'context-conflict' | 'pending-application';

export interface SubmissionWarning {
  code: SubmissionWarningCode;
  step?: StepName;
  message: string;
}

export interface SubmissionResult {
  steps: StepResult[];
  context: CanonicalRecord;
  warnings: SubmissionWarning[];
}

/** Steps that may be switched off. CreateCustomer always runs when needed. */
export interface StepFlags {
  checkDuplicate: boolean;
  auditCustomer: boolean;
  checkOpportunityDuplicate: boolean;
  createOpportunity: boolean;
  createTasks: boolean;
}

export interface SubmissionOptions {
  steps?: Partial<StepFlags>;
  /** Applied to every backend call */
  timeoutMs?: number;
  /** Reference "today" for task dates */
  now?: Date;
}

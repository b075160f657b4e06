// ============================================================================
// Submission Error Types
// ============================================================================

import type { CanonicalKey } from '../parsing/index.js';
import type { StepName, SubmissionResult } from './types.js';

/**
 * A step needs canonical fields the context does not hold.
 * The orchestrator records it as a failed step; it never reaches the caller.
 */
export class ValidationError extends Error {
  readonly step: StepName;
  readonly missing: readonly CanonicalKey[];

  constructor(step: StepName, missing: readonly CanonicalKey[]) {
    super(`${step} requires one of: ${missing.join(', ')}`);
    this.name = 'ValidationError';
    this.step = step;
    this.missing = missing;
  }
}

/**
 * Every source of an identifier resolution chain came back empty.
 *
 * `observed` lists what each source returned (undefined when empty).
 * When raised out of the orchestrator, `partialResult` holds every step
 * result gathered before the failure.
 */
export class IdentifierUnresolved extends Error {
  readonly identifier: string;
  readonly observed: Readonly<Record<string, string | undefined>>;
  readonly partialResult: SubmissionResult | undefined;

  constructor(
    identifier: string,
    observed: Readonly<Record<string, string | undefined>>,
    partialResult?: SubmissionResult,
  ) {
    super(`Could not resolve ${identifier}; tried ${Object.keys(observed).join(', ') || 'no sources'}`);
    this.name = 'IdentifierUnresolved';
    this.identifier = identifier;
    this.observed = observed;
    this.partialResult = partialResult;
  }
}

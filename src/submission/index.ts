// ============================================================================
// Submission Module — Barrel export
// ============================================================================

export { runSubmission, toStepError, DEFAULT_STEP_FLAGS } from './orchestrator.js';
export { processSalesNotes, previewSalesNotes, prepareSubmission } from './pipeline.js';
export type {
  PipelineDeps,
  PipelineOptions,
  PreparedSubmission,
  PreviewResult,
  SubmissionOutcome,
} from './pipeline.js';
export { IdentifierResolutionChain, createCustomerIdChain } from './identifier-chain.js';
export type { IdentifierResolver, Resolution, DivergentValue, CustomerIdLookup } from './identifier-chain.js';
export { ValidationError, IdentifierUnresolved } from './errors.js';
export { sanitizeForLog, PII_FIELDS } from './sanitize.js';
export { STEP_ORDER } from './types.js';
export type {
  StepName,
  StepResult,
  StepError,
  StepFlags,
  SubmissionOptions,
  SubmissionResult,
  SubmissionWarning,
  SubmissionWarningCode,
} from './types.js';

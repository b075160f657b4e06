// ============================================================================
// CRM Module — Barrel export
// ============================================================================

// Config
export { crmConfig, validateConfig, devPrefix } from './config.js';
export type { CrmConfig, AppEnv } from './config.js';

// Errors
export { ExternalServiceError, CrmRateLimitError, CrmAuthError, CrmTimeoutError } from './errors.js';

// HTTP client
export { crmPost, DEFAULT_TIMEOUT_MS, asRecord, pickString, readCustomerRef, readRecordList } from './client.js';
export type { CrmCallOptions } from './client.js';

// Payload assembly
export { assemblePayload, toRequestBody } from './payload-assembler.js';
export type { Payload, PayloadValue } from './payload-assembler.js';
export { OPPORTUNITY_FIELD_MAPPING, CUSTOMER_FIELD_MAPPING } from './field-mapping.js';
export type { FieldMapping, FieldDestination, PayloadSection, DestinationFormat } from './field-mapping.js';

// Services
export {
  findDuplicateCustomer,
  createCustomer,
  extractCreatedCustomerId,
  extractApplicationId,
  auditCustomerApplication,
  isPendingApplicationError,
  suggestCustomerCode,
  PENDING_APPLICATION_CODE,
  lookupCustomerIdByCode,
} from './customers.js';
export {
  findDuplicateOpportunity,
  isDuplicateRuleMissingError,
  DUPLICATE_RULE_MISSING_CODE,
  createOpportunity,
  readOpportunityResult,
  opportunityStageFor,
} from './opportunities.js';
export type { OpportunityResult } from './opportunities.js';
export { planFollowUpTasks, findNextReplacement, toTaskRequestBody, createTask } from './tasks.js';
export type { TaskPlanInput, ReplacementDue } from './tasks.js';
export { createCrmGateway } from './gateway.js';
export type { CrmGateway } from './gateway.js';

// Types
export { OPPORTUNITY_SECTIONS, CUSTOMER_SECTIONS, isSuccessCode } from './types/index.js';
export type { CrmEnvelope, CrmCustomerMatch, CrmOpportunityMatch, FollowUpTask, FollowUpTaskKind, PayloadSectionNames } from './types/index.js';

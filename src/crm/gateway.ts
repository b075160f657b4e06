// ============================================================================
// CRM Gateway — The backend operations the submission flow depends on
// ============================================================================

import type { SubmissionContext } from '../context/index.js';
import type { CrmCallOptions } from './client.js';
import {
  auditCustomerApplication,
  createCustomer,
  findDuplicateCustomer,
  lookupCustomerIdByCode,
} from './customers.js';
import { createOpportunity, findDuplicateOpportunity } from './opportunities.js';
import { createTask } from './tasks.js';
import type { CrmCustomerMatch, CrmEnvelope, CrmOpportunityMatch, FollowUpTask } from './types/index.js';

/**
 * One method per backend operation. The orchestrator only talks to this
 * interface, so tests can hand it an in-memory fake.
 */
export interface CrmGateway {
  findDuplicateCustomer(context: SubmissionContext, options: CrmCallOptions): Promise<CrmCustomerMatch | null>;
  createCustomer(context: SubmissionContext, options: CrmCallOptions): Promise<CrmEnvelope>;
  auditCustomerApplication(applicationId: string, options: CrmCallOptions): Promise<CrmEnvelope>;
  lookupCustomerIdByCode(customerCode: string, options: CrmCallOptions): Promise<string | undefined>;
  findDuplicateOpportunity(context: SubmissionContext, options: CrmCallOptions): Promise<CrmOpportunityMatch | null>;
  createOpportunity(context: SubmissionContext, options: CrmCallOptions): Promise<CrmEnvelope>;
  createTask(task: FollowUpTask, options: CrmCallOptions): Promise<CrmEnvelope>;
}

/** Gateway backed by the HTTP services in this module */
export function createCrmGateway(): CrmGateway {
  return {
    findDuplicateCustomer,
    createCustomer,
    auditCustomerApplication,
    lookupCustomerIdByCode,
    findDuplicateOpportunity,
    createOpportunity,
    createTask,
  };
}

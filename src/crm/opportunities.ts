// ============================================================================
// CRM Opportunities Service — Duplicate check, create opportunity, read the result
// ============================================================================

import { crmConfig } from './config.js';
import { ExternalServiceError } from './errors.js';
import { asRecord, crmPost, pickString, readCustomerRef, readRecordList } from './client.js';
import type { CrmCallOptions } from './client.js';
import { OPPORTUNITY_FIELD_MAPPING } from './field-mapping.js';
import { assemblePayload, toRequestBody } from './payload-assembler.js';
import { OPPORTUNITY_SECTIONS } from './types/index.js';
import type { CrmEnvelope, CrmOpportunityMatch } from './types/index.js';
import type { SubmissionContext } from '../context/index.js';

/** Outright purchases sit in the "buy" stage, everything else in "rent". */
export function opportunityStageFor(usageLabel: string | undefined): string {
  return usageLabel === '買斷' ? crmConfig.opportunity.stageIds.buy : crmConfig.opportunity.stageIds.rent;
}

/**
 * Static fields every opportunity carries. Mapped context values are
 * applied after these, so a stage or winning rate given in the notes wins.
 */
export function opportunityStaticFields(context: SubmissionContext): Record<string, unknown> {
  return {
    systemSource: crmConfig.systemSource,
    org: crmConfig.orgId,
    dept: crmConfig.deptId,
    ower: crmConfig.ownerId,
    opptTransType: crmConfig.opportunity.transType,
    opptStage: opportunityStageFor(context.get('usageLabel')),
    winningRate: crmConfig.opportunity.defaultWinningRate,
    currency: crmConfig.defaultCurrency,
    opptState: 0,
    _status: 'Insert',
  };
}

// ============================================================================
// Duplicate Check
// ============================================================================

const OPPORTUNITY_BILL_NUM = 'sfa_opptcard';

/** Backend code returned when no duplicate rule is configured for opportunities */
export const DUPLICATE_RULE_MISSING_CODE = '090-501-101397';

/** The backend has no opportunity duplicate rule; the check cannot run */
export function isDuplicateRuleMissingError(error: unknown): boolean {
  if (!(error instanceof ExternalServiceError)) return false;
  return (
    error.backendCode === DUPLICATE_RULE_MISSING_CODE ||
    error.message.includes(DUPLICATE_RULE_MISSING_CODE) ||
    error.message.includes('未设置查重规则')
  );
}

/**
 * Asks the backend whether this customer already has a matching
 * opportunity. Returns the first match, or null when there is none.
 */
export async function findDuplicateOpportunity(
  context: SubmissionContext,
  options: CrmCallOptions = {},
): Promise<CrmOpportunityMatch | null> {
  const query: Record<string, string> = {};
  const fields: Array<[string, string | undefined]> = [
    ['name', context.get('opportunityName')],
    ['customer', context.get('customerCode') ?? context.get('customerId')],
    ['customerName', context.get('customerName')],
    ['org', crmConfig.orgId],
    ['dept', crmConfig.deptId],
    ['ower', crmConfig.ownerId],
    ['address', context.get('installLocation')],
    ['opptDate', context.get('opportunityDate')],
    ['expectSignDate', context.get('expectSignDate')],
    ['expectSignMoney', context.get('expectSignMoney')],
    ['opptTransType', crmConfig.opportunity.transType],
    ['description', context.get('planType') ?? context.get('remark')],
  ];
  for (const [field, value] of fields) {
    if (value) query[field] = value;
  }

  const envelope = await crmPost(
    crmConfig.paths.opportunityDuplicateCheck,
    {
      systemSource: crmConfig.systemSource,
      action: 'browse',
      mainBillNum: OPPORTUNITY_BILL_NUM,
      billnum: OPPORTUNITY_BILL_NUM,
      tabInfo: [{ billNum: OPPORTUNITY_BILL_NUM, mappingType: '0' }],
      data: query,
    },
    options,
  );

  for (const record of readRecordList(envelope.data)) {
    const id = pickString(record, ['id', 'opptId']);
    if (id) {
      return { id, name: pickString(record, ['name']), stage: pickString(record, ['opptStage']) };
    }
  }
  return null;
}

// ============================================================================
// Creation
// ============================================================================

/**
 * Creates a sales opportunity from the context.
 * The context must already hold `customerId`.
 */
export async function createOpportunity(
  context: SubmissionContext,
  options: CrmCallOptions = {},
): Promise<CrmEnvelope> {
  const payload = assemblePayload(context, OPPORTUNITY_FIELD_MAPPING);
  const body = toRequestBody(payload, OPPORTUNITY_SECTIONS, opportunityStaticFields(context));
  return crmPost(crmConfig.paths.opportunityCreate, body, options);
}

export interface OpportunityResult {
  opportunityId: string | undefined;
  opportunityStage: string | undefined;
  /** Customer reference echoed by the backend; a fallback only, never authoritative */
  echoedCustomerId: string | undefined;
}

/** Read the ids the backend returned for a created opportunity */
export function readOpportunityResult(envelope: CrmEnvelope | undefined): OpportunityResult {
  const data = asRecord(envelope?.data);
  return {
    opportunityId: pickString(data, ['id']),
    opportunityStage: pickString(data, ['opptStage']),
    echoedCustomerId: readCustomerRef(data?.customer),
  };
}

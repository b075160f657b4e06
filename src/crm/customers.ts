// ============================================================================
// CRM Customers Service — Duplicate check, application, lookup by code
// ============================================================================

import { crmConfig } from './config.js';
import { ExternalServiceError } from './errors.js';
import { asRecord, crmPost, pickString, readCustomerRef, readRecordList } from './client.js';
import type { CrmCallOptions } from './client.js';
import { CUSTOMER_FIELD_MAPPING } from './field-mapping.js';
import { assemblePayload, toRequestBody } from './payload-assembler.js';
import { CUSTOMER_SECTIONS, RECORD_ID_FIELDS } from './types/index.js';
import type { CrmCustomerMatch, CrmEnvelope } from './types/index.js';
import type { SubmissionContext } from '../context/index.js';

const CUSTOMER_BILL_NUM = 'cust_customerCard';

// ============================================================================
// Duplicate Check
// ============================================================================

/**
 * Asks the backend whether a customer with this code, name or phone already
 * exists. Returns the first match, or null when there is none.
 */
export async function findDuplicateCustomer(
  context: SubmissionContext,
  options: CrmCallOptions = {},
): Promise<CrmCustomerMatch | null> {
  const query: Record<string, string> = {};
  const code = context.get('customerCode');
  const name = context.get('customerName');
  const contactTel = context.get('contactPhone');
  if (code) query.code = code;
  if (name) query.name = name;
  if (contactTel) query.contactTel = contactTel;

  const envelope = await crmPost(
    crmConfig.paths.customerDuplicateCheck,
    {
      systemSource: crmConfig.systemSource,
      action: 'browse',
      mainBillNum: CUSTOMER_BILL_NUM,
      data: query,
    },
    options,
  );

  for (const record of readRecordList(envelope.data)) {
    const match = toCustomerMatch(record);
    if (match) return match;
  }
  return null;
}

function toCustomerMatch(record: Record<string, unknown>): CrmCustomerMatch | null {
  const id = pickString(record, RECORD_ID_FIELDS) ?? readCustomerRef(record.customer);
  if (!id) return null;
  return {
    id,
    name: pickString(record, ['name', 'customerName', 'customer_name']),
    code: pickString(record, ['code', 'customerCode', 'customer_code']),
  };
}

// ============================================================================
// Customer Application
// ============================================================================

/**
 * Submits a customer application built from the context.
 * Returns the raw envelope; use extractCreatedCustomerId for the new id.
 */
export async function createCustomer(
  context: SubmissionContext,
  options: CrmCallOptions = {},
): Promise<CrmEnvelope> {
  const payload = assemblePayload(context, CUSTOMER_FIELD_MAPPING);
  const body = toRequestBody(payload, CUSTOMER_SECTIONS, {
    systemSource: crmConfig.systemSource,
    org: crmConfig.orgId,
    dept: crmConfig.deptId,
    ower: crmConfig.ownerId,
    transType: crmConfig.customerApplyTransType,
    _status: 'Insert',
  });

  return crmPost(crmConfig.paths.customerApply, body, options);
}

const CREATED_CUSTOMER_ID_FIELDS = ['customerId', 'customerID', 'custId', 'custID'] as const;

/**
 * Reads the assigned customer id from an application response.
 *
 * Only explicit customer references count, first on `data`, then on
 * `data.newBizObject`. The record's own `id` names the application, not
 * the customer, and is read by extractApplicationId instead.
 */
export function extractCreatedCustomerId(envelope: CrmEnvelope): string | undefined {
  const data = asRecord(envelope.data);
  for (const block of [data, asRecord(data?.newBizObject)]) {
    const id = readCustomerRef(block?.customer) ?? pickString(block, CREATED_CUSTOMER_ID_FIELDS);
    if (id) return id;
  }
  return undefined;
}

/** The application record's id, needed to audit it */
export function extractApplicationId(envelope: CrmEnvelope): string | undefined {
  const data = asRecord(envelope.data);
  return pickString(data, ['id']) ?? pickString(asRecord(data?.newBizObject), ['id']);
}

// ============================================================================
// Pending Applications
// ============================================================================

/** Backend code for "this customer code already has an application under review" */
export const PENDING_APPLICATION_CODE = '090-501-200376';

export function isPendingApplicationError(error: unknown): boolean {
  if (!(error instanceof ExternalServiceError)) return false;
  return (
    error.backendCode === PENDING_APPLICATION_CODE ||
    error.message.includes(PENDING_APPLICATION_CODE) ||
    error.message.includes('在申请') ||
    error.message.includes('在申請')
  );
}

/**
 * A replacement customer code for a resubmission: the first three
 * characters of the blocked code followed by MMDDHHmm (UTC), or
 * `C` + YYMMDDHHmm when there is no code to build on.
 */
export function suggestCustomerCode(blockedCode: string | undefined, now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const stamp =
    pad(now.getUTCMonth() + 1) + pad(now.getUTCDate()) + pad(now.getUTCHours()) + pad(now.getUTCMinutes());
  const base = blockedCode?.trim();
  if (base) return `${base.slice(0, 3)}${stamp}`;
  return `C${pad(now.getUTCFullYear() % 100)}${stamp}`;
}

// ============================================================================
// Audit
// ============================================================================

/**
 * Approves a submitted customer application so the customer record is
 * created. Until then the customer exists only as an application.
 */
export async function auditCustomerApplication(
  applicationId: string,
  options: CrmCallOptions = {},
): Promise<CrmEnvelope> {
  return crmPost(
    crmConfig.paths.customerAudit,
    { data: [{ systemSource: crmConfig.systemSource, id: applicationId }] },
    options,
  );
}

// ============================================================================
// Lookup by Code
// ============================================================================

/**
 * Finds a customer's id by its business code through the follow-up list,
 * which is the only list the backend lets us filter by customer code.
 * Returns undefined when no record carries that exact code.
 */
export async function lookupCustomerIdByCode(
  customerCode: string,
  options: CrmCallOptions = {},
): Promise<string | undefined> {
  const code = customerCode.toUpperCase();
  const envelope = await crmPost(
    crmConfig.paths.customerLookup,
    {
      pageIndex: 1,
      pageSize: 10,
      simpleVOs: [{ field: 'customer.code', op: 'eq', value1: code }],
    },
    options,
  );

  for (const record of readRecordList(envelope.data)) {
    const customer = asRecord(record.customer);
    const recordCode = pickString(record, ['customerCode', 'customer_code']) ?? pickString(customer, ['code']);
    if (recordCode?.toUpperCase() !== code) continue;

    const id = readCustomerRef(record.customer) ?? pickString(record, ['customerId', 'customer_id']);
    if (id) return id;
  }
  return undefined;
}

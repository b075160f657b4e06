// ============================================================================
// CRM Types — Response envelope, records and request shapes
// ============================================================================

import { z } from 'zod';

// ============================================================================
// Response Envelope
// ============================================================================

/** Envelope `code` values the backend uses for success (string or number) */
export const CRM_SUCCESS_CODES: ReadonlySet<string> = new Set(['200', '00000', '200000']);

/** Every backend response is wrapped as `{ code, message, data }` */
export const CrmEnvelopeSchema = z
  .object({
    code: z.union([z.string(), z.number()]),
    message: z.string().nullish(),
    data: z.unknown().optional(),
  })
  .passthrough();

export type CrmEnvelope = z.infer<typeof CrmEnvelopeSchema>;

export function isSuccessCode(code: string | number): boolean {
  return CRM_SUCCESS_CODES.has(String(code));
}

// ============================================================================
// Records
// ============================================================================

/** A customer returned by a duplicate check or lookup */
export interface CrmCustomerMatch {
  id: string;
  name: string | undefined;
  code: string | undefined;
}

/** An opportunity returned by the duplicate check */
export interface CrmOpportunityMatch {
  id: string;
  name: string | undefined;
  stage: string | undefined;
}

/** Fields a backend record may use for its identifier */
export const RECORD_ID_FIELDS = ['id', 'customerId', 'customerID', 'custId'] as const;

// ============================================================================
// Payload Sections
// ============================================================================

/** Wire names of the nested payload sections, per record kind */
export interface PayloadSectionNames {
  headerDefinition: string;
  characteristic: string;
}

export const OPPORTUNITY_SECTIONS: PayloadSectionNames = {
  headerDefinition: 'headDef',
  characteristic: 'opptDefineCharacter',
};

export const CUSTOMER_SECTIONS: PayloadSectionNames = {
  headerDefinition: 'customerAddApplyCharacter',
  characteristic: 'merchantCharacter',
};

// ============================================================================
// Tasks
// ============================================================================

export type FollowUpTaskKind = 'install' | 'renew' | 'filter-change';

/** A follow-up task before it is rendered into the backend's request body */
export interface FollowUpTask {
  kind: FollowUpTaskKind;
  title: string;
  typeId: string;
  customerId: string;
  customerName: string;
  opportunityId: string | undefined;
  opportunityStage: string | undefined;
  /** YYYY-MM-DD */
  startDate: string;
  /** YYYY-MM-DD */
  endDate: string;
  content: string;
}

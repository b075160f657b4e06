/**
 * Payload Assembler
 *
 * Renders a submission context into the backend's three-section payload
 * using a static field mapping. Every mapped value is written to all of its
 * destinations; absent values write nothing (never an empty string).
 *
 * Pure function — no side effects, no I/O. Output key order follows the
 * mapping, so the same context always yields the same payload.
 *
 * Consumers: customers.ts, opportunities.ts, the preview endpoint
 */

import { formatAmount } from '../parsing/index.js';
import type { SubmissionContext } from '../context/index.js';
import type { DestinationFormat, FieldMapping, PayloadSection } from './field-mapping.js';
import type { PayloadSectionNames } from './types/index.js';

export type PayloadValue = string | number;

export interface Payload {
  flatFields: Record<string, PayloadValue>;
  headerDefinitionFields: Record<string, PayloadValue>;
  characteristicFields: Record<string, PayloadValue>;
}

const SECTION_PROPERTY: Record<PayloadSection, keyof Payload> = {
  flat: 'flatFields',
  headerDefinition: 'headerDefinitionFields',
  characteristic: 'characteristicFields',
};

function formatValue(value: string, format: DestinationFormat): PayloadValue | undefined {
  switch (format) {
    case 'text':
      return value;
    case 'amount':
      return formatAmount(value);
    case 'number': {
      const amount = formatAmount(value);
      return amount === undefined ? undefined : Number(amount);
    }
  }
}

/**
 * Assemble the payload for one record kind.
 *
 * @param context - Source of canonical values (read only)
 * @param mapping - CUSTOMER_FIELD_MAPPING or OPPORTUNITY_FIELD_MAPPING
 */
export function assemblePayload(context: SubmissionContext, mapping: FieldMapping): Payload {
  const payload: Payload = { flatFields: {}, headerDefinitionFields: {}, characteristicFields: {} };

  for (const { key, destinations } of mapping) {
    const value = context.get(key);
    if (value === undefined) continue;

    for (const destination of destinations) {
      const formatted = formatValue(value, destination.format);
      if (formatted === undefined) continue;
      payload[SECTION_PROPERTY[destination.section]][destination.field] = formatted;
    }
  }

  return payload;
}

/**
 * Render the wire body: static fields first, then mapped flat fields, then
 * the two nested sections under their record-specific names.
 */
export function toRequestBody(
  payload: Payload,
  sections: PayloadSectionNames,
  staticFields: Record<string, unknown> = {},
): { data: Record<string, unknown> } {
  const data: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(staticFields)) {
    if (value !== undefined && value !== '') data[field] = value;
  }
  Object.assign(data, payload.flatFields);
  data[sections.headerDefinition] = { ...payload.headerDefinitionFields };
  data[sections.characteristic] = { ...payload.characteristicFields };
  return { data };
}

// ============================================================================
// Sales Notes Pipeline — parse → normalize → build context → submit
// ============================================================================

import { buildContext } from '../context/index.js';
import type { SubmissionContext } from '../context/index.js';
import { normalize, parse } from '../parsing/index.js';
import type { CanonicalRecord, NormalizationWarning, NormalizerTables, ParseWarning } from '../parsing/index.js';
import {
  CUSTOMER_FIELD_MAPPING,
  OPPORTUNITY_FIELD_MAPPING,
  assemblePayload,
  crmConfig,
} from '../crm/index.js';
import type { CrmGateway, Payload } from '../crm/index.js';
import { runSubmission } from './orchestrator.js';
import type { SubmissionOptions, SubmissionResult } from './types.js';

export interface PipelineOptions extends SubmissionOptions {
  /** Canonical record saved by an earlier submission for the same customer */
  priorRecord?: Readonly<Record<string, string | undefined>>;
  /** Year source for month/day dates (defaults to `now`, then the clock) */
  referenceDate?: Date;
}

export interface PipelineDeps {
  tables: NormalizerTables;
  gateway: CrmGateway;
}

export interface PreparedSubmission {
  context: SubmissionContext;
  parseWarnings: ParseWarning[];
  normalizationWarnings: NormalizationWarning[];
}

export interface SubmissionOutcome extends SubmissionResult {
  parseWarnings: ParseWarning[];
  normalizationWarnings: NormalizationWarning[];
}

export interface PreviewResult {
  context: CanonicalRecord;
  customerPayload: Payload;
  opportunityPayload: Payload;
  parseWarnings: ParseWarning[];
  normalizationWarnings: NormalizationWarning[];
}

/** Text in, populated context out. No backend calls. */
export function prepareSubmission(
  text: string,
  tables: NormalizerTables,
  options: PipelineOptions = {},
): PreparedSubmission {
  const referenceDate = options.referenceDate ?? options.now;
  const parsed = parse(text, tables);
  const normalized = normalize(parsed.lines, tables, { referenceDate });
  const normalizationWarnings = [...normalized.warnings];
  const context = buildContext(normalized.fields, options.priorRecord, {
    tables,
    rawText: text,
    defaultCurrency: crmConfig.defaultCurrency,
    referenceDate,
    onWarning: (warning) => normalizationWarnings.push(warning),
  });

  return {
    context,
    parseWarnings: parsed.warnings,
    normalizationWarnings,
  };
}

/**
 * Turn one block of sales notes into backend records.
 *
 * @throws IdentifierUnresolved (with partialResult) when the follow-up tasks
 *   cannot be tied to a customer
 */
export async function processSalesNotes(
  text: string,
  deps: PipelineDeps,
  options: PipelineOptions = {},
): Promise<SubmissionOutcome> {
  const prepared = prepareSubmission(text, deps.tables, options);

  console.log('[pipeline] Submitting sales notes', {
    customerCode: prepared.context.get('customerCode'),
    parseWarnings: prepared.parseWarnings.length,
    normalizationWarnings: prepared.normalizationWarnings.length,
  });

  const result = await runSubmission(prepared.context, deps.gateway, options);
  return {
    ...result,
    parseWarnings: prepared.parseWarnings,
    normalizationWarnings: prepared.normalizationWarnings,
  };
}

/** Everything processSalesNotes would send, without sending it */
export function previewSalesNotes(
  text: string,
  tables: NormalizerTables,
  options: PipelineOptions = {},
): PreviewResult {
  const prepared = prepareSubmission(text, tables, options);
  return {
    context: prepared.context.toRecord(),
    customerPayload: assemblePayload(prepared.context, CUSTOMER_FIELD_MAPPING),
    opportunityPayload: assemblePayload(prepared.context, OPPORTUNITY_FIELD_MAPPING),
    parseWarnings: prepared.parseWarnings,
    normalizationWarnings: prepared.normalizationWarnings,
  };
}

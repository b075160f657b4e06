/**
 * Context Builder
 *
 * Merges normalized fields with an optional prior record into a
 * SubmissionContext, then fills the keys that follow from fixed formulas.
 *
 * Precedence: fields parsed from this text > prior record > derivations.
 * One exception: an install location that reads like a customer reference
 * gives way to the known customer's address.
 * Deterministic: no clock, no I/O.
 */

import {
  formatAmount,
  latestValue,
  looksLikeAddress,
  looksLikeCustomerReference,
  normalizeRecord,
  CANONICAL_KEYS,
} from '../parsing/index.js';
import type { CanonicalRecord, NormalizationWarning, NormalizerTables, ParsedField } from '../parsing/index.js';
import { addYears, wholeYearsBetween } from './calendar.js';
import { SubmissionContext } from './submission-context.js';

export interface BuildContextOptions {
  tables: NormalizerTables;
  /** Original notes, kept on the context for payload text fields and task content */
  rawText?: string;
  /** Currency used when the notes do not name one */
  defaultCurrency?: string;
  /** Year source for month/day dates in the prior record */
  referenceDate?: Date;
  /** Receives the install-location corrections and derivations made here */
  onWarning?: (warning: NormalizationWarning) => void;
}

/**
 * Build the submission context.
 *
 * @param fields - Normalizer output; for each key the last non-absent value counts
 * @param priorRecord - Canonical record saved by an earlier submission, if any
 */
export function buildContext(
  fields: readonly ParsedField[],
  priorRecord: Readonly<Record<string, string | undefined>> | undefined,
  options: BuildContextOptions,
): SubmissionContext {
  const context = new SubmissionContext();
  const prior: CanonicalRecord = priorRecord
    ? normalizeRecord(priorRecord, options.tables, { referenceDate: options.referenceDate })
    : {};

  let installLocation = latestValue(fields, 'installLocation');
  if (installLocation && looksLikeCustomerReference(installLocation) && prior.address) {
    installLocation = prior.address;
    options.onWarning?.({
      code: 'install-location-corrected',
      key: 'installLocation',
      message: 'Install location looked like a customer reference; replaced with the known customer address',
    });
  }

  for (const key of CANONICAL_KEYS) {
    context.setIfAbsent(key, key === 'installLocation' ? installLocation : latestValue(fields, key));
  }
  for (const key of CANONICAL_KEYS) {
    context.setIfAbsent(key, prior[key]);
  }

  if (options.rawText !== undefined) {
    context.setIfAbsent('rawText', options.rawText.trim());
  }

  deriveInstallLocation(context, options);
  applyDerivations(context, options);
  return context;
}

/** Address first (parsed or known), then a plan type that holds an address */
function deriveInstallLocation(context: SubmissionContext, options: BuildContextOptions): void {
  if (context.has('installLocation')) return;

  const address = context.get('address');
  const planType = context.get('planType');
  const [value, from] = address
    ? [address, 'address']
    : planType && looksLikeAddress(planType, options.tables.addressKeywords)
      ? [planType, 'planType']
      : [undefined, undefined];
  if (!value) return;

  context.setIfAbsent('installLocation', value);
  options.onWarning?.({ code: 'derived-default', key: 'installLocation', message: `installLocation derived from ${from}` });
}

function applyDerivations(context: SubmissionContext, options: BuildContextOptions): void {
  const start = context.get('contractStartDate');
  const end = context.get('contractEndDate');

  // Years from a start/end pair that spans whole years
  if (start && end && !context.has('contractYears')) {
    const years = wholeYearsBetween(start, end);
    if (years !== undefined) context.setIfAbsent('contractYears', String(years));
  }

  const years = Number(context.get('contractYears'));
  if (start && !context.has('contractEndDate') && Number.isInteger(years) && years > 0) {
    context.setIfAbsent('contractEndDate', addYears(start, years));
  }

  if (!context.has('expectSignMoney')) {
    const total = context.get('totalAmount');
    const monthlyFee = Number(context.get('monthlyFee'));
    if (total) {
      context.setIfAbsent('expectSignMoney', total);
    } else if (Number.isFinite(monthlyFee) && monthlyFee > 0 && Number.isInteger(years) && years > 0) {
      context.setIfAbsent('expectSignMoney', formatAmount(monthlyFee * years * 12));
    }
  }

  context.setIfAbsent('expectSignDate', context.get('contractStartDate'));
  context.setIfAbsent('opportunityDate', context.get('expectSignDate'));
  context.setIfAbsent('opportunityName', context.get('installLocation') ?? context.get('customerName'));
  context.setIfAbsent('currency', options.defaultCurrency);
}

/**
 * Field Normalizer
 *
 * Turns RawLines into ParsedFields keyed by canonical key:
 * 1. Label resolution through the label table (one label may feed several keys)
 * 2. Per-key value normalization (placeholders become absent)
 * 3. Duplicate detection (the later line wins)
 * 4. Install-location correction
 * 5. Derived defaults, each flagged with a warning
 *
 * Never throws. Every finding is returned as a NormalizationWarning.
 */

import { correctInstallLocation } from './heuristics.js';
import { resolveLabel } from './tables.js';
import { findPaymentMethodByCode, normalizeValue } from './values.js';
import type { ValueOptions } from './values.js';
import type {
  CanonicalKey,
  CanonicalRecord,
  NormalizationWarning,
  NormalizeResult,
  NormalizerTables,
  ParsedField,
  RawLine,
} from './types.js';
import { isCanonicalKey } from './types.js';

export type NormalizeOptions = ValueOptions;

// ============================================================================
// Helpers
// ============================================================================

/** Last non-absent value for a key */
export function latestValue(fields: readonly ParsedField[], key: CanonicalKey): string | undefined {
  for (let i = fields.length - 1; i >= 0; i--) {
    const field = fields[i];
    if (field.canonicalKey === key && field.value !== undefined) {
      return field.value;
    }
  }
  return undefined;
}

function synthesized(key: CanonicalKey, value: string | undefined, rawValue: string): ParsedField {
  return { canonicalKey: key, rawValue, value, sourceLineIndex: null, synthesized: true };
}

/** Drop every field for `key` and append the replacement */
function replaceField(fields: ParsedField[], field: ParsedField): ParsedField[] {
  return [...fields.filter((f) => f.canonicalKey !== field.canonicalKey), field];
}

// ============================================================================
// Normalizer
// ============================================================================

/**
 * Normalize parsed lines into canonical fields.
 *
 * @param rawLines - Output of the text parser
 * @param tables - Immutable lookup tables
 * @param options - referenceDate for month/day dates
 */
export function normalize(
  rawLines: readonly RawLine[],
  tables: NormalizerTables,
  options: NormalizeOptions = {},
): NormalizeResult {
  const warnings: NormalizationWarning[] = [];
  let fields: ParsedField[] = [];

  // --- 1-2. Label resolution + value normalization ---
  for (const line of rawLines) {
    const keys = resolveLabel(line.label, tables);
    if (!keys) {
      warnings.push({
        code: 'unknown-label',
        lineIndex: line.lineIndex,
        message: `Unknown label "${line.label}"`,
      });
      continue;
    }

    keys.forEach((key, position) => {
      const outcome = normalizeValue(key, line.value, tables, options);
      fields.push({
        canonicalKey: key,
        rawValue: line.value,
        value: outcome.value,
        sourceLineIndex: line.lineIndex,
        synthesized: false,
      });

      // Secondary keys are opportunistic extractions; only the primary key reports problems
      if (outcome.issue && position === 0) {
        warnings.push({ ...outcome.issue, key, lineIndex: line.lineIndex });
      }

      if (key === 'paymentCode' && outcome.value !== undefined) {
        const method = findPaymentMethodByCode(outcome.value, tables);
        if (method) {
          fields.push({
            canonicalKey: 'paymentLabel',
            rawValue: line.value,
            value: method.label,
            sourceLineIndex: line.lineIndex,
            synthesized: false,
          });
        }
      }
    });
  }

  // --- 3. Duplicates ---
  const firstSeen = new Map<CanonicalKey, ParsedField>();
  for (const field of fields) {
    if (field.value === undefined || field.synthesized) continue;
    const earlier = firstSeen.get(field.canonicalKey);
    if (!earlier) {
      firstSeen.set(field.canonicalKey, field);
    } else if (earlier.value !== field.value && field.canonicalKey !== 'paymentLabel') {
      warnings.push({
        code: 'duplicate-field',
        key: field.canonicalKey,
        lineIndex: field.sourceLineIndex ?? undefined,
        message: `${field.canonicalKey} given more than once; the later value is used`,
      });
    }
  }

  // --- 4. Install location correction ---
  const correction = correctInstallLocation(
    {
      installLocation: latestValue(fields, 'installLocation'),
      address: latestValue(fields, 'address'),
      planType: latestValue(fields, 'planType'),
    },
    tables.addressKeywords,
  );

  if (correction.kind === 'corrected') {
    fields = replaceField(fields, synthesized('installLocation', correction.value, correction.value));
    warnings.push({
      code: 'install-location-corrected',
      key: 'installLocation',
      message: `Install location looked like a customer reference; replaced with ${correction.source}`,
    });
    if (correction.source === 'planType') {
      fields = replaceField(fields, synthesized('planType', undefined, correction.value));
      warnings.push({
        code: 'plan-type-was-address',
        key: 'planType',
        message: 'Plan type held an address and was moved to the install location',
      });
    }
  } else if (correction.kind === 'suspect') {
    warnings.push({
      code: 'install-location-suspect',
      key: 'installLocation',
      message: 'Install location looks like a customer reference and no address was available',
    });
  }

  // --- 5. Derived defaults ---
  fields = applyDerivedDefaults(fields, tables, warnings);

  return { fields, warnings };
}

function applyDerivedDefaults(
  input: ParsedField[],
  tables: NormalizerTables,
  warnings: NormalizationWarning[],
): ParsedField[] {
  let fields = input;
  const derive = (key: CanonicalKey, value: string, from: string): void => {
    fields = [...fields, synthesized(key, value, value)];
    warnings.push({ code: 'derived-default', key, message: `${key} derived from ${from}` });
  };

  // Payment code: a bare code under the plan label, then the usage mode's default
  if (latestValue(fields, 'paymentCode') === undefined) {
    const planType = latestValue(fields, 'planType');
    const usageLabel = latestValue(fields, 'usageLabel');
    const fromPlan = planType && /^\d{2}$/.test(planType) ? findPaymentMethodByCode(planType, tables) : undefined;
    const usageMode = tables.usageModes.find((mode) => mode.label === usageLabel);
    const fromUsage = usageMode ? findPaymentMethodByCode(usageMode.defaultPaymentCode, tables) : undefined;

    const method = fromPlan ?? fromUsage;
    if (method) {
      derive('paymentCode', method.code, fromPlan ? 'planType' : 'usageLabel');
      fields = [...fields, synthesized('paymentLabel', method.label, method.code)];
    }
  }

  if (latestValue(fields, 'installLocation') === undefined) {
    const address = latestValue(fields, 'address');
    if (address) derive('installLocation', address, 'address');
  }

  if (latestValue(fields, 'contractStartDate') === undefined) {
    const installDate = /^\d{4}-\d{2}-\d{2}/.exec(latestValue(fields, 'installTime') ?? '');
    if (installDate) derive('contractStartDate', installDate[0], 'installTime');
  }

  if (
    latestValue(fields, 'contractYears') === undefined &&
    latestValue(fields, 'contractEndDate') === undefined &&
    latestValue(fields, 'contractStartDate') !== undefined
  ) {
    const planType = (latestValue(fields, 'planType') ?? '').toUpperCase();
    const { extendedPlanKeywords, extended } = tables.contractYears;
    const isExtended = extendedPlanKeywords.some((keyword) => planType.includes(keyword.toUpperCase()));
    derive('contractYears', String(isExtended ? extended : tables.contractYears.default), 'planType');
  }

  return fields;
}

// ============================================================================
// Record Normalization
// ============================================================================

/**
 * Re-apply per-key value normalization to a canonical record (e.g. a prior
 * submission's saved fields). Unknown keys and absent values are dropped.
 * normalizeRecord(normalizeRecord(x)) equals normalizeRecord(x).
 */
export function normalizeRecord(
  record: Readonly<Record<string, string | undefined>>,
  tables: NormalizerTables,
  options: NormalizeOptions = {},
): CanonicalRecord {
  const result: CanonicalRecord = {};
  for (const [key, raw] of Object.entries(record)) {
    if (!isCanonicalKey(key) || raw === undefined) continue;
    const { value } = normalizeValue(key, raw, tables, options);
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}


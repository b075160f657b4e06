// ============================================================================
// Parsing Module — Barrel export
// ============================================================================

export { parse, splitLabelValue } from './text-parser.js';
export { normalize, normalizeRecord, latestValue } from './field-normalizer.js';
export type { NormalizeOptions } from './field-normalizer.js';
export {
  normalizeValue,
  formatAmount,
  parseCalendarDate,
  formatCalendarDate,
  isValidCalendarDate,
  parseContractYears,
  resolvePaymentMethod,
  findPaymentMethodByCode,
  extractCustomerCode,
  cleanCustomerName,
  VALUE_KINDS,
} from './values.js';
export type { CalendarDate, ValueOptions, ValueOutcome } from './values.js';
export { looksLikeCustomerReference, looksLikeAddress, correctInstallLocation } from './heuristics.js';
export { loadNormalizerTables, createNormalizerTables, cleanLabel, resolveLabel } from './tables.js';
export { CANONICAL_KEYS, isCanonicalKey } from './types.js';
export type {
  CanonicalKey,
  CanonicalRecord,
  RawLine,
  ParsedField,
  ParseResult,
  ParseWarning,
  NormalizationWarning,
  NormalizeResult,
  NormalizerTables,
  PaymentMethod,
  UsageMode,
} from './types.js';

/**
 * Parsing Type Definitions
 *
 * Shapes shared by the text parser, the field normalizer and the context
 * builder:
 * - CANONICAL_KEYS: every field name the rest of the system understands
 * - RawLine: one `label: value` pair as written by the author
 * - ParsedField: a raw line resolved to a canonical key and normalized
 * - ParseWarning / NormalizationWarning: non-fatal findings, returned as data
 * - NormalizerTables: immutable lookup tables loaded once at startup
 */

// ---------------------------------------------------------------------------
// Canonical Keys
// ---------------------------------------------------------------------------

/** All canonical field names */
export const CANONICAL_KEYS = [
  'customerId',
  'customerName',
  'customerCode',
  'contactPhone',
  'address',
  'usageLabel',
  'paymentCode',
  'paymentLabel',
  'planType',
  'deposit',
  'prepay',
  'monthlyFee',
  'totalAmount',
  'installLocation',
  'installTime',
  'contractStartDate',
  'contractEndDate',
  'contractYears',
  'opptId',
  'opptStage',
  'opportunityName',
  'opportunityDate',
  'expectSignDate',
  'expectSignMoney',
  'currency',
  'winningRate',
  'remark',
  'rawText',
] as const;

export type CanonicalKey = typeof CANONICAL_KEYS[number];

const CANONICAL_KEY_SET: ReadonlySet<string> = new Set(CANONICAL_KEYS);

export function isCanonicalKey(value: string): value is CanonicalKey {
  return CANONICAL_KEY_SET.has(value);
}

/** Canonical key -> value. A missing key means the value is absent. */
export type CanonicalRecord = Partial<Record<CanonicalKey, string>>;

// ---------------------------------------------------------------------------
// Parser Output
// ---------------------------------------------------------------------------

export interface RawLine {
  readonly label: string;
  readonly value: string;
  /** Zero-based index of the line that carried the label */
  readonly lineIndex: number;
}

export type ParseWarningCode = 'empty-input' | 'unrecognized-line' | 'missing-value';

export interface ParseWarning {
  code: ParseWarningCode;
  lineIndex: number | null;
  message: string;
}

export interface ParseResult {
  lines: RawLine[];
  warnings: ParseWarning[];
}

// ---------------------------------------------------------------------------
// Normalizer Output
// ---------------------------------------------------------------------------

export interface ParsedField {
  readonly canonicalKey: CanonicalKey;
  readonly rawValue: string;
  /** Normalized value; undefined when the field resolved to absent */
  readonly value: string | undefined;
  /** null for values synthesized by a derived default */
  readonly sourceLineIndex: number | null;
  readonly synthesized: boolean;
}

export type NormalizationWarningCode =
  | 'unknown-label'
  | 'placeholder'
  | 'invalid-value'
  | 'invalid-amount'
  | 'invalid-date'
  | 'unknown-payment-method'
  | 'unknown-usage-mode'
  | 'duplicate-field'
  | 'install-location-corrected'
  | 'install-location-suspect'
  | 'plan-type-was-address'
  | 'derived-default';

export interface NormalizationWarning {
  code: NormalizationWarningCode;
  key?: CanonicalKey;
  lineIndex?: number;
  message: string;
}

export interface NormalizeResult {
  fields: ParsedField[];
  warnings: NormalizationWarning[];
}

// ---------------------------------------------------------------------------
// Lookup Tables
// ---------------------------------------------------------------------------

export interface PaymentMethod {
  readonly code: string;
  readonly label: string;
  readonly aliases: readonly string[];
}

export interface UsageMode {
  readonly label: string;
  readonly synonyms: readonly string[];
  readonly defaultPaymentCode: string;
}

export interface ContractYearDefaults {
  readonly default: number;
  readonly extended: number;
  readonly extendedPlanKeywords: readonly string[];
}

export interface NormalizerTables {
  /** Cleaned label -> canonical keys it feeds */
  readonly labels: ReadonlyMap<string, readonly CanonicalKey[]>;
  /** Lower-cased placeholder tokens */
  readonly placeholders: ReadonlySet<string>;
  readonly paymentMethods: readonly PaymentMethod[];
  readonly usageModes: readonly UsageMode[];
  readonly addressKeywords: readonly string[];
  readonly contractYears: ContractYearDefaults;
}

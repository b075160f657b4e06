/**
 * Value Normalizers
 *
 * One normalizer per value kind (amount, date, contract years, payment
 * method, usage mode, ...). Every normalizer is total and idempotent:
 * feeding its own output back in returns the same value.
 *
 * Pure functions. No I/O, no logging; problems come back as ValueIssues.
 */

import type { CanonicalKey, NormalizationWarningCode, NormalizerTables, PaymentMethod } from './types.js';

export interface ValueIssue {
  code: NormalizationWarningCode;
  message: string;
}

export interface ValueOutcome {
  value: string | undefined;
  issue?: ValueIssue;
}

export interface ValueOptions {
  /** Supplies the year for month/day dates such as "11月25日" */
  referenceDate?: Date;
}

export type ValueKind =
  | 'text'
  | 'verbatim'
  | 'customerCode'
  | 'customerName'
  | 'amount'
  | 'date'
  | 'dateTime'
  | 'years'
  | 'paymentCode'
  | 'usage'
  | 'currency'
  | 'percentage';

/** How each canonical key's value is normalized */
export const VALUE_KINDS: Readonly<Record<CanonicalKey, ValueKind>> = Object.freeze({
  customerId: 'text',
  customerName: 'customerName',
  customerCode: 'customerCode',
  contactPhone: 'text',
  address: 'text',
  usageLabel: 'usage',
  paymentCode: 'paymentCode',
  paymentLabel: 'text',
  planType: 'text',
  deposit: 'amount',
  prepay: 'amount',
  monthlyFee: 'amount',
  totalAmount: 'amount',
  installLocation: 'text',
  installTime: 'dateTime',
  contractStartDate: 'date',
  contractEndDate: 'date',
  contractYears: 'years',
  opptId: 'text',
  opptStage: 'text',
  opportunityName: 'text',
  opportunityDate: 'date',
  expectSignDate: 'date',
  expectSignMoney: 'amount',
  currency: 'currency',
  winningRate: 'percentage',
  remark: 'text',
  rawText: 'verbatim',
});

// ============================================================================
// Text & Placeholders
// ============================================================================

/** Trim and collapse runs of spaces, tabs and ideographic spaces (newlines kept). */
export function normalizeText(value: string): string {
  return value
    .split('\n')
    .map((line) => line.replace(/[ \t　]+/g, ' ').trim())
    .join('\n')
    .trim();
}

export function isPlaceholder(value: string, tables: NormalizerTables): boolean {
  return tables.placeholders.has(value.trim().toLowerCase());
}

// ============================================================================
// Customer Code & Name
// ============================================================================

const CUSTOMER_CODE_RE = /\bC\d{3,}\b/i;
const CUSTOMER_CODE_GLOBAL_RE = /\bC\d{3,}\b/gi;
const PHONE_RUN_RE = /\d{6,}/g;

/** First customer-code token ("C" followed by 3+ digits), upper-cased. */
export function extractCustomerCode(value: string): string | undefined {
  const match = CUSTOMER_CODE_RE.exec(value);
  return match ? match[0].toUpperCase() : undefined;
}

/** Customer name with any customer code and phone number removed. */
export function cleanCustomerName(value: string): string | undefined {
  const name = value
    .replace(CUSTOMER_CODE_GLOBAL_RE, ' ')
    .replace(PHONE_RUN_RE, ' ')
    .replace(/\s+/g, ' ')
    .replace(/^[\s\-\/,，、|]+|[\s\-\/,，、|]+$/g, '')
    .trim();
  return name || undefined;
}

// ============================================================================
// Amounts
// ============================================================================

const CURRENCY_MARKERS = /MOP|HKD|RMB|patacas?|澳門元|澳门元|澳元|港幣|港币|港元|元|\$|＄|¥|￥/gi;
const PRODUCT_RE = /^(\d+(?:\.\d+)?)[*xX×](\d+(?:\.\d+)?)$/;
const DECIMAL_RE = /^-?\d+(?:\.\d+)?$/;

function renderNumber(value: number): string {
  return String(parseFloat(value.toFixed(6)));
}

/**
 * Canonical decimal string for an amount, or undefined when the text is not
 * a number once currency markers and separators are gone.
 *
 * Accepts "MOP 1,288.00", "288*24" (product) and "288*24=6912" (result).
 * Integers render without decimals; trailing zeros are dropped.
 */
export function formatAmount(value: string | number | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? renderNumber(value) : undefined;
  }

  let text = value.trim();
  const equalsAt = text.lastIndexOf('=');
  if (equalsAt !== -1) {
    text = text.slice(equalsAt + 1);
  }

  text = text.replace(CURRENCY_MARKERS, '').replace(/[,，\s]/g, '');
  if (!text) return undefined;

  const product = PRODUCT_RE.exec(text);
  if (product) {
    return renderNumber(Number(product[1]) * Number(product[2]));
  }
  if (DECIMAL_RE.test(text)) {
    return renderNumber(Number(text));
  }
  return undefined;
}

// ============================================================================
// Dates
// ============================================================================

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const STANDARD_DATE_RE = /(\d{4})[./-](\d{1,2})[./-](\d{1,2})/;
const CJK_DATE_RE = /(\d{4})\s*年\s*(\d{1,2})\s*月\s*(\d{1,2})\s*[日號号]?/;
const COMPACT_DATE_RE = /(?<!\d)((?:19|20)\d{2})(\d{2})(\d{2})(?!\d)/;
const MONTH_DAY_RE = /(\d{1,2})\s*月\s*(\d{1,2})\s*[日號号]?/;
const TIME_RE = /(?<!\d)(\d{1,2})[:：](\d{2})(?!\d)/;

export function isValidCalendarDate({ year, month, day }: CalendarDate): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return candidate.getUTCFullYear() === year && candidate.getUTCMonth() === month - 1 && candidate.getUTCDate() === day;
}

export function formatCalendarDate({ year, month, day }: CalendarDate): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/** Find a calendar date in free text. Month/day-only text takes the reference year. */
export function parseCalendarDate(value: string, referenceDate: Date = new Date()): CalendarDate | undefined {
  const candidates: RegExpExecArray[] = [];
  for (const re of [STANDARD_DATE_RE, CJK_DATE_RE, COMPACT_DATE_RE]) {
    const match = re.exec(value);
    if (match) candidates.push(match);
  }

  const full = candidates[0];
  if (full) {
    const date = { year: Number(full[1]), month: Number(full[2]), day: Number(full[3]) };
    return isValidCalendarDate(date) ? date : undefined;
  }

  const monthDay = MONTH_DAY_RE.exec(value);
  if (monthDay) {
    const date = {
      year: referenceDate.getFullYear(),
      month: Number(monthDay[1]),
      day: Number(monthDay[2]),
    };
    return isValidCalendarDate(date) ? date : undefined;
  }
  return undefined;
}

function normalizeDate(value: string, options: ValueOptions): ValueOutcome {
  const date = parseCalendarDate(value, options.referenceDate);
  if (!date) {
    return { value: undefined, issue: { code: 'invalid-date', message: 'Value is not a valid date' } };
  }
  return { value: formatCalendarDate(date) };
}

function normalizeDateTime(value: string, options: ValueOptions): ValueOutcome {
  const date = parseCalendarDate(value, options.referenceDate);
  if (!date) {
    // Free-form install times ("下週一上午") stay readable in the task content
    return {
      value: normalizeText(value),
      issue: { code: 'invalid-date', message: 'Install time has no recognisable date; kept as text' },
    };
  }

  const time = TIME_RE.exec(value.replace(STANDARD_DATE_RE, ''));
  const base = formatCalendarDate(date);
  if (!time) return { value: base };

  const hours = Number(time[1]);
  const minutes = Number(time[2]);
  if (hours > 23 || minutes > 59) return { value: base };
  return { value: `${base} ${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}` };
}

// ============================================================================
// Contract Years
// ============================================================================

const CHINESE_NUMERALS: Readonly<Record<string, number>> = {
  一: 1,
  二: 2,
  兩: 2,
  两: 2,
  三: 3,
  四: 4,
  五: 5,
  六: 6,
  七: 7,
  八: 8,
  九: 9,
  十: 10,
};

export function parseContractYears(value: string): number | undefined {
  const digits = /\d+/.exec(value);
  if (digits) {
    const years = parseInt(digits[0], 10);
    return years > 0 ? years : undefined;
  }
  for (const char of value) {
    const numeral = CHINESE_NUMERALS[char];
    if (numeral !== undefined) return numeral;
  }
  return undefined;
}

// ============================================================================
// Payment Method & Usage Mode
// ============================================================================

export function findPaymentMethodByCode(code: string, tables: NormalizerTables): PaymentMethod | undefined {
  return tables.paymentMethods.find((method) => method.code === code);
}

/**
 * Resolve free text to a payment method. Only the first option of a
 * "/"- or "、"-separated list counts ("03/07" means 03).
 */
export function resolvePaymentMethod(value: string, tables: NormalizerTables): PaymentMethod | undefined {
  const first = value.split(/[\/、,，|]/)[0]?.trim() ?? '';
  if (!first) return undefined;

  const code = /^(\d{1,2})(?!\d)/.exec(first);
  if (code) {
    return findPaymentMethodByCode(code[1].padStart(2, '0'), tables);
  }

  const exact = tables.paymentMethods.find(
    (method) => method.label === first || method.aliases.includes(first),
  );
  if (exact) return exact;

  // Longest contained keyword, so "信用卡分期付款" beats "信用卡"
  let best: { method: PaymentMethod; length: number } | undefined;
  for (const method of tables.paymentMethods) {
    for (const keyword of [method.label, ...method.aliases]) {
      if (first.includes(keyword) && (!best || keyword.length > best.length)) {
        best = { method, length: keyword.length };
      }
    }
  }
  return best?.method;
}

function normalizePaymentCode(value: string, tables: NormalizerTables): ValueOutcome {
  const method = resolvePaymentMethod(value, tables);
  if (!method) {
    return {
      value: undefined,
      issue: { code: 'unknown-payment-method', message: 'Payment method not recognised' },
    };
  }
  return { value: method.code };
}

function normalizeUsageLabel(value: string, tables: NormalizerTables): ValueOutcome {
  const text = normalizeText(value);
  const lower = text.toLowerCase();

  const exact = tables.usageModes.find(
    (mode) => mode.label === text || mode.synonyms.some((synonym) => synonym.toLowerCase() === lower),
  );
  if (exact) return { value: exact.label };

  const contained = tables.usageModes.find((mode) =>
    mode.synonyms.some((synonym) => lower.includes(synonym.toLowerCase())),
  );
  if (contained) return { value: contained.label };

  return {
    value: text,
    issue: { code: 'unknown-usage-mode', message: 'Usage mode not recognised; kept as written' },
  };
}

// ============================================================================
// Currency & Percentage
// ============================================================================

export function normalizeCurrency(value: string): string {
  if (/澳|mop/i.test(value)) return 'MOP';
  if (/港|hkd/i.test(value)) return 'HKD';
  if (/人民幣|人民币|rmb|cny/i.test(value)) return 'CNY';
  return normalizeText(value).toUpperCase();
}

function normalizePercentage(value: string): ValueOutcome {
  const match = /\d+(?:\.\d+)?/.exec(value);
  if (!match) {
    return { value: undefined, issue: { code: 'invalid-value', message: 'Winning rate is not a number' } };
  }
  return { value: renderNumber(Number(match[0])) };
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Normalize one value for a canonical key.
 *
 * Placeholder tokens ("--", "暫無", "N/A", ...) always resolve to absent.
 */
export function normalizeValue(
  key: CanonicalKey,
  rawValue: string,
  tables: NormalizerTables,
  options: ValueOptions = {},
): ValueOutcome {
  const trimmed = rawValue.trim();
  if (!trimmed) return { value: undefined };
  if (isPlaceholder(trimmed, tables)) {
    return { value: undefined, issue: { code: 'placeholder', message: 'Placeholder value treated as absent' } };
  }

  switch (VALUE_KINDS[key]) {
    case 'text':
      return { value: normalizeText(trimmed) };
    case 'verbatim':
      return { value: trimmed };
    case 'customerCode': {
      const code = extractCustomerCode(trimmed);
      return code
        ? { value: code }
        : { value: undefined, issue: { code: 'invalid-value', message: 'No customer code found' } };
    }
    case 'customerName':
      return { value: cleanCustomerName(trimmed) };
    case 'amount': {
      const amount = formatAmount(trimmed);
      return amount !== undefined
        ? { value: amount }
        : { value: undefined, issue: { code: 'invalid-amount', message: `${key} is not a number` } };
    }
    case 'date':
      return normalizeDate(trimmed, options);
    case 'dateTime':
      return normalizeDateTime(trimmed, options);
    case 'years': {
      const years = parseContractYears(trimmed);
      return years !== undefined
        ? { value: String(years) }
        : { value: undefined, issue: { code: 'invalid-value', message: 'Contract years is not a number' } };
    }
    case 'paymentCode':
      return normalizePaymentCode(trimmed, tables);
    case 'usage':
      return normalizeUsageLabel(trimmed, tables);
    case 'currency':
      return { value: normalizeCurrency(trimmed) };
    case 'percentage':
      return normalizePercentage(trimmed);
  }
}

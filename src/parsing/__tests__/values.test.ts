// ============================================================================
// Tests: Value Normalizers — amounts, dates, payment codes, usage modes
// ============================================================================

import { describe, test, expect } from 'vitest';
import {
  cleanCustomerName,
  extractCustomerCode,
  formatAmount,
  normalizeValue,
  parseCalendarDate,
  resolvePaymentMethod,
} from '../values.js';
import { loadNormalizerTables } from '../tables.js';
import type { CanonicalKey } from '../types.js';

const tables = loadNormalizerTables();

// ============================================================================
// Amounts
// ============================================================================

describe('formatAmount', () => {
  test('strips currency markers and thousands separators', () => {
    expect(formatAmount('MOP 1,288.00')).toBe('1288');
    expect(formatAmount('$1,000.50')).toBe('1000.5');
  });

  test('computes products and takes the result after "="', () => {
    expect(formatAmount('288*24')).toBe('6912');
    expect(formatAmount('288*24=6912')).toBe('6912');
  });

  test('renders numbers', () => {
    expect(formatAmount(12.5)).toBe('12.5');
    expect(formatAmount(288 * 2 * 12)).toBe('6912');
  });

  test('returns undefined for non-numeric text', () => {
    expect(formatAmount('abc')).toBeUndefined();
    expect(formatAmount('')).toBeUndefined();
    expect(formatAmount(undefined)).toBeUndefined();
  });
});

// ============================================================================
// Dates
// ============================================================================

describe('parseCalendarDate', () => {
  test('reads standard, CJK and compact dates', () => {
    expect(parseCalendarDate('2025/11/25')).toEqual({ year: 2025, month: 11, day: 25 });
    expect(parseCalendarDate('2025年11月25日')).toEqual({ year: 2025, month: 11, day: 25 });
    expect(parseCalendarDate('20251125')).toEqual({ year: 2025, month: 11, day: 25 });
  });

  test('month/day dates take the reference year', () => {
    expect(parseCalendarDate('11月25日', new Date(2026, 2, 1))).toEqual({ year: 2026, month: 11, day: 25 });
  });

  test('rejects impossible dates', () => {
    expect(parseCalendarDate('2025-02-30')).toBeUndefined();
  });
});

describe('normalizeValue: dates', () => {
  test('contract dates become YYYY-MM-DD', () => {
    expect(normalizeValue('contractStartDate', '2025.1.5', tables).value).toBe('2025-01-05');
  });

  test('install time keeps hours and minutes', () => {
    expect(normalizeValue('installTime', '2025-11-25 9:05', tables).value).toBe('2025-11-25 09:05');
  });

  test('install time without a date is kept as text with a warning', () => {
    const outcome = normalizeValue('installTime', '下週一上午', tables);
    expect(outcome.value).toBe('下週一上午');
    expect(outcome.issue?.code).toBe('invalid-date');
  });

  test('an invalid contract date is absent', () => {
    const outcome = normalizeValue('contractEndDate', '不確定', tables);
    expect(outcome.value).toBeUndefined();
    expect(outcome.issue?.code).toBe('invalid-date');
  });
});

// ============================================================================
// Customer
// ============================================================================

describe('customer code and name', () => {
  test('extracts the first code, upper-cased', () => {
    expect(extractCustomerCode('c45636 測試')).toBe('C45636');
    expect(extractCustomerCode('測試客戶')).toBeUndefined();
  });

  test('removes codes and phone numbers from names', () => {
    expect(cleanCustomerName('C45636 測試客戶 66123456')).toBe('測試客戶');
    expect(cleanCustomerName('C45636')).toBeUndefined();
  });
});

// ============================================================================
// Payment Method & Usage Mode
// ============================================================================

describe('resolvePaymentMethod', () => {
  test('only the first option of a list counts', () => {
    expect(resolvePaymentMethod('03/07', tables)?.code).toBe('03');
  });

  test('pads single-digit codes', () => {
    expect(resolvePaymentMethod('7', tables)?.code).toBe('07');
  });

  test('matches labels, aliases and contained keywords', () => {
    expect(resolvePaymentMethod('每月收費', tables)?.code).toBe('07');
    expect(resolvePaymentMethod('信用卡分期付款', tables)?.code).toBe('02');
    expect(resolvePaymentMethod('用信用卡付', tables)?.code).toBe('02');
  });

  test('unknown codes and words resolve to nothing', () => {
    expect(resolvePaymentMethod('08', tables)).toBeUndefined();
    expect(resolvePaymentMethod('foo', tables)).toBeUndefined();
  });
});

describe('normalizeValue: payment code and usage', () => {
  test('payment code normalizes to the two-digit code', () => {
    expect(normalizeValue('paymentCode', '03 銀行卡自動轉賬', tables)).toEqual({ value: '03' });
  });

  test('unknown payment method is absent with a warning', () => {
    const outcome = normalizeValue('paymentCode', '現金', tables);
    expect(outcome.value).toBeUndefined();
    expect(outcome.issue?.code).toBe('unknown-payment-method');
  });

  test('usage synonyms map to the canonical label', () => {
    expect(normalizeValue('usageLabel', '租', tables).value).toBe('租用');
    expect(normalizeValue('usageLabel', 'Rent', tables).value).toBe('租用');
    expect(normalizeValue('usageLabel', '長期租賃方案', tables).value).toBe('租用');
    expect(normalizeValue('usageLabel', '購買', tables).value).toBe('買斷');
  });

  test('unknown usage is kept as written with a warning', () => {
    expect(normalizeValue('usageLabel', '借用', tables)).toEqual({
      value: '借用',
      issue: { code: 'unknown-usage-mode', message: 'Usage mode not recognised; kept as written' },
    });
  });
});

// ============================================================================
// Placeholders & Idempotence
// ============================================================================

describe('placeholders', () => {
  test('placeholder tokens are absent regardless of key', () => {
    expect(normalizeValue('monthlyFee', '--', tables)).toEqual({
      value: undefined,
      issue: { code: 'placeholder', message: 'Placeholder value treated as absent' },
    });
    expect(normalizeValue('address', 'N/A', tables).value).toBeUndefined();
    expect(normalizeValue('remark', '暫無', tables).value).toBeUndefined();
  });

  test('empty values are absent without a warning', () => {
    expect(normalizeValue('remark', '   ', tables)).toEqual({ value: undefined });
  });
});

describe('idempotence', () => {
  const samples: Array<[CanonicalKey, string]> = [
    ['monthlyFee', 'MOP 1,288.00'],
    ['contractStartDate', '2025年11月25日'],
    ['installTime', '2025/11/25 9:05'],
    ['contractYears', '兩年'],
    ['paymentCode', '信用卡分期付款'],
    ['usageLabel', 'rental'],
    ['customerCode', 'c45636 測試'],
    ['customerName', 'C45636 測試客戶 66123456'],
    ['currency', '澳門元'],
    ['winningRate', '50%'],
    ['remark', '  兩   行\n備注  '],
  ];

  test.each(samples)('%s: normalizing the output again changes nothing', (key, raw) => {
    const once = normalizeValue(key, raw, tables).value;
    expect(once).toBeDefined();
    expect(normalizeValue(key, once ?? '', tables).value).toBe(once);
  });
});

// ============================================================================
// Tests: Install-Location Heuristics
// ============================================================================

import { describe, test, expect } from 'vitest';
import { correctInstallLocation, looksLikeAddress, looksLikeCustomerReference } from '../heuristics.js';
import { loadNormalizerTables } from '../tables.js';

const keywords = loadNormalizerTables().addressKeywords;
const CUSTOMER_LINE = 'C45636 陳大文 66123456';

describe('looksLikeCustomerReference', () => {
  test('recognises a customer code with name and phone', () => {
    expect(looksLikeCustomerReference(CUSTOMER_LINE)).toBe(true);
  });

  test('does not flag a street address', () => {
    expect(looksLikeCustomerReference('皇朝廣場15樓A座')).toBe(false);
  });
});

describe('looksLikeAddress', () => {
  test('needs an address keyword', () => {
    expect(looksLikeAddress('皇朝廣場15樓A座', keywords)).toBe(true);
    expect(looksLikeAddress('HS990 套餐', keywords)).toBe(false);
  });

  test('a customer reference is never an address', () => {
    expect(looksLikeAddress('C45636 廣場', keywords)).toBe(false);
  });
});

describe('correctInstallLocation', () => {
  test('leaves a real location alone', () => {
    expect(correctInstallLocation({ installLocation: '新口岸宋玉生廣場180號' }, keywords)).toEqual({ kind: 'unchanged' });
  });

  test('replaces a customer reference with the address', () => {
    expect(
      correctInstallLocation({ installLocation: CUSTOMER_LINE, address: '新口岸宋玉生廣場180號' }, keywords),
    ).toEqual({ kind: 'corrected', value: '新口岸宋玉生廣場180號', source: 'address' });
  });

  test('falls back to an address-shaped plan type', () => {
    expect(
      correctInstallLocation({ installLocation: CUSTOMER_LINE, planType: '皇朝廣場15樓A座' }, keywords),
    ).toEqual({ kind: 'corrected', value: '皇朝廣場15樓A座', source: 'planType' });
  });

  test('reports a suspect value when no candidate is address-shaped', () => {
    expect(
      correctInstallLocation({ installLocation: CUSTOMER_LINE, address: 'C45636 另一位' }, keywords),
    ).toEqual({ kind: 'suspect' });
  });
});

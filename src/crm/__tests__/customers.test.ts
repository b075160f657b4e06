// ============================================================================
// Tests: CRM Customers Service — duplicate check, application, lookup by code
// ============================================================================

import { describe, test, expect, vi, beforeEach } from 'vitest';

vi.mock('../config.js', async () => {
  const { testCrmConfig } = await import('./test-config.js');
  return { crmConfig: testCrmConfig, devPrefix: (text: string) => `[TEST] ${text}` };
});

import {
  auditCustomerApplication,
  createCustomer,
  extractApplicationId,
  extractCreatedCustomerId,
  findDuplicateCustomer,
  isPendingApplicationError,
  lookupCustomerIdByCode,
  suggestCustomerCode,
} from '../customers.js';
import { ExternalServiceError } from '../errors.js';
import { SubmissionContext } from '../../context/index.js';
import { jsonResponse, sentBody } from './test-config.js';

const mockFetch = vi.fn();

beforeEach(() => {
  vi.stubGlobal('fetch', mockFetch);
  mockFetch.mockReset();
});

// ============================================================================
// findDuplicateCustomer
// ============================================================================

describe('findDuplicateCustomer', () => {
  const context = new SubmissionContext({ customerCode: 'C45636', customerName: '測試客戶', contactPhone: '66123456' });

  test('queries by code, name and phone and returns the first match', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ code: '200', data: { recordList: [{ id: 'cust-9', name: '測試客戶', code: 'C45636' }] } }),
    );

    const match = await findDuplicateCustomer(context);

    expect(match).toEqual({ id: 'cust-9', name: '測試客戶', code: 'C45636' });
    expect(mockFetch.mock.calls[0][0]).toBe(
      'https://crm.test.local/yonbip/crm/bill/custcheckrepeat?access_token=test-token',
    );
    expect(sentBody(mockFetch)).toEqual({
      systemSource: 'test-source',
      action: 'browse',
      mainBillNum: 'cust_customerCard',
      data: { code: 'C45636', name: '測試客戶', contactTel: '66123456' },
    });
  });

  test('returns null when nothing matches', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ code: '200', data: [] }));
    await expect(findDuplicateCustomer(context)).resolves.toBeNull();
  });

  test('skips records without an id', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ code: '200', data: [{ name: 'no id' }] }));
    await expect(findDuplicateCustomer(context)).resolves.toBeNull();
  });
});

// ============================================================================
// createCustomer
// ============================================================================

describe('createCustomer', () => {
  test('sends static fields, mapped fields and both sections', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ code: '200', data: { id: 'apply-1' } }));
    const context = new SubmissionContext({
      customerCode: 'C45636',
      customerName: '測試客戶',
      usageLabel: '租用',
      monthlyFee: '288',
      paymentCode: '07',
      paymentLabel: '每月收費',
    });

    await createCustomer(context, { timeoutMs: 1000 });

    expect(sentBody(mockFetch)).toEqual({
      data: {
        systemSource: 'test-source',
        org: 'org-1',
        dept: 'dept-1',
        ower: 'owner-1',
        transType: 'cust-trans',
        _status: 'Insert',
        custCode: 'C45636',
        name: '測試客戶',
        shortname: '測試客戶',
        largeText1: '租用',
        largeText3: '288',
        'merchantAppliedDetail!payway': '07',
        customerAddApplyCharacter: { payway: '07', paymentLabel: '每月收費' },
        merchantCharacter: { customerDefine8: '租用' },
      },
    });
  });
});

describe('extractCreatedCustomerId', () => {
  test('prefers the customer reference over the application id', () => {
    expect(extractCreatedCustomerId({ code: '200', data: { id: 'apply-1', customer: 'cust-1' } })).toBe('cust-1');
    expect(extractCreatedCustomerId({ code: '200', data: { id: 'apply-1', customer: { id: 'cust-2' } } })).toBe('cust-2');
  });

  test('never takes the application id for the customer id', () => {
    expect(extractCreatedCustomerId({ code: '200', data: { id: 'apply-1' } })).toBeUndefined();
    expect(extractCreatedCustomerId({ code: '200', data: { newBizObject: { id: 'apply-2' } } })).toBeUndefined();
  });

  test('reads the customer id fields on data, then on newBizObject', () => {
    expect(extractCreatedCustomerId({ code: '200', data: { id: 'apply-1', custID: 'cust-3' } })).toBe('cust-3');
    expect(extractCreatedCustomerId({ code: '200', data: { newBizObject: { customerId: 42 } } })).toBe('42');
  });

  test('returns undefined when the response carries no id', () => {
    expect(extractCreatedCustomerId({ code: '200', data: null })).toBeUndefined();
  });
});

describe('extractApplicationId', () => {
  test('reads data.id, then newBizObject.id', () => {
    expect(extractApplicationId({ code: '200', data: { id: 'apply-1', customer: 'cust-1' } })).toBe('apply-1');
    expect(extractApplicationId({ code: '200', data: { newBizObject: { id: 'apply-2' } } })).toBe('apply-2');
    expect(extractApplicationId({ code: '200', data: {} })).toBeUndefined();
  });
});

// ============================================================================
// auditCustomerApplication
// ============================================================================

describe('auditCustomerApplication', () => {
  test('posts the application id to the audit endpoint', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ code: '200', data: { auditStatus: 1 } }));

    const envelope = await auditCustomerApplication('apply-1', { timeoutMs: 1000 });

    expect(envelope.data).toEqual({ auditStatus: 1 });
    expect(mockFetch.mock.calls[0][0]).toBe(
      'https://crm.test.local/yonbip/crm/customeraddapply/audit?access_token=test-token',
    );
    expect(sentBody(mockFetch)).toEqual({ data: [{ systemSource: 'test-source', id: 'apply-1' }] });
  });
});

// ============================================================================
// Pending Applications
// ============================================================================

describe('isPendingApplicationError', () => {
  test('recognises the pending-application code and message', () => {
    const byCode = new ExternalServiceError('CRM API rejected request (090-501-200376): locked', 200, '', {
      backendCode: '090-501-200376',
    });
    const byMessage = new ExternalServiceError('CRM API rejected request (999): 該客戶編碼正在申请中', 200, '');

    expect(isPendingApplicationError(byCode)).toBe(true);
    expect(isPendingApplicationError(byMessage)).toBe(true);
  });

  test('ignores other failures', () => {
    expect(isPendingApplicationError(new ExternalServiceError('CRM API error: 500 Internal Server Error', 500, ''))).toBe(
      false,
    );
    expect(isPendingApplicationError(new Error('090-501-200376'))).toBe(false);
  });
});

describe('suggestCustomerCode', () => {
  const now = new Date('2025-11-25T08:05:00Z');

  test('keeps the first three characters and appends MMDDHHmm', () => {
    expect(suggestCustomerCode('C45636', now)).toBe('C4511250805');
  });

  test('builds a fresh code when there is none', () => {
    expect(suggestCustomerCode(undefined, now)).toBe('C2511250805');
  });
});

// ============================================================================
// lookupCustomerIdByCode
// ============================================================================

describe('lookupCustomerIdByCode', () => {
  test('returns the id of the record whose code matches exactly', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        code: '200',
        data: {
          recordList: [
            { customer: { id: 'cust-other', code: 'C99999' } },
            { customerCode: 'C45636', customer: 'cust-1' },
          ],
        },
      }),
    );

    await expect(lookupCustomerIdByCode('c45636')).resolves.toBe('cust-1');
    expect(sentBody(mockFetch)).toEqual({
      pageIndex: 1,
      pageSize: 10,
      simpleVOs: [{ field: 'customer.code', op: 'eq', value1: 'C45636' }],
    });
  });

  test('returns undefined when no record matches', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ code: '200', data: { recordList: [] } }));
    await expect(lookupCustomerIdByCode('C45636')).resolves.toBeUndefined();
  });
});

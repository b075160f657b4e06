// ============================================================================
// Tests: CRM Tasks — follow-up planning and task request bodies
// ============================================================================

import { describe, test, expect, vi, beforeEach } from 'vitest';

vi.mock('../config.js', async () => {
  const { testCrmConfig } = await import('./test-config.js');
  return { crmConfig: testCrmConfig, devPrefix: (text: string) => `[TEST] ${text}` };
});

import { createTask, findNextReplacement, planFollowUpTasks, toTaskRequestBody } from '../tasks.js';
import { SubmissionContext } from '../../context/index.js';
import { jsonResponse, sentBody } from './test-config.js';
import type { FollowUpTask } from '../types/index.js';

const mockFetch = vi.fn();

beforeEach(() => {
  vi.stubGlobal('fetch', mockFetch);
  mockFetch.mockReset();
});

// ============================================================================
// planFollowUpTasks
// ============================================================================

describe('planFollowUpTasks', () => {
  test('plans an install task and a renewal task 14 days before the contract ends', () => {
    const context = new SubmissionContext({
      customerName: '測試客戶',
      installTime: '2025-11-25 10:00',
      contractEndDate: '2027-11-25',
      rawText: '客戶: C45636 測試客戶',
    });

    const tasks = planFollowUpTasks({
      context,
      customerId: 'cust-1',
      opportunityId: 'oppt-1',
      opportunityStage: 'stage-rent',
    });

    expect(tasks).toEqual([
      {
        kind: 'install',
        title: '[TEST] 新增項目 測試客戶',
        typeId: 'task-install',
        customerId: 'cust-1',
        customerName: '測試客戶',
        opportunityId: 'oppt-1',
        opportunityStage: 'stage-rent',
        startDate: '2025-11-25',
        endDate: '2025-11-25',
        content: '客戶: C45636 測試客戶',
      },
      {
        kind: 'renew',
        title: '[TEST] 續約跟進 測試客戶',
        typeId: 'task-renew',
        customerId: 'cust-1',
        customerName: '測試客戶',
        opportunityId: 'oppt-1',
        opportunityStage: 'stage-rent',
        startDate: '2027-11-11',
        endDate: '2027-11-11',
        content: '合約到期日：2027-11-25',
      },
    ]);
  });

  test('without dates or notes, starts today with a summary', () => {
    const context = new SubmissionContext({
      customerCode: 'C45636',
      planType: 'HS990',
      installLocation: '皇朝廣場15樓A座',
    });

    const tasks = planFollowUpTasks({ context, customerId: 'cust-1', now: new Date('2026-03-10T12:00:00Z') });

    expect(tasks).toHaveLength(1);
    expect(tasks[0]).toMatchObject({
      title: '[TEST] 新增項目 C45636',
      startDate: '2026-03-10',
      content: '客戶：C45636\n方案：HS990\n地址：皇朝廣場15樓A座',
    });
  });

  test('falls back to the opportunity date', () => {
    const context = new SubmissionContext({ customerName: '測試客戶', opportunityDate: '2025-12-01' });
    expect(planFollowUpTasks({ context, customerId: 'cust-1' })[0].startDate).toBe('2025-12-01');
  });
});

// ============================================================================
// Filter replacement
// ============================================================================

describe('findNextReplacement', () => {
  test('takes the earliest replacement on or after today', () => {
    const data = {
      opptItemList: [
        { productName: 'HS990 濾芯', bodyDef: { define3: '2026-05-25' } },
        { opptItemDefineCharacter: { attrext13: '2026-02-25 00:00:00' }, bodyDef: { productName: 'RO 濾芯' } },
        { bodyDef: { define3: '2025-08-01', productName: 'past' } },
      ],
    };

    expect(findNextReplacement(data, '2026-01-10')).toEqual({ date: '2026-02-25', productName: 'RO 濾芯' });
  });

  test('derives the date from the install date and cycle', () => {
    const data = { opptItemList: [{ productName: 'PP 濾芯', bodyDef: { define1: '2025-11-30', define2: 3 } }] };

    expect(findNextReplacement(data, '2025-12-01')).toEqual({ date: '2026-02-28', productName: 'PP 濾芯' });
  });

  test('falls back to the earliest past date when none is upcoming', () => {
    const data = {
      opptItemList: [{ bodyDef: { define3: '2025-06-01' } }, { bodyDef: { define3: '2025-03-01' } }],
    };

    expect(findNextReplacement(data, '2026-01-10')).toEqual({ date: '2025-03-01', productName: undefined });
  });

  test('returns undefined without dated items', () => {
    expect(findNextReplacement({ opptItemList: [{ productName: 'HS990' }] }, '2026-01-10')).toBeUndefined();
    expect(findNextReplacement({ id: 'oppt-1' }, '2026-01-10')).toBeUndefined();
    expect(findNextReplacement(undefined, '2026-01-10')).toBeUndefined();
  });
});

describe('planFollowUpTasks filter change', () => {
  const context = new SubmissionContext({ customerName: '測試客戶', opportunityDate: '2025-12-01' });
  const now = new Date('2026-01-10T00:00:00Z');

  test('plans a filter-change task 14 days before the next replacement', () => {
    const tasks = planFollowUpTasks({
      context,
      customerId: 'cust-1',
      opportunityId: 'oppt-1',
      now,
      opportunityData: { opptItemList: [{ productName: 'HS990 濾芯', bodyDef: { define3: '2026-05-25' } }] },
    });

    expect(tasks.map((task) => task.kind)).toEqual(['install', 'filter-change']);
    expect(tasks[1]).toEqual({
      kind: 'filter-change',
      title: '[TEST] 更換濾芯 測試客戶',
      typeId: 'task-filter',
      customerId: 'cust-1',
      customerName: '測試客戶',
      opportunityId: 'oppt-1',
      opportunityStage: undefined,
      startDate: '2026-05-11',
      endDate: '2026-05-11',
      content: 'HS990 濾芯',
    });
  });

  test('a bare product number is replaced by the generic content', () => {
    const tasks = planFollowUpTasks({
      context,
      customerId: 'cust-1',
      now,
      opportunityData: { opptItemList: [{ product: 1587, bodyDef: { define3: '2026-05-25' } }] },
    });

    expect(tasks[1].content).toBe('更換濾芯');
  });
});

// ============================================================================
// Request body & creation
// ============================================================================

const TASK: FollowUpTask = {
  kind: 'install',
  title: '新增項目 測試客戶',
  typeId: 'task-install',
  customerId: 'cust-1',
  customerName: '測試客戶',
  opportunityId: 'oppt-1',
  opportunityStage: 'stage-rent',
  startDate: '2025-11-25',
  endDate: '2025-11-25',
  content: 'notes',
};

describe('toTaskRequestBody', () => {
  test('spans the whole day and links the opportunity', () => {
    expect(toTaskRequestBody(TASK).data).toMatchObject({
      taskTransType: 'task-install',
      summary: '新增項目 測試客戶',
      startDate: '2025-11-25 00:00:00',
      endDate: '2025-11-25 23:59:59',
      customer: 'cust-1',
      originator: 'task-owner',
      taskExecutorList: [{ executor: 'user-1', _status: 'Insert' }],
      oppt: 'oppt-1',
      opptStage: 'stage-rent',
    });
  });

  test('omits the opportunity link when there is none', () => {
    const data = toTaskRequestBody({ ...TASK, opportunityId: undefined, opportunityStage: undefined }).data;
    expect('oppt' in data).toBe(false);
    expect('opptStage' in data).toBe(false);
  });
});

describe('createTask', () => {
  test('posts to the task save path', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ code: '200', data: { id: 'task-1' } }));

    const envelope = await createTask(TASK);

    expect(envelope.data).toEqual({ id: 'task-1' });
    expect(mockFetch.mock.calls[0][0]).toBe('https://crm.test.local/yonbip/crm/task/save?access_token=test-token');
    expect(sentBody(mockFetch)).toMatchObject({ data: { content: 'notes' } });
  });
});

// ============================================================================
// Tests: Submission Context — add-only writes and conflicts
// ============================================================================

import { describe, test, expect } from 'vitest';
import { SubmissionContext } from '../submission-context.js';

describe('SubmissionContext', () => {
  test('stores a value once', () => {
    const context = new SubmissionContext();
    expect(context.setIfAbsent('customerId', 'cust-1')).toBe(true);
    expect(context.get('customerId')).toBe('cust-1');
  });

  test('ignores empty and undefined values', () => {
    const context = new SubmissionContext();
    expect(context.setIfAbsent('remark', '')).toBe(false);
    expect(context.setIfAbsent('remark', undefined)).toBe(false);
    expect(context.has('remark')).toBe(false);
  });

  test('never overwrites and records a differing write as a conflict', () => {
    const context = new SubmissionContext({ customerId: 'cust-1' });
    expect(context.setIfAbsent('customerId', 'cust-2')).toBe(false);
    expect(context.setIfAbsent('customerId', 'cust-1')).toBe(false);
    expect(context.get('customerId')).toBe('cust-1');
    expect(context.conflicts).toEqual([{ key: 'customerId', kept: 'cust-1', rejected: 'cust-2' }]);
  });

  test('toRecord lists keys in canonical order', () => {
    const context = new SubmissionContext();
    context.setIfAbsent('remark', 'note');
    context.setIfAbsent('customerName', '測試客戶');
    expect(Object.keys(context.toRecord())).toEqual(['customerName', 'remark']);
  });

  test('clone is independent of the original', () => {
    const context = new SubmissionContext({ customerName: '測試客戶' });
    const copy = context.clone();
    copy.setIfAbsent('customerId', 'cust-1');
    expect(context.has('customerId')).toBe(false);
    expect(copy.get('customerName')).toBe('測試客戶');
  });
});

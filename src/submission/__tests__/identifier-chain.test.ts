// ============================================================================
// Tests: Identifier Resolution Chain — source order, divergence, exhaustion
// ============================================================================

import { describe, test, expect, vi } from 'vitest';
import { IdentifierResolutionChain, createCustomerIdChain } from '../identifier-chain.js';
import { IdentifierUnresolved } from '../errors.js';
import { SubmissionContext } from '../../context/index.js';
import { ExternalServiceError } from '../../crm/index.js';
import type { CrmEnvelope } from '../../crm/index.js';

function echo(customer: unknown): CrmEnvelope {
  return { code: '200', data: { id: 'oppt-1', customer } };
}

describe('createCustomerIdChain', () => {
  test('lists its sources in order', () => {
    const chain = createCustomerIdChain(vi.fn(async () => undefined));
    expect(chain.sources.map((source) => [source.name, source.remote])).toEqual([
      ['contextCustomerId', false],
      ['responseEchoedCustomer', false],
      ['lookupByCustomerCode', true],
    ]);
  });

  test('A: the context id wins over an echoed id', async () => {
    const lookup = vi.fn(async () => 'C');
    const chain = createCustomerIdChain(lookup);

    const resolution = await chain.resolve(new SubmissionContext({ customerId: 'A', customerCode: 'C45636' }), echo('B'));

    expect(resolution).toEqual({
      value: 'A',
      source: 'contextCustomerId',
      divergent: [{ source: 'responseEchoedCustomer', value: 'B' }],
    });
    expect(lookup).not.toHaveBeenCalled();
  });

  test('B: the echoed id is used when the context has none', async () => {
    const lookup = vi.fn(async () => 'C');
    const chain = createCustomerIdChain(lookup);

    const resolution = await chain.resolve(new SubmissionContext({ customerCode: 'C45636' }), echo({ id: 'B' }));

    expect(resolution).toEqual({ value: 'B', source: 'responseEchoedCustomer', divergent: [] });
    expect(lookup).not.toHaveBeenCalled();
  });

  test('C: looks the customer up by code as a last resort', async () => {
    const lookup = vi.fn(async () => 'C');
    const chain = createCustomerIdChain(lookup);

    const resolution = await chain.resolve(new SubmissionContext({ customerCode: 'C45636' }), echo(undefined));

    expect(resolution).toEqual({ value: 'C', source: 'lookupByCustomerCode', divergent: [] });
    expect(lookup).toHaveBeenCalledWith('C45636');
  });

  test('unresolved: every source empty', async () => {
    const lookup = vi.fn(async () => undefined);
    const chain = createCustomerIdChain(lookup);

    const error = await chain.resolve(new SubmissionContext({ customerCode: 'C45636' })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IdentifierUnresolved);
    expect(error).toMatchObject({
      identifier: 'customerId',
      observed: { contextCustomerId: undefined, responseEchoedCustomer: undefined, lookupByCustomerCode: undefined },
      partialResult: undefined,
    });
  });

  test('does not call the backend without a customer code', async () => {
    const lookup = vi.fn(async () => 'C');
    const chain = createCustomerIdChain(lookup);

    await expect(chain.resolve(new SubmissionContext())).rejects.toBeInstanceOf(IdentifierUnresolved);
    expect(lookup).not.toHaveBeenCalled();
  });

  test('a failing lookup propagates as-is', async () => {
    const failure = new ExternalServiceError('CRM API error: 502 Bad Gateway', 502, '');
    const chain = createCustomerIdChain(vi.fn(async () => Promise.reject(failure)));

    await expect(chain.resolve(new SubmissionContext({ customerCode: 'C45636' }))).rejects.toBe(failure);
  });
});

describe('IdentifierResolutionChain', () => {
  test('works for any context and response shape', async () => {
    const chain = new IdentifierResolutionChain<Map<string, string>, string>('ticket', [
      { name: 'fromMap', rationale: 'local', remote: false, resolve: (context) => context.get('ticket') },
      { name: 'fromResponse', rationale: 'echo', remote: false, resolve: (_context, response) => response },
    ]);

    await expect(chain.resolve(new Map(), '  T-1  ')).resolves.toEqual({
      value: 'T-1',
      source: 'fromResponse',
      divergent: [],
    });
  });

  test('an identical value from a later source is not divergent', async () => {
    const chain = new IdentifierResolutionChain<string, string>('id', [
      { name: 'first', rationale: '', remote: false, resolve: (context) => context },
      { name: 'second', rationale: '', remote: false, resolve: (_context, response) => response },
    ]);

    await expect(chain.resolve('X', 'X')).resolves.toEqual({ value: 'X', source: 'first', divergent: [] });
  });

  test('is frozen', () => {
    const chain = new IdentifierResolutionChain<string, string>('id', []);
    expect(Object.isFrozen(chain)).toBe(true);
  });
});

/**
 * Identifier Resolution Chain
 *
 * An ordered list of named resolvers for one identifier. The first resolver
 * that yields a value wins. After a hit, the remaining local resolvers are
 * still consulted so a disagreeing source can be reported as divergent;
 * remote resolvers (backend lookups) never run once a value is known.
 *
 * The chain is built once and frozen. Callers read `sources` to see the
 * order and the reason behind each entry.
 */

import { asRecord, readCustomerRef } from '../crm/index.js';
import type { CrmEnvelope } from '../crm/index.js';
import type { SubmissionContext } from '../context/index.js';
import { IdentifierUnresolved } from './errors.js';

export interface IdentifierResolver<C, R> {
  readonly name: string;
  /** Why this source sits at this position */
  readonly rationale: string;
  /** Calls the backend; skipped once an earlier source has answered */
  readonly remote: boolean;
  resolve(context: C, response: R | undefined): Promise<string | undefined> | string | undefined;
}

export interface DivergentValue {
  source: string;
  value: string;
}

export interface Resolution {
  value: string;
  source: string;
  divergent: DivergentValue[];
}

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export class IdentifierResolutionChain<C, R> {
  readonly identifier: string;
  private readonly resolvers: readonly IdentifierResolver<C, R>[];

  constructor(identifier: string, resolvers: readonly IdentifierResolver<C, R>[]) {
    this.identifier = identifier;
    this.resolvers = Object.freeze([...resolvers]);
    Object.freeze(this);
  }

  get sources(): ReadonlyArray<Pick<IdentifierResolver<C, R>, 'name' | 'rationale' | 'remote'>> {
    return this.resolvers.map(({ name, rationale, remote }) => ({ name, rationale, remote }));
  }

  /**
   * @throws IdentifierUnresolved when every source is empty
   * @throws whatever a remote resolver throws (e.g. ExternalServiceError)
   */
  async resolve(context: C, response?: R): Promise<Resolution> {
    const observed: Record<string, string | undefined> = {};
    const divergent: DivergentValue[] = [];
    let hit: { value: string; source: string } | undefined;

    for (const resolver of this.resolvers) {
      if (hit && resolver.remote) continue;

      const value = present(await resolver.resolve(context, response));
      observed[resolver.name] = value;

      if (!hit) {
        if (value !== undefined) hit = { value, source: resolver.name };
      } else if (value !== undefined && value !== hit.value) {
        divergent.push({ source: resolver.name, value });
      }
    }

    if (!hit) {
      throw new IdentifierUnresolved(this.identifier, observed);
    }
    return { ...hit, divergent };
  }
}

// ============================================================================
// Customer Id
// ============================================================================

export type CustomerIdLookup = (customerCode: string) => Promise<string | undefined>;

/**
 * Customer id sources, most trusted first:
 *
 * 1. contextCustomerId: set by a duplicate match, a created customer or a prior record
 * 2. responseEchoedCustomer: `data.customer` on the previous step's response
 * 3. lookupByCustomerCode: backend lookup, only when the context holds a code
 */
export function createCustomerIdChain(
  lookupByCode: CustomerIdLookup,
): IdentifierResolutionChain<SubmissionContext, CrmEnvelope> {
  return new IdentifierResolutionChain<SubmissionContext, CrmEnvelope>('customerId', [
    {
      name: 'contextCustomerId',
      rationale: 'Written by this run or carried from a prior record; authoritative',
      remote: false,
      resolve: (context) => context.get('customerId'),
    },
    {
      name: 'responseEchoedCustomer',
      rationale: 'Echoed by the backend; may belong to another record, so only a fallback',
      remote: false,
      resolve: (_context, response) => readCustomerRef(asRecord(response?.data)?.customer),
    },
    {
      name: 'lookupByCustomerCode',
      rationale: 'Costs a backend call; used only when nothing local is known',
      remote: true,
      resolve: (context) => {
        const code = context.get('customerCode');
        return code ? lookupByCode(code) : undefined;
      },
    },
  ]);
}

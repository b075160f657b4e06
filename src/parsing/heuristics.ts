/**
 * Install-Location Heuristics
 *
 * Authors regularly paste the customer line ("C45636 陳大文 66123456") into
 * the install-location slot and the real address somewhere else. The
 * predicates below recognise both shapes; the corrector picks a replacement.
 *
 * Pure functions. The corrector reports what it did; the normalizer turns
 * that into warnings.
 */

const CUSTOMER_CODE_TOKEN = /\bC\d{3,}\b/i;
const CODE_NAME_PHONE = /C\d+.+\d{6,}/i;

/** True when the value reads like a customer reference rather than a place. */
export function looksLikeCustomerReference(value: string): boolean {
  return CUSTOMER_CODE_TOKEN.test(value) || CODE_NAME_PHONE.test(value);
}

/** True when the value contains an address keyword and is not a customer reference. */
export function looksLikeAddress(value: string, keywords: readonly string[]): boolean {
  if (looksLikeCustomerReference(value)) return false;
  return keywords.some((keyword) => value.includes(keyword));
}

export interface LocationCandidates {
  installLocation?: string;
  address?: string;
  planType?: string;
}

export type LocationSource = 'installLocation' | 'address' | 'planType';

export type InstallLocationCorrection =
  | { kind: 'unchanged' }
  | { kind: 'suspect' }
  | { kind: 'corrected'; value: string; source: Exclude<LocationSource, 'installLocation'> };

/**
 * Decide whether the install location must be replaced.
 *
 * Replacement candidates, in order: the address, then the plan type (authors
 * sometimes write the address under the plan label). A candidate qualifies
 * only when it is address-shaped.
 */
export function correctInstallLocation(
  candidates: LocationCandidates,
  keywords: readonly string[],
): InstallLocationCorrection {
  const { installLocation } = candidates;
  if (!installLocation || !looksLikeCustomerReference(installLocation)) {
    return { kind: 'unchanged' };
  }

  const order = ['address', 'planType'] as const;
  for (const source of order) {
    const value = candidates[source];
    if (value && looksLikeAddress(value, keywords)) {
      return { kind: 'corrected', value, source };
    }
  }
  return { kind: 'suspect' };
}

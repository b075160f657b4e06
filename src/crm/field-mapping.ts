// ============================================================================
// Field Mapping — Canonical key -> backend destinations
// ============================================================================
//
// The backend keeps several copies of the same business value (a flat
// `headDef!defineN` key, the header definition section, the characteristic
// section), and each copy is read by a different screen. Every destination
// listed here is written; a key writes only to its own destinations.
//
// The opportunity destinations follow the backend's latest custom-field
// layout and must be re-checked whenever that layout changes.

import type { CanonicalKey } from '../parsing/index.js';

export type PayloadSection = 'flat' | 'headerDefinition' | 'characteristic';

/**
 * - text: the value as held on the context
 * - amount: canonical decimal string ("288")
 * - number: JSON number (288)
 */
export type DestinationFormat = 'text' | 'amount' | 'number';

export interface FieldDestination {
  readonly section: PayloadSection;
  readonly field: string;
  readonly format: DestinationFormat;
}

export type FieldMapping = ReadonlyArray<{
  readonly key: CanonicalKey;
  readonly destinations: readonly FieldDestination[];
}>;

const flat = (field: string, format: DestinationFormat = 'text'): FieldDestination => ({ section: 'flat', field, format });
const header = (field: string, format: DestinationFormat = 'text'): FieldDestination => ({
  section: 'headerDefinition',
  field,
  format,
});
const characteristic = (field: string, format: DestinationFormat = 'text'): FieldDestination => ({
  section: 'characteristic',
  field,
  format,
});

function freezeMapping(entries: Array<[CanonicalKey, FieldDestination[]]>): FieldMapping {
  return Object.freeze(
    entries.map(([key, destinations]) =>
      Object.freeze({ key, destinations: Object.freeze(destinations.map((d) => Object.freeze(d))) }),
    ),
  );
}

// ============================================================================
// Opportunity
// ============================================================================

export const OPPORTUNITY_FIELD_MAPPING: FieldMapping = freezeMapping([
  ['opportunityName', [flat('name')]],
  ['customerId', [flat('customer'), flat('settleCustomer'), flat('finalUser')]],
  ['installLocation', [flat('address')]],
  ['opportunityDate', [flat('opptDate')]],
  ['opptStage', [flat('opptStage')]],
  ['winningRate', [flat('winningRate', 'amount')]],
  ['currency', [flat('currency')]],
  ['expectSignMoney', [flat('expectSignMoney', 'amount')]],
  ['expectSignDate', [flat('expectSignDate')]],
  ['remark', [flat('description'), flat('remark')]],
  ['paymentCode', [flat('industry')]],
  ['paymentLabel', [flat('industry_name')]],
  ['usageLabel', [flat('headDef!define8'), header('define8'), characteristic('attrext8')]],
  ['planType', [flat('headDef!define9'), header('define9'), characteristic('attrext9')]],
  [
    'monthlyFee',
    [flat('headDef!define10', 'amount'), flat('monthlyFee', 'number'), header('define10', 'amount'), characteristic('attrext10', 'number')],
  ],
  ['prepay', [flat('headDef!define11', 'amount'), flat('prepay', 'number'), header('define11', 'amount'), characteristic('attrext16', 'number')]],
  ['deposit', [flat('headDef!define12', 'amount'), flat('deposit', 'number'), header('define12', 'amount'), characteristic('attrext17', 'number')]],
  [
    'contractStartDate',
    [flat('contractBeginDate'), flat('contractStartDate'), header('define17'), characteristic('attrext2')],
  ],
  ['contractEndDate', [flat('contractEndDate'), flat('contractEnd'), header('define18'), characteristic('attrext3')]],
  [
    'contractYears',
    [flat('contractYear', 'number'), flat('contractYears', 'number'), header('define19'), characteristic('attrext4')],
  ],
  ['rawText', [flat('headDef!define20'), header('define20')]],
]);

// ============================================================================
// Customer Application
// ============================================================================

export const CUSTOMER_FIELD_MAPPING: FieldMapping = freezeMapping([
  ['customerCode', [flat('custCode')]],
  ['customerName', [flat('name'), flat('shortname')]],
  ['contactPhone', [flat('contactTel')]],
  ['address', [flat('address')]],
  ['usageLabel', [flat('largeText1'), characteristic('customerDefine8')]],
  ['planType', [flat('largeText2'), characteristic('customerDefine6')]],
  ['monthlyFee', [flat('largeText3', 'amount')]],
  ['remark', [flat('largeText4'), characteristic('customerDefine7')]],
  ['paymentCode', [flat('merchantAppliedDetail!payway'), header('payway')]],
  ['paymentLabel', [header('paymentLabel')]],
  ['totalAmount', [flat('money', 'amount')]],
]);


/**
 * Normalizer Lookup Tables
 *
 * Loads the label table and the vocabulary (placeholders, payment methods,
 * usage modes, address keywords, contract-year defaults) from data/*.json,
 * validates them with Zod and freezes the result. The tables are built once
 * and handed to the parser, normalizer and context builder by reference.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { isCanonicalKey } from './types.js';
import type { CanonicalKey, NormalizerTables } from './types.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const CanonicalKeySchema = z.string().refine(isCanonicalKey, {
  message: 'Unknown canonical key',
});

export const LabelTableSchema = z.record(z.string(), z.array(CanonicalKeySchema).min(1));

export const VocabularySchema = z.object({
  placeholders: z.array(z.string()),
  paymentMethods: z.array(
    z.object({
      code: z.string().regex(/^\d{2}$/),
      label: z.string().min(1),
      aliases: z.array(z.string()),
    }),
  ),
  usageModes: z.array(
    z.object({
      label: z.string().min(1),
      synonyms: z.array(z.string()),
      defaultPaymentCode: z.string().regex(/^\d{2}$/),
    }),
  ),
  addressKeywords: z.array(z.string().min(1)),
  contractYears: z.object({
    default: z.number().int().positive(),
    extended: z.number().int().positive(),
    extendedPlanKeywords: z.array(z.string().min(1)),
  }),
});

export type LabelTable = z.infer<typeof LabelTableSchema>;
export type Vocabulary = z.infer<typeof VocabularySchema>;

// ---------------------------------------------------------------------------
// Label Cleanup & Lookup
// ---------------------------------------------------------------------------

/**
 * Canonical spelling of a label as written by an author: trimmed, full-width
 * parentheses turned into ASCII, whitespace removed.
 */
export function cleanLabel(label: string): string {
  return label
    .replace(/（/g, '(')
    .replace(/）/g, ')')
    .replace(/\s+/g, '')
    .trim();
}

/**
 * Resolve a label to its canonical keys. Tries the cleaned label first, then
 * the label without a trailing parenthesised hint ("目前付款方式(01-07)").
 */
export function resolveLabel(
  label: string,
  tables: NormalizerTables,
): readonly CanonicalKey[] | undefined {
  const cleaned = cleanLabel(label);
  const direct = tables.labels.get(cleaned);
  if (direct) return direct;

  const withoutHint = cleaned.replace(/\([^)]*\)$/, '');
  if (withoutHint && withoutHint !== cleaned) {
    return tables.labels.get(withoutHint);
  }
  return undefined;
}

export function isKnownLabel(label: string, tables: NormalizerTables): boolean {
  return resolveLabel(label, tables) !== undefined;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Build frozen tables from already-parsed JSON values.
 * Throws a ZodError when either document is malformed.
 */
export function createNormalizerTables(labelTable: unknown, vocabulary: unknown): NormalizerTables {
  const labelsParsed = LabelTableSchema.parse(labelTable);
  const vocab = VocabularySchema.parse(vocabulary);

  const labels = new Map<string, readonly CanonicalKey[]>();
  for (const [label, keys] of Object.entries(labelsParsed)) {
    const typedKeys = keys.filter(isCanonicalKey);
    labels.set(cleanLabel(label), Object.freeze(typedKeys));
  }

  return Object.freeze({
    labels,
    placeholders: new Set(vocab.placeholders.map((token) => token.trim().toLowerCase())),
    paymentMethods: Object.freeze(
      vocab.paymentMethods.map((method) => Object.freeze({ ...method, aliases: Object.freeze([...method.aliases]) })),
    ),
    usageModes: Object.freeze(
      vocab.usageModes.map((mode) => Object.freeze({ ...mode, synonyms: Object.freeze([...mode.synonyms]) })),
    ),
    addressKeywords: Object.freeze([...vocab.addressKeywords]),
    contractYears: Object.freeze({
      ...vocab.contractYears,
      extendedPlanKeywords: Object.freeze([...vocab.contractYears.extendedPlanKeywords]),
    }),
  });
}

function readJson(relativePath: string): unknown {
  // data/ sits at the package root, two levels above src/parsing and dist/parsing
  const url = new URL(`../../data/${relativePath}`, import.meta.url);
  return JSON.parse(readFileSync(url, 'utf8'));
}

/** Read data/labels.json and data/vocabulary.json and build the tables. */
export function loadNormalizerTables(): NormalizerTables {
  return createNormalizerTables(readJson('labels.json'), readJson('vocabulary.json'));
}

/**
 * Text Parser
 *
 * Splits free-form sales notes into ordered `label: value` pairs.
 *
 * Accepted line shapes:
 * - `label：value`, `label: value`, `label=value` (earliest delimiter wins)
 * - a known label alone on its line, with the value on the next non-blank line
 * - continuation lines directly after a remark, appended to the remark
 *
 * Never throws. Lines that fit none of these shapes become ParseWarnings.
 */

import { isKnownLabel, resolveLabel } from './tables.js';
import type { NormalizerTables, ParseResult, ParseWarning, RawLine } from './types.js';

const DELIMITERS = ['：', ':', '='] as const;
const TRAILING_DELIMITER = /[：:=]\s*$/;

interface SplitLine {
  label: string;
  value: string;
}

/**
 * Split a line at its earliest delimiter.
 * Returns null when there is no delimiter or nothing before it.
 */
export function splitLabelValue(line: string): SplitLine | null {
  let index = -1;
  for (const delimiter of DELIMITERS) {
    const found = line.indexOf(delimiter);
    if (found !== -1 && (index === -1 || found < index)) {
      index = found;
    }
  }
  if (index <= 0) return null;

  const label = line.slice(0, index).trim();
  if (!label) return null;
  return { label, value: line.slice(index + 1).trim() };
}

function looksLikeLabelLine(line: string, tables: NormalizerTables): boolean {
  if (isKnownLabel(line.replace(TRAILING_DELIMITER, ''), tables)) return true;
  const split = splitLabelValue(line);
  return split !== null && isKnownLabel(split.label, tables);
}

function isRemarkLabel(label: string, tables: NormalizerTables): boolean {
  return resolveLabel(label, tables)?.includes('remark') ?? false;
}

/**
 * Parse raw notes into RawLines.
 *
 * @param rawText - The notes exactly as pasted by the author
 * @param tables - Label table used to recognise label-only lines
 */
export function parse(rawText: string, tables: NormalizerTables): ParseResult {
  const sourceLines = rawText.split(/\r\n|\n|\r/);
  const lines: RawLine[] = [];
  const warnings: ParseWarning[] = [];

  if (sourceLines.every((line) => line.trim() === '')) {
    warnings.push({ code: 'empty-input', lineIndex: null, message: 'Input contains no text' });
    return { lines, warnings };
  }

  let i = 0;
  while (i < sourceLines.length) {
    const trimmed = sourceLines[i].trim();
    if (!trimmed) {
      i++;
      continue;
    }

    // Label alone on its line ("客戶" or "客戶：") takes the next non-blank line
    const bareLabel = trimmed.replace(TRAILING_DELIMITER, '').trim();
    const split = splitLabelValue(trimmed);
    const isBareLabel = isKnownLabel(bareLabel, tables) && (split === null || split.value === '');

    if (isBareLabel) {
      let j = i + 1;
      while (j < sourceLines.length && sourceLines[j].trim() === '') j++;

      const next = j < sourceLines.length ? sourceLines[j].trim() : '';
      if (next && !looksLikeLabelLine(next, tables)) {
        lines.push({ label: bareLabel, value: next, lineIndex: i });
        i = j + 1;
        continue;
      }

      lines.push({ label: bareLabel, value: '', lineIndex: i });
      warnings.push({ code: 'missing-value', lineIndex: i, message: `Label "${bareLabel}" has no value` });
      i++;
      continue;
    }

    if (split) {
      lines.push({ label: split.label, value: split.value, lineIndex: i });
      i++;
      continue;
    }

    // Free text directly after a remark continues that remark
    const previous = lines[lines.length - 1];
    if (previous && isRemarkLabel(previous.label, tables)) {
      const value = previous.value ? `${previous.value}\n${trimmed}` : trimmed;
      lines[lines.length - 1] = { ...previous, value };
      i++;
      continue;
    }

    warnings.push({
      code: 'unrecognized-line',
      lineIndex: i,
      message: `Line ${i + 1} is not a label/value pair`,
    });
    i++;
  }

  return { lines, warnings };
}

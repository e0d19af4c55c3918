import { toPortIdentifier, uniqueStrings } from './normalize';

import type { EthRecord, FcRecord, PortKind } from './types';

// Placeholders the HMC prints for an LPAR without adapters of the requested kind.
const EMPTY_MARKERS = new Set(['none', 'null', 'n/a']);

function isIdentifierToken(token: string): boolean {
  const trimmed = token.trim();
  return trimmed.length > 0 && !EMPTY_MARKERS.has(trimmed.toLowerCase());
}

function splitRecordLine(line: string): { lpar: string; rest: string } | null {
  const idx = line.indexOf(';');
  if (idx === -1) return null;
  const lpar = line.slice(0, idx).trim();
  if (!lpar) return null;
  return { lpar, rest: line.slice(idx + 1) };
}

/** One managed system name per line (`lsyscfg -r sys -F name`). */
export function parseManagedSystemLines(lines: readonly string[]): string[] {
  return uniqueStrings(lines.map((line) => line.trim()).filter((line) => line.length > 0));
}

function canonicalValues(kind: PortKind, tokens: readonly string[]): string[] {
  return uniqueStrings(tokens.map((token) => toPortIdentifier(kind, token).value));
}

/**
 * Parses `lpar_name;wwpn,wwpn,...` lines. Lines without a `;` are headers or blanks and are skipped.
 */
export function parseFcLines(lines: readonly string[]): FcRecord[] {
  const records: FcRecord[] = [];
  for (const line of lines) {
    const split = splitRecordLine(line);
    if (!split) continue;

    // HMC quotes a multi-value attribute when the field list itself contains commas.
    const tokens = split.rest.replace(/"/g, '').split(',').filter(isIdentifierToken);
    records.push({ lpar: split.lpar, wwpns: canonicalValues('wwpn', tokens) });
  }
  return records;
}

/** Parses `lpar_name;mac mac,mac` lines; addresses are separated by commas or whitespace. */
export function parseEthLines(lines: readonly string[]): EthRecord[] {
  const records: EthRecord[] = [];
  for (const line of lines) {
    const split = splitRecordLine(line);
    if (!split) continue;

    const tokens = split.rest.replace(/"/g, '').split(/[,\s]+/).filter(isIdentifierToken);
    records.push({ lpar: split.lpar, macs: canonicalValues('mac', tokens) });
  }
  return records;
}

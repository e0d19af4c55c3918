import type { PortIdentifier, PortKind } from './types';

const WWPN_DIGITS = 16;
// Some HMC levels report 16 raw bytes for a WWPN; those are kept whole.
const WWPN_DOUBLE_DIGITS = 32;
const MAC_DIGITS = 12;

function hexDigits(raw: string): string {
  return raw.replace(/[^0-9A-Fa-f]/g, '').toUpperCase();
}

function fitDigits(digits: string, target: number, keepLength?: number): string {
  if (digits.length < target) return digits.padStart(target, '0');
  if (digits.length > target && digits.length !== keepLength) return digits.slice(0, target);
  return digits;
}

function groupPairs(digits: string): string {
  const pairs: string[] = [];
  for (let i = 0; i < digits.length; i += 2) pairs.push(digits.slice(i, i + 2));
  return pairs.join(':');
}

/**
 * Canonical WWPN: `50:01:43:80:1A:2B:3C:4D`.
 *
 * Never throws. Short input is left-padded with zeros and overlong input keeps its leftmost
 * 16 digits, so corrupt HMC output is repaired rather than rejected.
 */
export function normalizeWwpn(raw: string): string {
  return groupPairs(fitDigits(hexDigits(raw), WWPN_DIGITS, WWPN_DOUBLE_DIGITS));
}

/** Canonical MAC: `12:34:56:78:9A:BC`. Same repair rules as {@link normalizeWwpn}. */
export function normalizeMac(raw: string): string {
  return groupPairs(fitDigits(hexDigits(raw), MAC_DIGITS));
}

export function toPortIdentifier(kind: PortKind, raw: string): PortIdentifier {
  return { kind, value: kind === 'wwpn' ? normalizeWwpn(raw) : normalizeMac(raw) };
}

const CANONICAL_WWPN = /^[0-9A-F]{2}(?::[0-9A-F]{2}){7}$/;
const CANONICAL_WWPN_DOUBLE = /^[0-9A-F]{2}(?::[0-9A-F]{2}){15}$/;

export function isCanonicalWwpn(value: string): boolean {
  return CANONICAL_WWPN.test(value) || CANONICAL_WWPN_DOUBLE.test(value);
}

export function uniqueStrings(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}

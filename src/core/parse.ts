import { DECIMAL_PATTERN, type IntDomain } from '../types.js';
import { inDomain } from './domain.js';

export type ParseResult = { ok: true; value: bigint } | { ok: false; reason: 'malformed' | 'overflow' };

/**
 * Parses base-10 text into a value of `domain`.
 *
 * Accepts an optional sign followed by one or more ASCII digits; leading zeros
 * are fine. Unsigned domains reject a leading `-` outright, so `-0` is
 * malformed there. Whitespace, digit separators, radix prefixes and fractions
 * are all malformed.
 */
export function parseDecimal(text: string, domain: IntDomain): ParseResult {
  if (!DECIMAL_PATTERN.test(text)) return { ok: false, reason: 'malformed' };
  if (!domain.signed && text.startsWith('-')) return { ok: false, reason: 'malformed' };

  const value = BigInt(text);
  if (!inDomain(domain, value)) return { ok: false, reason: 'overflow' };
  return { ok: true, value };
}

export function parseIntLike(text: string): bigint | null {
  return DECIMAL_PATTERN.test(text) ? BigInt(text) : null;
}

import type { IntDomain, IntLike, IntRange, RangeBounds, RangeInput } from '../types.js';
import { inDomain } from './domain.js';
import { InvalidDeclarationError, formatInterval } from './errors.js';
import { parseIntLike } from './parse.js';

const INTERVAL_PATTERN = /^\[\s*([+-]?\d+)?\s*,\s*([+-]?\d+)?\s*([\])])$/;

export function toBigInt(setting: string, what: string, value: IntLike): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isSafeInteger(value)) {
    throw new InvalidDeclarationError(setting, `${what} ${value} is not a safe integer`);
  }
  return BigInt(value);
}

/** Parses interval text such as `[1, 32)`, `[0, 32]` or `[-60, ]`. */
export function parseInterval(setting: string, text: string): RangeBounds {
  const m = INTERVAL_PATTERN.exec(text.trim());
  if (!m) {
    throw new InvalidDeclarationError(setting, `range ${JSON.stringify(text)} is not an interval like [1, 32) or [0, 32]`);
  }
  const [, lo, hi, close] = m;
  const bounds: RangeBounds = {};
  if (lo !== undefined) bounds.min = parseIntLike(lo) ?? undefined;
  if (hi !== undefined) {
    const v = parseIntLike(hi) ?? undefined;
    if (close === ')') bounds.below = v;
    else bounds.max = v;
  } else if (close === ')') {
    throw new InvalidDeclarationError(setting, `range ${JSON.stringify(text)} has an open upper end; close it with ]`);
  }
  return bounds;
}

export function rangeLabel(min: bigint, max: bigint, exclusiveMax: boolean): string {
  return exclusiveMax ? `[${min}, ${max + 1n})` : formatInterval(min, max);
}

export function normalizeRange(setting: string, input: RangeInput, domain: IntDomain): IntRange {
  const bounds = typeof input === 'string' ? parseInterval(setting, input) : input;
  if (bounds.max !== undefined && bounds.below !== undefined) {
    throw new InvalidDeclarationError(setting, 'range takes either max or below, not both');
  }

  const min = bounds.min === undefined ? domain.min : toBigInt(setting, 'range min', bounds.min);
  let max = domain.max;
  let exclusiveMax = false;
  if (bounds.max !== undefined) {
    max = toBigInt(setting, 'range max', bounds.max);
    checkBound(setting, 'range max', max, domain);
  } else if (bounds.below !== undefined) {
    const below = toBigInt(setting, 'range below', bounds.below);
    checkBound(setting, 'range below', below, domain);
    max = below - 1n;
    exclusiveMax = true;
  }
  checkBound(setting, 'range min', min, domain);

  const label = rangeLabel(min, max, exclusiveMax);
  if (min > max) {
    throw new InvalidDeclarationError(setting, `range ${label} is empty`);
  }
  return Object.freeze({ min, max, exclusiveMax, label });
}

function checkBound(setting: string, what: string, value: bigint, domain: IntDomain): void {
  if (!inDomain(domain, value)) {
    throw new InvalidDeclarationError(
      setting,
      `${what} ${value} lies outside ${domain.type} ${formatInterval(domain.min, domain.max)}`,
    );
  }
}

export function inRange(range: Pick<IntRange, 'min' | 'max'>, value: bigint): boolean {
  return value >= range.min && value <= range.max;
}

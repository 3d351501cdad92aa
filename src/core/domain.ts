import { INT_TYPES, type IntDomain, type IntType, type NarrowIntType } from '../types.js';

const NARROW_BITS = 32;

function makeDomain(type: IntType): IntDomain {
  const signed = type.startsWith('i');
  const bits = Number(type.slice(1));
  const min = signed ? -(1n << BigInt(bits - 1)) : 0n;
  const max = signed ? (1n << BigInt(bits - 1)) - 1n : (1n << BigInt(bits)) - 1n;
  return Object.freeze({ type, signed, bits, min, max });
}

const DOMAINS: ReadonlyMap<IntType, IntDomain> = new Map<IntType, IntDomain>(INT_TYPES.map((t) => [t, makeDomain(t)]));

export function isIntType(value: string): value is IntType {
  return INT_TYPES.some((t) => t === value);
}

export function isNarrowType(type: IntType): type is NarrowIntType {
  return domainOf(type).bits <= NARROW_BITS;
}

export function domainOf(type: IntType): IntDomain {
  const d = DOMAINS.get(type);
  if (!d) throw new Error(`Unknown integer type: ${type}`);
  return d;
}

export function inDomain(domain: IntDomain, value: bigint): boolean {
  return value >= domain.min && value <= domain.max;
}

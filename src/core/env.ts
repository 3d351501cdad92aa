import type { IntLike, IntType, NarrowIntType, RangeInput } from '../types.js';
import { isNarrowType } from './domain.js';
import { InvalidDeclarationError } from './errors.js';
import { declareSetting, resolve, unwrap } from './resolve.js';
import { createResolver, type EnvSource } from './resolver.js';

export interface EnvIntOptions<T extends IntType> {
  type: T;
  range?: RangeInput;
  default?: IntLike;
  /** Defaults to `process.env`. */
  env?: EnvSource;
}

export type TryEnvIntOptions<T extends IntType> = Omit<EnvIntOptions<T>, 'default'>;

function read(name: string, opts: EnvIntOptions<IntType>, optional: boolean): bigint | undefined {
  const setting = declareSetting({ name, type: opts.type, range: opts.range, default: opts.default, optional });
  return unwrap(resolve(setting, createResolver(opts.env).lookup(name)));
}

function assertNarrow(name: string, type: IntType): void {
  if (!isNarrowType(type)) {
    throw new InvalidDeclarationError(name, `${type} values do not fit in a number; use envBig`);
  }
}

function present<T>(name: string, value: T | undefined): T {
  if (value === undefined) throw new InvalidDeclarationError(name, 'resolved to no value');
  return value;
}

/**
 * Reads an integer setting of at most 32 bits.
 *
 * Throws when the variable is missing without a default, or is set to anything
 * that is not a decimal integer inside `range`.
 *
 * @example
 * export const MAX_LEN_LOG2 = envInt('APP_MAX_LEN_LOG2', { type: 'u32', range: '[1, 32)', default: 6 });
 */
export function envInt(name: string, opts: EnvIntOptions<NarrowIntType>): number {
  assertNarrow(name, opts.type);
  return Number(present(name, read(name, opts, false)));
}

/** Like {@link envInt}, but an unset variable gives `undefined`. A set but invalid one still throws. */
export function tryEnvInt(name: string, opts: TryEnvIntOptions<NarrowIntType>): number | undefined {
  assertNarrow(name, opts.type);
  const value = read(name, opts, true);
  return value === undefined ? undefined : Number(value);
}

export function envBig(name: string, opts: EnvIntOptions<IntType>): bigint {
  return present(name, read(name, opts, false));
}

export function tryEnvBig(name: string, opts: TryEnvIntOptions<IntType>): bigint | undefined {
  return read(name, opts, true);
}

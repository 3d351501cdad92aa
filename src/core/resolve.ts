import { Mode, type IntRange, type Outcome, type Setting, type SettingInput } from '../types.js';
import { domainOf, isIntType } from './domain.js';
import {
  InvalidDeclarationError,
  MalformedTextError,
  MissingRequiredError,
  NumericOverflowError,
  OutOfRangeError,
} from './errors.js';
import { parseDecimal } from './parse.js';
import { inRange, normalizeRange, rangeLabel, toBigInt } from './range.js';

const INVALID_NAME = /[=\0]/;

export function declareSetting(input: SettingInput): Setting {
  const { name } = input;
  if (!name) throw new InvalidDeclarationError('', 'setting name must not be empty');
  if (INVALID_NAME.test(name)) {
    throw new InvalidDeclarationError(name, 'setting name must not contain "=" or NUL');
  }
  if (!isIntType(input.type)) {
    throw new InvalidDeclarationError(name, `unknown integer type ${JSON.stringify(input.type)}`);
  }

  const domain = domainOf(input.type);
  const range = input.range === undefined ? null : normalizeRange(name, input.range, domain);

  let mode: Mode = Mode.REQUIRED;
  let fallback: bigint | null = null;
  if (input.default !== undefined) {
    if (input.optional) {
      throw new InvalidDeclarationError(name, 'an optional setting cannot also have a default');
    }
    fallback = toBigInt(name, 'default', input.default);
    const eff = effectiveRange({ domain, range });
    if (!inRange(eff, fallback)) {
      throw new InvalidDeclarationError(name, `default ${fallback} lies outside ${eff.label}`);
    }
    mode = Mode.REQUIRED_WITH_DEFAULT;
  } else if (input.optional) {
    mode = Mode.OPTIONAL;
  }

  return Object.freeze({ name, domain, range, mode, default: fallback });
}

export function effectiveRange(setting: Pick<Setting, 'domain' | 'range'>): IntRange {
  if (setting.range) return setting.range;
  const { min, max } = setting.domain;
  return { min, max, exclusiveMax: false, label: rangeLabel(min, max, false) };
}

/**
 * Turns the raw environment text for `setting` into an outcome. Pure: the same
 * inputs always give an equal outcome, and nothing outside the effective range
 * is ever returned as a value.
 */
export function resolve(setting: Setting, raw: string | undefined): Outcome {
  const { name, domain } = setting;
  const eff = effectiveRange(setting);

  if (raw !== undefined) {
    const parsed = parseDecimal(raw, domain);
    if (!parsed.ok) {
      const error =
        parsed.reason === 'overflow' ? new NumericOverflowError(name, raw, domain) : new MalformedTextError(name, raw, domain);
      return { kind: 'failure', error };
    }
    if (!inRange(eff, parsed.value)) {
      return { kind: 'failure', error: new OutOfRangeError(name, raw, parsed.value, eff) };
    }
    return { kind: 'value', value: parsed.value, source: 'env' };
  }

  switch (setting.mode) {
    case Mode.REQUIRED:
      return { kind: 'failure', error: new MissingRequiredError(name) };
    case Mode.REQUIRED_WITH_DEFAULT: {
      const fallback = setting.default;
      if (fallback === null || !inRange(eff, fallback)) {
        throw new InvalidDeclarationError(name, `default ${fallback ?? 'missing'} lies outside ${eff.label}`);
      }
      return { kind: 'value', value: fallback, source: 'default' };
    }
    case Mode.OPTIONAL:
      return { kind: 'none' };
  }
}

export function unwrap(outcome: Outcome): bigint | undefined {
  switch (outcome.kind) {
    case 'value':
      return outcome.value;
    case 'none':
      return undefined;
    case 'failure':
      throw outcome.error;
  }
}

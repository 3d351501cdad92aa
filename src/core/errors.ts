import type { IntDomain, IntRange } from '../types.js';

export type FailureKind = 'missing-required' | 'malformed-text' | 'numeric-overflow' | 'out-of-range';

export abstract class SettingError extends Error {
  abstract readonly kind: FailureKind;
  readonly setting: string;
  readonly raw: string | null;

  constructor(setting: string, raw: string | null, message: string) {
    super(message);
    this.setting = setting;
    this.raw = raw;
  }
}

export class MissingRequiredError extends SettingError {
  readonly kind = 'missing-required';

  constructor(setting: string) {
    super(setting, null, `${setting} is not set and has no default`);
    this.name = 'MissingRequiredError';
  }
}

export class MalformedTextError extends SettingError {
  readonly kind = 'malformed-text';

  constructor(setting: string, raw: string, domain: IntDomain) {
    const sign = domain.signed ? 'an optional + or - sign' : 'an optional + sign';
    super(
      setting,
      raw,
      `${setting}=${JSON.stringify(raw)} is not a valid ${domain.type}: expected decimal digits with ${sign}`,
    );
    this.name = 'MalformedTextError';
  }
}

export class NumericOverflowError extends SettingError {
  readonly kind = 'numeric-overflow';
  readonly domain: IntDomain;

  constructor(setting: string, raw: string, domain: IntDomain) {
    super(
      setting,
      raw,
      `${setting}=${JSON.stringify(raw)} does not fit in ${domain.type} ${formatInterval(domain.min, domain.max)}`,
    );
    this.name = 'NumericOverflowError';
    this.domain = domain;
  }
}

export type ViolatedBound = 'min' | 'max';

export class OutOfRangeError extends SettingError {
  readonly kind = 'out-of-range';
  readonly value: bigint;
  readonly range: IntRange;
  readonly violated: ViolatedBound[];

  constructor(setting: string, raw: string, value: bigint, range: IntRange) {
    const violated: ViolatedBound[] = [];
    if (value < range.min) violated.push('min');
    if (value > range.max) violated.push('max');
    let detail = `less than ${range.min}`;
    if (violated.includes('max')) {
      detail = range.exclusiveMax ? `not less than ${range.max + 1n}` : `greater than ${range.max}`;
    }
    super(setting, raw, `${setting}=${JSON.stringify(raw)} is out of range ${range.label}: ${value} is ${detail}`);
    this.name = 'OutOfRangeError';
    this.value = value;
    this.range = range;
    this.violated = violated;
  }
}

/** The declaration itself is wrong; raised before any environment value is looked at. */
export class InvalidDeclarationError extends Error {
  readonly setting: string;

  constructor(setting: string, message: string) {
    super(setting ? `${setting}: ${message}` : message);
    this.name = 'InvalidDeclarationError';
    this.setting = setting;
  }
}

export class ManifestError extends Error {
  readonly path: string;
  readonly issues: string[];

  constructor(path: string, issues: string[]) {
    super(`Invalid manifest ${path}:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ManifestError';
    this.path = path;
    this.issues = issues;
  }
}

export type ResolutionFailure = SettingError | InvalidDeclarationError;

export class BuildHaltError extends Error {
  readonly failures: ResolutionFailure[];

  constructor(failures: ResolutionFailure[]) {
    const n = failures.length;
    super(`${n} setting${n === 1 ? '' : 's'} failed to resolve:\n${failures.map((f) => `  ${f.message}`).join('\n')}`);
    this.name = 'BuildHaltError';
    this.failures = failures;
  }
}

export class StaleOutputError extends Error {
  readonly outPath: string;

  constructor(outPath: string, missing: boolean) {
    super(missing ? `${outPath} does not exist; run envconst generate` : `${outPath} is out of date; run envconst generate`);
    this.name = 'StaleOutputError';
    this.outPath = outPath;
  }
}

export function ensureError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  return new Error(String(error));
}

export function formatInterval(min: bigint, max: bigint): string {
  return `[${min}, ${max}]`;
}

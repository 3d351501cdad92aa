import { z } from 'zod';
import type { InvalidDeclarationError, SettingError } from './core/errors.js';

export const INT_TYPES = ['u8', 'u16', 'u32', 'u64', 'u128', 'i8', 'i16', 'i32', 'i64', 'i128'] as const;
export type IntType = (typeof INT_TYPES)[number];
export type NarrowIntType = 'u8' | 'u16' | 'u32' | 'i8' | 'i16' | 'i32';
export type WideIntType = Exclude<IntType, NarrowIntType>;

export type IntLike = number | bigint;

export interface IntDomain {
  readonly type: IntType;
  readonly signed: boolean;
  readonly bits: number;
  readonly min: bigint;
  readonly max: bigint;
}

export type RangeBounds = { min?: IntLike; max?: IntLike; below?: IntLike };
export type RangeInput = string | RangeBounds;

/** Inclusive on both ends after normalization; `label` keeps the form it was written in. */
export interface IntRange {
  readonly min: bigint;
  readonly max: bigint;
  readonly exclusiveMax: boolean;
  readonly label: string;
}

export const Mode = {
  REQUIRED: 'required',
  REQUIRED_WITH_DEFAULT: 'required-with-default',
  OPTIONAL: 'optional',
} as const;
export type Mode = (typeof Mode)[keyof typeof Mode];

export interface SettingInput {
  name: string;
  type: IntType;
  range?: RangeInput;
  default?: IntLike;
  optional?: boolean;
}

export interface Setting {
  readonly name: string;
  readonly domain: IntDomain;
  readonly range: IntRange | null;
  readonly mode: Mode;
  readonly default: bigint | null;
}

export type Outcome =
  | { kind: 'value'; value: bigint; source: 'env' | 'default' }
  | { kind: 'none' }
  | { kind: 'failure'; error: SettingError };

export const DECIMAL_PATTERN = /^[+-]?[0-9]+$/;
const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
// Names a strict-mode module cannot bind with `export const`.
const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'await', 'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default', 'delete', 'do', 'else',
  'enum', 'export', 'extends', 'false', 'finally', 'for', 'function', 'if', 'import', 'in', 'instanceof', 'new',
  'null', 'return', 'super', 'switch', 'this', 'throw', 'true', 'try', 'typeof', 'var', 'void', 'while', 'with',
  'yield', 'let', 'static', 'implements', 'interface', 'package', 'private', 'protected', 'public', 'arguments',
  'eval',
]);

const IntLikeSchema = z.union([
  z
    .number()
    .refine(Number.isSafeInteger, 'must be a safe integer; write wider values as a decimal string')
    .transform((n) => BigInt(n)),
  z
    .string()
    .regex(DECIMAL_PATTERN, 'must be a decimal integer')
    .transform((s) => BigInt(s)),
]);

export const RangeSchema = z.union([
  z.string().min(1),
  z
    .object({
      min: IntLikeSchema.optional(),
      max: IntLikeSchema.optional(),
      below: IntLikeSchema.optional(),
    })
    .strict(),
]);

export const SettingEntrySchema = z
  .object({
    name: z.string().min(1),
    export: z.string().regex(IDENTIFIER_PATTERN, 'must be a valid identifier').optional(),
    type: z.enum(INT_TYPES),
    range: RangeSchema.optional(),
    default: IntLikeSchema.optional(),
    optional: z.boolean().optional(),
    description: z.string().optional(),
  })
  .strict();
export type SettingEntry = z.infer<typeof SettingEntrySchema>;

export const ManifestSchema = z
  .object({
    $schema: z.string().optional(),
    output: z.string().min(1),
    settings: z.array(SettingEntrySchema),
  })
  .strict()
  .superRefine((m, ctx) => {
    const names = new Set<string>();
    const exports = new Set<string>();
    m.settings.forEach((s, i) => {
      if (names.has(s.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['settings', i, 'name'], message: `duplicate setting ${s.name}` });
      }
      names.add(s.name);
      const exp = s.export ?? s.name;
      if (!IDENTIFIER_PATTERN.test(exp)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['settings', i, 'export'],
          message: `${exp} is not a valid identifier; set "export"`,
        });
      } else if (RESERVED_WORDS.has(exp)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['settings', i, 'export'],
          message: `${exp} is a reserved word; set "export"`,
        });
      }
      if (exports.has(exp)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['settings', i, 'export'], message: `duplicate export ${exp}` });
      }
      exports.add(exp);
    });
  });
export type Manifest = z.infer<typeof ManifestSchema>;

export type SettingResult =
  | { status: 'resolved'; entry: SettingEntry; exportName: string; setting: Setting; outcome: Outcome }
  | { status: 'invalid'; entry: SettingEntry; exportName: string; error: InvalidDeclarationError };

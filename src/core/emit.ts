import { Mode, type Outcome, type Setting, type SettingEntry } from '../types.js';
import { isNarrowType } from './domain.js';

export interface EmitEntry {
  exportName: string;
  entry: SettingEntry;
  setting: Setting;
  outcome: Outcome;
}

export function literal(setting: Setting, value: bigint): string {
  return isNarrowType(setting.domain.type) ? value.toString() : `${value}n`;
}

function describe(setting: Setting): string {
  const parts: string[] = [setting.domain.type];
  if (setting.mode === Mode.OPTIONAL) parts.push('optional');
  if (setting.default !== null) parts.push(`default ${setting.default}`);
  if (setting.range) parts.push(`range ${setting.range.label}`);
  return `${setting.name} (${parts.join(', ')})`;
}

function docComment(e: EmitEntry): string[] {
  const head = describe(e.setting);
  if (!e.entry.description) return [`/** ${head} */`];
  return ['/**', ` * ${e.entry.description.replace(/\*\//g, '*\\/')}`, ' *', ` * ${head}`, ' */'];
}

function declaration(e: EmitEntry): string {
  const { setting, outcome, exportName } = e;
  if (outcome.kind === 'failure') {
    throw outcome.error;
  }
  if (setting.mode === Mode.OPTIONAL) {
    const type = isNarrowType(setting.domain.type) ? 'number' : 'bigint';
    const value = outcome.kind === 'value' ? literal(setting, outcome.value) : 'undefined';
    return `export const ${exportName}: ${type} | undefined = ${value};`;
  }
  if (outcome.kind === 'none') {
    throw new Error(`${setting.name} has no value outside optional mode`);
  }
  return `export const ${exportName} = ${literal(setting, outcome.value)};`;
}

/** Renders resolved settings as a TypeScript module of constants. */
export function emitModule(entries: EmitEntry[], opts: { source: string }): string {
  const lines = [`// Generated by envconst from ${opts.source}. Do not edit.`, ''];
  for (const e of entries) {
    lines.push(...docComment(e), declaration(e));
  }
  return `${lines.join('\n')}\n`;
}

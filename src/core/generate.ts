import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, isAbsolute, join, resolve as resolvePath } from 'node:path';
import { randomBytes } from 'node:crypto';
import type { Manifest, Setting, SettingResult } from '../types.js';
import { emitModule, type EmitEntry } from './emit.js';
import { BuildHaltError, InvalidDeclarationError, StaleOutputError, type ResolutionFailure } from './errors.js';
import { loadManifest } from './manifest.js';
import { declareSetting, resolve } from './resolve.js';
import { createResolver, type EnvSource, type Resolver } from './resolver.js';

export interface GenerateOptions {
  env?: EnvSource;
  /** Overrides the manifest's `output`; relative to the working directory. */
  out?: string;
  check?: boolean;
}

export interface GenerateResult {
  outPath: string;
  written: boolean;
  results: SettingResult[];
}

export function resolveManifest(manifest: Manifest, resolver: Resolver): SettingResult[] {
  return manifest.settings.map((entry): SettingResult => {
    const exportName = entry.export ?? entry.name;
    let setting: Setting;
    try {
      setting = declareSetting(entry);
    } catch (e) {
      if (e instanceof InvalidDeclarationError) return { status: 'invalid', entry, exportName, error: e };
      throw e;
    }
    return { status: 'resolved', entry, exportName, setting, outcome: resolve(setting, resolver.lookup(entry.name)) };
  });
}

export function collectFailures(results: SettingResult[]): ResolutionFailure[] {
  const failures: ResolutionFailure[] = [];
  for (const r of results) {
    if (r.status === 'invalid') failures.push(r.error);
    else if (r.outcome.kind === 'failure') failures.push(r.outcome.error);
  }
  return failures;
}

export function renderResults(results: SettingResult[], source: string): string {
  const failures = collectFailures(results);
  if (failures.length > 0) throw new BuildHaltError(failures);

  const entries: EmitEntry[] = [];
  for (const r of results) {
    if (r.status === 'resolved') {
      entries.push({ exportName: r.exportName, entry: r.entry, setting: r.setting, outcome: r.outcome });
    }
  }
  return emitModule(entries, { source });
}

export function writeAtomic(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = join(dirname(path), `.${basename(path)}.${randomBytes(4).toString('hex')}.tmp`);
  writeFileSync(tmp, content);
  try {
    renameSync(tmp, path);
  } catch (e) {
    rmSync(tmp, { force: true });
    throw e;
  }
}

/**
 * Resolves every setting in the manifest and writes the constants module.
 * Nothing is written unless all settings resolve.
 */
export function generate(manifestPath: string, opts: GenerateOptions = {}): GenerateResult {
  const { path, dir, manifest } = loadManifest(manifestPath);
  const results = resolveManifest(manifest, createResolver(opts.env));
  const source = renderResults(results, basename(path));

  const outPath = opts.out
    ? resolvePath(opts.out)
    : isAbsolute(manifest.output)
      ? manifest.output
      : resolvePath(dir, manifest.output);

  const current = existsSync(outPath) ? readFileSync(outPath, 'utf-8') : null;
  if (opts.check) {
    if (current !== source) throw new StaleOutputError(outPath, current === null);
    return { outPath, written: false, results };
  }
  if (current === source) return { outPath, written: false, results };

  writeAtomic(outPath, source);
  return { outPath, written: true, results };
}

/** Resolves without rendering or writing anything. */
export function checkManifest(manifestPath: string, env?: EnvSource): { path: string; results: SettingResult[] } {
  const { path, manifest } = loadManifest(manifestPath);
  return { path, results: resolveManifest(manifest, createResolver(env)) };
}

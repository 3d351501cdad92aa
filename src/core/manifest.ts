import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve as resolvePath } from 'node:path';
import type { ZodIssue } from 'zod';
import { ManifestSchema, type Manifest } from '../types.js';
import { ManifestError } from './errors.js';

export interface LoadedManifest {
  path: string;
  dir: string;
  manifest: Manifest;
}

function describeIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

export function parseManifest(path: string, text: string): Manifest {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new ManifestError(path, [`not valid JSON (${e instanceof Error ? e.message : String(e)})`]);
  }

  const parsed = ManifestSchema.safeParse(data);
  if (!parsed.success) {
    throw new ManifestError(path, parsed.error.issues.map(describeIssue));
  }
  return parsed.data;
}

export function loadManifest(path: string): LoadedManifest {
  const abs = resolvePath(path);
  if (!existsSync(abs)) {
    throw new ManifestError(abs, ['file not found']);
  }
  return { path: abs, dir: dirname(abs), manifest: parseManifest(abs, readFileSync(abs, 'utf-8')) };
}

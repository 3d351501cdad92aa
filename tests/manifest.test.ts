import assert from 'node:assert/strict';
import test from 'node:test';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { ManifestError } from '../src/core/errors.js';
import { loadManifest, parseManifest } from '../src/core/manifest.js';

function issuesOf(text: string): string[] {
  try {
    parseManifest('envconst.json', text);
  } catch (e) {
    if (e instanceof ManifestError) return e.issues;
    throw e;
  }
  throw new Error('expected a ManifestError');
}

test('parseManifest converts numeric fields to bigint', () => {
  const manifest = parseManifest(
    'envconst.json',
    JSON.stringify({
      output: 'src/generated/build-env.ts',
      settings: [
        { name: 'MYCRATE_MAX_THING_LEN', type: 'u32', default: 64 },
        { name: 'OPTIONAL_MAX_LEN_LOG2', type: 'u32', range: { min: 1, below: 32 }, optional: true },
        { name: 'BIG', type: 'u64', default: '18446744073709551615' },
        { name: 'LOG2', export: 'MAX_LEN_LOG2', type: 'u32', range: '[0, 32)' },
      ],
    }),
  );
  assert.equal(manifest.output, 'src/generated/build-env.ts');
  assert.equal(manifest.settings[0].default, 64n);
  assert.deepEqual(manifest.settings[1].range, { min: 1n, below: 32n });
  assert.equal(manifest.settings[2].default, 18446744073709551615n);
  assert.equal(manifest.settings[3].export, 'MAX_LEN_LOG2');
  assert.equal(manifest.settings[3].range, '[0, 32)');
});

test('parseManifest reports invalid JSON', () => {
  const issues = issuesOf('{ "output": ');
  assert.equal(issues.length, 1);
  assert.ok(issues[0].startsWith('not valid JSON ('));
});

test('parseManifest reports schema problems with their path', () => {
  assert.deepEqual(issuesOf(JSON.stringify({ settings: [] })), ['output: Required']);

  const issues = issuesOf(
    JSON.stringify({
      output: 'out.ts',
      settings: [{ name: 'A', type: 'u9' }, { name: 'B', type: 'u8', default: 1.5 }, { name: 'C', type: 'u8', colour: 'red' }],
    }),
  );
  assert.equal(issues.length, 3);
  assert.ok(issues[0].startsWith('settings.0.type: '));
  assert.ok(issues[1].startsWith('settings.1.default: '));
  assert.ok(issues[2].startsWith('settings.2: '));
});

test('parseManifest rejects duplicate names and exports', () => {
  assert.deepEqual(
    issuesOf(
      JSON.stringify({
        output: 'out.ts',
        settings: [
          { name: 'A', type: 'u8' },
          { name: 'A', export: 'OTHER', type: 'u8' },
          { name: 'B', export: 'OTHER', type: 'u8' },
        ],
      }),
    ),
    ['settings.1.name: duplicate setting A', 'settings.2.export: duplicate export OTHER'],
  );
});

test('setting names that are not identifiers need an explicit export', () => {
  assert.deepEqual(issuesOf(JSON.stringify({ output: 'out.ts', settings: [{ name: 'my-size', type: 'u8' }] })), [
    'settings.0.export: my-size is not a valid identifier; set "export"',
  ]);
});

test('reserved words are rejected as export names', () => {
  assert.deepEqual(
    issuesOf(
      JSON.stringify({
        output: 'out.ts',
        settings: [
          { name: 'X', export: 'class', type: 'u8' },
          { name: 'default', type: 'u8' },
          { name: 'Y', export: 'let', type: 'u8' },
        ],
      }),
    ),
    [
      'settings.0.export: class is a reserved word; set "export"',
      'settings.1.export: default is a reserved word; set "export"',
      'settings.2.export: let is a reserved word; set "export"',
    ],
  );
});

test('loadManifest reports a missing file', () => {
  const path = join(tmpdir(), 'envconst-missing', 'envconst.json');
  assert.throws(() => loadManifest(path), (e: unknown) => e instanceof ManifestError && e.issues[0] === 'file not found');
});

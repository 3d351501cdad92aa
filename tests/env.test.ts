import assert from 'node:assert/strict';
import test from 'node:test';

import { envBig, envInt, tryEnvBig, tryEnvInt } from '../src/core/env.js';
import { MissingRequiredError, OutOfRangeError } from '../src/core/errors.js';
import { createResolver } from '../src/core/resolver.js';

test('envInt falls back to the default only when the variable is unset', () => {
  assert.equal(envInt('MAX_LEN', { type: 'u32', default: 64, env: {} }), 64);
  assert.equal(envInt('MAX_LEN', { type: 'u32', default: 64, env: { MAX_LEN: '128' } }), 128);
  assert.throws(() => envInt('MAX_LEN', { type: 'u32', default: 64, env: { MAX_LEN: 'lots' } }), {
    name: 'MalformedTextError',
  });
});

test('envInt without a default requires the variable', () => {
  assert.throws(() => envInt('MAX_LEN', { type: 'u16', env: {} }), MissingRequiredError);
});

test('tryEnvInt gives undefined for an unset variable but still rejects bad values', () => {
  const opts = { type: 'u32', range: '[1, 32)' } as const;
  assert.equal(tryEnvInt('LOG2', { ...opts, env: {} }), undefined);
  assert.equal(tryEnvInt('LOG2', { ...opts, env: { LOG2: '12' } }), 12);
  assert.throws(() => tryEnvInt('LOG2', { ...opts, env: { LOG2: '40' } }), OutOfRangeError);
});

test('envBig keeps 64-bit values exact', () => {
  assert.equal(envBig('BIG', { type: 'u64', env: { BIG: '18446744073709551615' } }), 18446744073709551615n);
  assert.equal(envBig('BIG', { type: 'i64', default: -1n, env: {} }), -1n);
  assert.equal(tryEnvBig('BIG', { type: 'i128', env: {} }), undefined);
});

test('helpers read process.env by default', () => {
  process.env.ENVCONST_TEST_SHIFT = '7';
  try {
    assert.equal(envInt('ENVCONST_TEST_SHIFT', { type: 'u8', range: '[0, 8)' }), 7);
  } finally {
    delete process.env.ENVCONST_TEST_SHIFT;
  }
  assert.equal(tryEnvInt('ENVCONST_TEST_SHIFT', { type: 'u8' }), undefined);
});

test('a resolver does not see changes made after it was created', () => {
  const env: Record<string, string | undefined> = { A: '1', B: undefined };
  const resolver = createResolver(env);
  env.A = '2';
  env.C = '3';
  assert.equal(resolver.lookup('A'), '1');
  assert.equal(resolver.lookup('B'), undefined);
  assert.equal(resolver.lookup('C'), undefined);
});

test('a resolver passes the text through untouched', () => {
  const resolver = createResolver({ A: ' 42 ', E: '' });
  assert.equal(resolver.lookup('A'), ' 42 ');
  assert.equal(resolver.lookup('E'), '');
});

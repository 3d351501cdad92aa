#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { performance } from 'node:perf_hooks';
import { DEFAULT_MANIFEST } from './config.js';
import { isIntType } from './core/domain.js';
import { BuildHaltError, ensureError } from './core/errors.js';
import { checkManifest, collectFailures, generate } from './core/generate.js';
import { parseIntLike } from './core/parse.js';
import { declareSetting, resolve } from './core/resolve.js';
import { createResolver } from './core/resolver.js';
import type { IntType } from './types.js';
import { createLogger, type Logger } from './ui/logger.js';
import { formatReport, summarize } from './ui/report.js';
import { paint } from './ui/theme.js';

process.on('uncaughtException', (err) => {
  console.error(`[fatal] ${err.message}`);
  process.exit(1);
});

function parseType(value: string): IntType {
  if (!isIntType(value)) {
    throw new InvalidArgumentError('Must be one of u8, u16, u32, u64, u128, i8, i16, i32, i64, i128.');
  }
  return value;
}

function parseDefault(value: string): bigint {
  const n = parseIntLike(value);
  if (n === null) throw new InvalidArgumentError('Must be a decimal integer.');
  return n;
}

function fail(log: Logger, error: unknown) {
  if (error instanceof BuildHaltError) {
    for (const f of error.failures) log.error(f.message);
  } else {
    log.error(ensureError(error).message);
  }
  process.exitCode = 1;
}

interface GenerateOpts {
  out?: string;
  check?: boolean;
  verbose?: boolean;
}

interface CheckOpts {
  verbose?: boolean;
}

interface GetOpts {
  type: IntType;
  range?: string;
  default?: bigint;
  optional?: boolean;
}

const program = new Command()
  .name('envconst')
  .version('0.1.0')
  .description('Resolve build-time environment settings into validated integer constants');

program
  .command('generate')
  .description('Resolve every setting in a manifest and write the constants module')
  .argument('[manifest]', 'Manifest file', DEFAULT_MANIFEST)
  .option('--out <file>', "Write here instead of the manifest's output")
  .option('--check', 'Fail if the output is missing or out of date instead of writing it')
  .option('--verbose', 'Print every resolved setting')
  .action((manifest: string, opts: GenerateOpts) => {
    const log = createLogger({ verbose: opts.verbose });
    const started = performance.now();
    try {
      const res = generate(manifest, { out: opts.out, check: opts.check });
      for (const line of formatReport(res.results)) log.debug(line);
      if (opts.check) log.success(`${res.outPath} is up to date`);
      else if (res.written) log.success(`Wrote ${res.outPath}`);
      else log.info(paint('dim', `${res.outPath} unchanged`));
      log.info(summarize(res.results, performance.now() - started));
    } catch (e) {
      fail(log, e);
    }
  });

program
  .command('check')
  .description('Resolve every setting in a manifest and report, without writing anything')
  .argument('[manifest]', 'Manifest file', DEFAULT_MANIFEST)
  .option('--verbose', 'Print debug output')
  .action((manifest: string, opts: CheckOpts) => {
    const log = createLogger({ verbose: opts.verbose });
    const started = performance.now();
    try {
      const { path, results } = checkManifest(manifest);
      log.debug(`Checking ${path}`);
      for (const line of formatReport(results)) log.info(line);
      log.info(summarize(results, performance.now() - started));
      if (collectFailures(results).length > 0) process.exitCode = 1;
    } catch (e) {
      fail(log, e);
    }
  });

program
  .command('get')
  .description('Resolve a single setting from the environment and print its value')
  .argument('<name>', 'Environment variable name')
  .option('-t, --type <type>', 'Integer type', parseType, 'u32')
  .option('-r, --range <interval>', 'Allowed range, e.g. "[1, 32)" or "[0, 255]"')
  .option('-d, --default <n>', 'Value to use when the variable is unset', parseDefault)
  .option('--optional', 'Print nothing instead of failing when the variable is unset')
  .action((name: string, opts: GetOpts) => {
    const log = createLogger();
    try {
      const setting = declareSetting({
        name,
        type: opts.type,
        range: opts.range,
        default: opts.default,
        optional: opts.optional,
      });
      const outcome = resolve(setting, createResolver().lookup(name));
      if (outcome.kind === 'failure') throw outcome.error;
      if (outcome.kind === 'value') log.info(outcome.value.toString());
    } catch (e) {
      fail(log, e);
    }
  });

try {
  program.parse();
} catch (e) {
  console.error(`[fatal] ${ensureError(e).message}`);
  process.exitCode = 1;
}

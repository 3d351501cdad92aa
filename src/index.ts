export * from './types.js';
export { domainOf, isIntType, isNarrowType } from './core/domain.js';
export * from './core/errors.js';
export { parseDecimal, type ParseResult } from './core/parse.js';
export { normalizeRange, parseInterval } from './core/range.js';
export { declareSetting, effectiveRange, resolve, unwrap } from './core/resolve.js';
export { createResolver, type EnvSource, type Resolver } from './core/resolver.js';
export { envBig, envInt, tryEnvBig, tryEnvInt, type EnvIntOptions, type TryEnvIntOptions } from './core/env.js';
export { loadManifest, parseManifest, type LoadedManifest } from './core/manifest.js';
export { emitModule, type EmitEntry } from './core/emit.js';
export { checkManifest, generate, resolveManifest, type GenerateOptions, type GenerateResult } from './core/generate.js';

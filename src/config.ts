import { envInt } from './core/env.js';

export const DEFAULT_MANIFEST = 'envconst.json';
export const MIN_WIDTH = 40;

export interface ToolConfig {
  maxWidth: number;
  verbose: boolean;
}

let cached: ToolConfig | null = null;

/** Read on first use so a bad value surfaces inside the CLI's error handling. */
export function toolConfig(): ToolConfig {
  cached ??= Object.freeze({
    maxWidth: envInt('ENVCONST_MAX_WIDTH', { type: 'u16', range: { min: 40, max: 400 }, default: 120 }),
    verbose: envInt('ENVCONST_VERBOSE', { type: 'u8', range: '[0, 1]', default: 0 }) === 1,
  });
  return cached;
}

import prettyMs from 'pretty-ms';
import wrapAnsi from 'wrap-ansi';
import stripAnsi from 'strip-ansi';
import { MIN_WIDTH, toolConfig } from '../config.js';

function clampWidth(cols: number): number {
  return Math.max(MIN_WIDTH, Math.min(cols - 4, toolConfig().maxWidth));
}

export const fmtMs = (ms: number) => prettyMs(ms, { compact: true });

export function wrap(text: string, width?: number): string {
  return wrapAnsi(text, width ?? getWidth(), { hard: true, trim: false });
}

export function textWidth(text: string): number {
  return stripAnsi(text).length;
}

export function padEnd(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - textWidth(text)));
}

export function indent(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line, i) => (i === 0 ? line : prefix + line))
    .join('\n');
}

export function getWidth(): number {
  return clampWidth(process.stdout.columns || 80);
}

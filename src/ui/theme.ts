import chalk from 'chalk';

export const T = {
  dim: '#666666',
  muted: '#888888',
  bright: '#FFFFFF',

  success: '#4EC9B0',
  error: '#F14C4C',

  name: '#9CDCFE',
  type: '#C586C0',
} as const;

export type Tone = keyof typeof T;

export const paint = (tone: Tone, text: string) => chalk.hex(T[tone])(text);

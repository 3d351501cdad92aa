import figures from 'figures';
import { toolConfig } from '../config.js';
import { paint } from './theme.js';

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  success: (message: string) => void;
  error: (message: string) => void;
};

export type LogSink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function createLogger(params?: { verbose?: boolean; sink?: LogSink }): Logger {
  const verbose = Boolean(params?.verbose) || toolConfig().verbose;
  const sink = params?.sink ?? consoleSink;

  return {
    debug: (message) => {
      if (!verbose) return;
      sink.err(paint('dim', message));
    },
    info: (message) => sink.out(message),
    success: (message) => sink.out(`${paint('success', figures.tick)} ${message}`),
    error: (message) => sink.err(`${paint('error', figures.cross)} ${message}`),
  };
}

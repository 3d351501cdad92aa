import figures from 'figures';
import type { SettingResult } from '../types.js';
import { literal } from '../core/emit.js';
import { fmtMs, getWidth, indent, padEnd, wrap } from './format.js';
import { paint } from './theme.js';

const TYPE_COL = 4;

function detail(r: SettingResult): { ok: boolean; symbol: string; text: string } {
  if (r.status === 'invalid') {
    return { ok: false, symbol: paint('error', figures.cross), text: paint('error', r.error.message) };
  }
  const { outcome, setting } = r;
  switch (outcome.kind) {
    case 'value': {
      const v = literal(setting, outcome.value);
      const text = outcome.source === 'default' ? `${paint('bright', v)} ${paint('dim', '(default)')}` : paint('bright', v);
      return { ok: true, symbol: paint('success', figures.tick), text };
    }
    case 'none':
      return { ok: true, symbol: paint('muted', figures.circle), text: paint('dim', 'unset') };
    case 'failure':
      return { ok: false, symbol: paint('error', figures.cross), text: paint('error', outcome.error.message) };
  }
}

/** One line per setting: status, name, type, then the value or what went wrong. */
export function formatReport(results: SettingResult[], opts?: { width?: number }): string[] {
  const width = opts?.width ?? getWidth();
  const nameCol = Math.max(0, ...results.map((r) => r.entry.name.length));
  const lead = 2 + nameCol + 2 + TYPE_COL + 2;

  return results.map((r) => {
    const d = detail(r);
    const head = `${d.symbol} ${padEnd(paint('name', r.entry.name), nameCol)}  ${padEnd(paint('type', r.entry.type), TYPE_COL)}  `;
    const body = indent(wrap(d.text, Math.max(20, width - lead)), ' '.repeat(lead));
    return head + body;
  });
}

export function summarize(results: SettingResult[], ms: number): string {
  const failed = results.filter((r) => !detail(r).ok).length;
  const n = results.length;
  const noun = n === 1 ? 'setting' : 'settings';
  if (failed > 0) return paint('error', `${failed} of ${n} ${noun} failed`) + paint('dim', ` (${fmtMs(ms)})`);
  return `${n} ${noun} resolved` + paint('dim', ` (${fmtMs(ms)})`);
}

import chalk from 'chalk';
import { SingleBar, Presets } from 'cli-progress';
import { colorLevel, getPalette } from './theme.js';
import { isInteractive, isQuiet, isTestEnv } from '../util/env.js';

type Style = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title';

// Plain text when piped or in CI
const level: chalk.Level = isInteractive() ? colorLevel() : 0;
const palette = getPalette(level);
const c = new chalk.Instance({ level });

function say(msg: string, style: Style = 'info') {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  if (isQuiet() && style !== 'error') return;
  let out = msg;
  switch (style) {
    case 'success': out = palette.success(msg); break;
    case 'warn': out = palette.warn(msg); break;
    case 'error': out = palette.error(msg); break;
    case 'dim': out = palette.dim(msg); break;
    case 'title': out = c.bold(palette.info(msg)); break;
    default: out = palette.info(msg); break;
  }
  console.log(out);
}

function bar(total: number, label = 'Rounds') {
  const enabled = isInteractive() && !isTestEnv();
  const progress = new SingleBar(
    {
      format: `${c.cyan(label)} {bar} {value}/{total}`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
    },
    Presets.shades_classic,
  );
  if (enabled) progress.start(total, 0);
  return {
    tick: (n = 1) => { if (enabled) progress.increment(n); },
    stop: () => { if (enabled) progress.stop(); },
  };
}

function table(rows: Array<Record<string, string | number>>) {
  if (isTestEnv()) return;
  if (rows.length === 0) return console.log('(none)');
  const headers = Object.keys(rows[0]);
  const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
  console.log(headers.map((h, i) => c.bold(h.padEnd(widths[i]))).join('  '));
  for (const r of rows) {
    console.log(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])).join('  '));
  }
}

export const ui = { say, bar, table };
export default ui;

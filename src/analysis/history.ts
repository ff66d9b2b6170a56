import fs from 'node:fs';
import path from 'node:path';
import dayjs, { type Dayjs } from 'dayjs';
import type { RoundRecord } from '../games/blackjack/types.js';

export function defaultHistoryFile(dir: string, now: Dayjs = dayjs()): string {
  return path.join(dir, `history-${now.format('YYYYMMDD-HHmmss')}.json`);
}

/** Writes the whole record sequence as one JSON array, replacing the file. */
export function writeHistory(file: string, records: readonly RoundRecord[]): string {
  const abs = path.resolve(file);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, JSON.stringify(records, null, 2) + '\n');
  return abs;
}

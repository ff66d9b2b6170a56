import { defaultTableConfig, type TableConfig } from '../../../config/table.js';
import { seededRNG } from '../../../util/rng.js';
import { RANKS, SUITS, Shoe, card } from '../cards.js';
import { BlackjackTable } from '../engine.js';
import { Participant } from '../participant.js';
import { ScriptedProvider, type Script } from '../providers/scripted.js';
import type { Card } from '../types.js';

/** `'AS'`, `'10H'`, `'QD'`: rank then suit letter. */
export function c(code: string): Card {
  const r = RANKS.find((x) => x === code.slice(0, -1));
  const s = SUITS.find((x) => x === code.slice(-1));
  if (!r || !s) throw new Error(`bad card code ${code}`);
  return card(r, s);
}

export function cs(...codes: string[]): Card[] {
  return codes.map(c);
}

export interface SeatSpec {
  name: string;
  chips?: number;
  script?: Script;
}

/**
 * Table whose every round deals `codes` in order: one card to each seat,
 * then the dealer's upcard, again for the hole card, then draws.
 */
export function stackedTable(seats: SeatSpec[], codes: string[], config: TableConfig = defaultTableConfig) {
  const providers = seats.map((s) => new ScriptedProvider(s.script));
  const participants = seats.map(
    (s, i) => new Participant({ name: s.name, seat: i + 1, chips: s.chips ?? 1000, provider: providers[i] }),
  );
  const table = new BlackjackTable(participants, {
    config,
    rng: seededRNG(7),
    shoeFactory: () => new Shoe(cs(...codes)),
  });
  return { table, participants, providers };
}

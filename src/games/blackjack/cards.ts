import { RNG, cryptoRNG } from '../../util/rng.js';
import { ShoeExhaustedError } from '../../util/errors.js';
import type { Card, Rank, Suit } from './types.js';

export const RANKS: readonly Rank[] = ['A', 'K', 'Q', 'J', '10', '9', '8', '7', '6', '5', '4', '3', '2'];
export const SUITS: readonly Suit[] = ['S', 'H', 'D', 'C'];
export const CARDS_PER_DECK = RANKS.length * SUITS.length;

const SUIT_SYMBOL: Record<Suit, string> = { S: '♠', H: '♥', D: '♦', C: '♣' };

export function card(r: Rank, s: Suit): Card {
  return Object.freeze({ r, s });
}

export function valueOfCard(r: Rank): number {
  if (r === 'A') return 11; // can be 1 later
  if (r === 'K' || r === 'Q' || r === 'J' || r === '10') return 10;
  return parseInt(r, 10);
}

export function isTenValued(r: Rank): boolean {
  return r !== 'A' && valueOfCard(r) === 10;
}

export function sameCard(a: Card, b: Card): boolean {
  return a.r === b.r && a.s === b.s;
}

export function formatCard(c: Card): string {
  return `${c.r}${SUIT_SYMBOL[c.s]}`;
}

export function formatCards(cards: readonly Card[]): string {
  return cards.length ? cards.map(formatCard).join(' ') : '(empty)';
}

export function makeShoe(decks = 2): Card[] {
  const cards: Card[] = [];
  for (let d = 0; d < decks; d++) {
    for (const s of SUITS) {
      for (const r of RANKS) {
        cards.push(card(r, s));
      }
    }
  }
  return cards;
}

export function shuffle<T>(cards: readonly T[], rng: RNG = cryptoRNG): T[] {
  const a = cards.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = rng(i + 1);
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

/**
 * Working deck(s) for one round. `cards[0]` is the next card out.
 */
export class Shoe {
  private readonly stack: Card[];
  private dealtCount = 0;

  constructor(cards: readonly Card[]) {
    // stored reversed so dealing is a pop
    this.stack = cards.slice().reverse();
  }

  static fresh(decks: number, rng: RNG = cryptoRNG): Shoe {
    return new Shoe(shuffle(makeShoe(decks), rng));
  }

  get size(): number {
    return this.stack.length;
  }

  get dealt(): number {
    return this.dealtCount;
  }

  deal(): Card {
    const next = this.stack.pop();
    if (!next) throw new ShoeExhaustedError(this.dealtCount);
    this.dealtCount++;
    return next;
  }

  /** Remaining cards in dealing order. */
  peekAll(): Card[] {
    return this.stack.slice().reverse();
  }
}

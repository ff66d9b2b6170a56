import { valueOfCard } from './cards.js';
import type { Card, Decision, HandState, HandTotal } from './types.js';

export const BLACKJACK = 21;

export function newHand(cards: Card[] = [], fromSplit = false): HandState {
  return { cards, fromSplit };
}

/**
 * Sums the hand counting every Ace as 11, then demotes Aces to 1 one at a
 * time while the total is over `limit`.
 */
export function handTotal(cards: readonly Card[], limit = BLACKJACK): HandTotal {
  let total = 0;
  let aces = 0;
  for (const c of cards) {
    total += valueOfCard(c.r);
    if (c.r === 'A') aces++;
  }
  while (total > limit && aces > 0) {
    total -= 10; // count one Ace as 1 instead of 11
    aces--;
  }
  return { total, soft: aces > 0 && total <= limit };
}

export function handValue(cards: readonly Card[], limit = BLACKJACK): number {
  return handTotal(cards, limit).total;
}

export function isSoft(cards: readonly Card[], limit = BLACKJACK): boolean {
  let total = 0;
  let elevenAces = 0;
  for (const c of cards) {
    total += valueOfCard(c.r);
    if (c.r === 'A') elevenAces++;
  }
  while (total > limit && elevenAces > 0) {
    total -= 10;
    elevenAces--;
  }
  return elevenAces > 0 && total <= limit;
}

export function isBust(cards: readonly Card[], limit = BLACKJACK): boolean {
  return handValue(cards, limit) > limit;
}

/** Two-card 21 dealt as such; a split hand reaching 21 is an ordinary 21. */
export function isBlackjack(hand: HandState, limit = BLACKJACK): boolean {
  if (hand.fromSplit || hand.cards.length !== 2) return false;
  return handValue(hand.cards, limit) === limit;
}

export function isPair(cards: readonly Card[]): boolean {
  return cards.length === 2 && cards[0].r === cards[1].r;
}

export function canPairSplit(hand: HandState, bet: number, chips: number, handCount: number): boolean {
  return isPair(hand.cards) && chips >= bet && handCount === 1;
}

export function canDouble(hand: HandState, bet: number, chips: number): boolean {
  return hand.cards.length === 2 && chips >= bet;
}

/**
 * Moves available on a hand. Surrender, double-down and split exist only on
 * the original two cards; a busted hand has none.
 */
export function legalDecisions(
  hand: HandState,
  bet: number,
  chips: number,
  handCount: number,
  limit = BLACKJACK,
): Decision[] {
  if (isBust(hand.cards, limit)) return [];
  if (hand.cards.length === 2) {
    const decisions: Decision[] = ['hit', 'stand', 'surrender'];
    if (canDouble(hand, bet, chips)) decisions.push('double-down');
    if (canPairSplit(hand, bet, chips, handCount)) decisions.push('split');
    return decisions;
  }
  if (hand.cards.length > 2) return ['hit', 'stand'];
  return [];
}

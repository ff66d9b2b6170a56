import { valueOfCard } from '../cards.js';
import { probHoleCardIsTen } from '../context.js';
import type { Card, Decision, DecisionContext, HandView } from '../types.js';
import { minimumBet, type DecisionProvider } from './types.js';

export const INSURANCE_THRESHOLD = 0.3;

function between(v: number, lo: number, hi: number) {
  return v >= lo && v <= hi;
}

function pairMove(rank: Card['r'], dealer: number): Decision | null {
  switch (rank) {
    case 'A':
    case '8':
      return 'split';
    case '10':
    case 'J':
    case 'Q':
    case 'K':
      return 'stand';
    case '9':
      return between(dealer, 2, 6) || dealer === 8 || dealer === 9 ? 'split' : 'stand';
    case '7':
      return between(dealer, 2, 7) ? 'split' : 'hit';
    case '6':
      return between(dealer, 3, 6) ? 'split' : 'hit';
    case '4':
      return 'hit';
    case '3':
    case '2':
      return between(dealer, 4, 7) ? 'split' : 'hit';
    default:
      return null; // fives play as a hard ten
  }
}

function softMove(total: number, dealer: number, canDouble: boolean): Decision | null {
  if (total >= 19) return 'stand';
  if (total === 18) {
    if (between(dealer, 3, 6) && canDouble) return 'double-down';
    return dealer <= 8 ? 'stand' : 'hit';
  }
  if (total === 17) return between(dealer, 3, 6) && canDouble ? 'double-down' : 'hit';
  if (total === 16 || total === 15) return between(dealer, 4, 6) && canDouble ? 'double-down' : 'hit';
  if (total === 14 || total === 13) return between(dealer, 5, 6) && canDouble ? 'double-down' : 'hit';
  return null;
}

function hardMove(total: number, dealer: number, legal: readonly Decision[]): Decision {
  const canDouble = legal.includes('double-down');
  const canSurrender = legal.includes('surrender');
  if (total >= 17) return 'stand';
  if (total >= 13) {
    if (canSurrender && total === 16 && dealer >= 9) return 'surrender';
    if (canSurrender && total === 15 && dealer === 10) return 'surrender';
    return dealer <= 6 ? 'stand' : 'hit';
  }
  if (total === 12) return between(dealer, 4, 6) ? 'stand' : 'hit';
  if (total === 11) return dealer !== 11 && canDouble ? 'double-down' : 'hit';
  if (total === 10) return between(dealer, 2, 9) && canDouble ? 'double-down' : 'hit';
  if (total === 9) return between(dealer, 3, 6) && canDouble ? 'double-down' : 'hit';
  return 'hit';
}

/**
 * Chart player: pairs, then soft totals, then hard totals, judged against
 * the dealer's upcard (Ace counts 11). Always bets the table minimum.
 */
export class BasicStrategyProvider implements DecisionProvider {
  readonly kind = 'basic';

  constructor(private readonly decks = 2) {}

  async chooseBet(available: readonly number[]): Promise<number> {
    return minimumBet(available);
  }

  async decide(hand: HandView, dealerUpcard: Card, _context: DecisionContext, legal: readonly Decision[]): Promise<Decision> {
    const dealer = valueOfCard(dealerUpcard.r);
    let move: Decision | null = null;
    if (legal.includes('split')) move = pairMove(hand.cards[0].r, dealer);
    if (!move && hand.soft) move = softMove(hand.value, dealer, legal.includes('double-down'));
    if (!move) move = hardMove(hand.value, dealer, legal);
    return legal.includes(move) ? move : 'stand';
  }

  async decideInsurance(context: DecisionContext): Promise<boolean> {
    const prob = context.probHoleCardIsTen ?? probHoleCardIsTen(context.cardsVisible, this.decks);
    return prob >= INSURANCE_THRESHOLD;
  }
}

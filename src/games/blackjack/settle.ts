import type { TableConfig } from '../../config/table.js';
import type { Outcome } from './types.js';

/** Bust is decided before any comparison with the dealer. */
export function determineOutcome(playerValue: number, dealerValue: number, limit = 21): Outcome {
  if (playerValue > limit) return 'bust';
  const dealerBusted = dealerValue > limit;
  if (dealerBusted || playerValue > dealerValue) return 'win';
  if (playerValue < dealerValue) return 'loss';
  return 'push';
}

/**
 * Gross chips credited at settlement, stake included. Surrender refunds
 * happen during the turn, so they credit nothing here.
 */
export function grossReturn(
  outcome: Outcome,
  bet: number,
  fromSplit: boolean,
  config: Pick<TableConfig, 'blackjackPayout' | 'splitBlackjackPayout'>,
): number {
  switch (outcome) {
    case 'blackjack':
      return bet + bet * (fromSplit ? config.splitBlackjackPayout : config.blackjackPayout);
    case 'win':
      return bet * 2;
    case 'push':
      return bet;
    case 'loss':
    case 'bust':
    case 'surrender':
      return 0;
  }
}

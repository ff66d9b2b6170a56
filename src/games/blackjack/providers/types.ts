import type { Card, Decision, DecisionContext, HandView } from '../types.js';

/**
 * What a seat plugs into the table. The table awaits every call before doing
 * anything else and never has two calls in flight.
 *
 * Implementations own their failures: a provider that cannot answer returns
 * the safe default (stand, no insurance, smallest offered bet) rather than
 * rejecting.
 */
export interface DecisionProvider {
  readonly kind: string;
  /** Must answer with a member of `available` (ascending, never empty). */
  chooseBet(available: readonly number[], chips: number): Promise<number>;
  decide(hand: HandView, dealerUpcard: Card, context: DecisionContext, legal: readonly Decision[]): Promise<Decision>;
  decideInsurance(context: DecisionContext): Promise<boolean>;
}

export function safeDecision(legal: readonly Decision[]): Decision {
  return legal.includes('stand') || legal.length === 0 ? 'stand' : legal[0];
}

export function minimumBet(available: readonly number[]): number {
  return Math.min(...available);
}

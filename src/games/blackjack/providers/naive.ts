import { RNG, coinFlip, cryptoRNG, pick } from '../../../util/rng.js';
import type { Card, Decision, DecisionContext, HandView } from '../types.js';
import { safeDecision, type DecisionProvider } from './types.js';

/** Picks uniformly among whatever is on offer. */
export class NaiveProvider implements DecisionProvider {
  readonly kind = 'naive';

  constructor(private readonly rng: RNG = cryptoRNG) {}

  async chooseBet(available: readonly number[]): Promise<number> {
    return pick(available, this.rng);
  }

  async decide(_hand: HandView, _upcard: Card, _context: DecisionContext, legal: readonly Decision[]): Promise<Decision> {
    if (legal.length === 0) return safeDecision(legal);
    return pick(legal, this.rng);
  }

  async decideInsurance(): Promise<boolean> {
    return coinFlip(this.rng);
  }
}

import type { Card, Decision, DecisionContext, HandView } from '../types.js';
import { minimumBet, type DecisionProvider } from './types.js';

export interface Script {
  bets?: number[];
  decisions?: Decision[];
  insurance?: boolean[];
}

/**
 * Replays fixed answers in order, then falls back to stand / no insurance /
 * minimum bet. Answers are returned verbatim, legal or not.
 */
export class ScriptedProvider implements DecisionProvider {
  readonly kind = 'scripted';
  private readonly bets: number[];
  private readonly decisions: Decision[];
  private readonly insurance: boolean[];
  readonly seen: { legal: Decision[]; cards: number }[] = [];

  constructor(script: Script = {}) {
    this.bets = [...(script.bets ?? [])];
    this.decisions = [...(script.decisions ?? [])];
    this.insurance = [...(script.insurance ?? [])];
  }

  async chooseBet(available: readonly number[]): Promise<number> {
    return this.bets.shift() ?? minimumBet(available);
  }

  async decide(hand: HandView, _upcard: Card, _context: DecisionContext, legal: readonly Decision[]): Promise<Decision> {
    this.seen.push({ legal: [...legal], cards: hand.cards.length });
    return this.decisions.shift() ?? 'stand';
  }

  async decideInsurance(): Promise<boolean> {
    return this.insurance.shift() ?? false;
  }

  get remaining(): number {
    return this.decisions.length;
  }
}

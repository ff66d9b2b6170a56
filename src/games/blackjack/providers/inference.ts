import { z } from 'zod';
import log from '../../../cli/logger.js';
import { normalizeError } from '../../../util/errors.js';
import { formatCard, formatCards } from '../cards.js';
import { DECISIONS, type Card, type Decision, type DecisionContext, type HandView } from '../types.js';
import { minimumBet, safeDecision, type DecisionProvider } from './types.js';

export type ChatMessage = { role: 'system' | 'user'; content: string };

/** Anything that turns a chat transcript into one reply. */
export interface InferenceClient {
  readonly model: string;
  complete(messages: ChatMessage[]): Promise<string>;
}

const decisionReply = z.object({ decision: z.enum(DECISIONS), reasoning: z.string().optional() });
const insuranceReply = z.object({ insurance: z.boolean(), reasoning: z.string().optional() });
const betReply = z.object({ bet: z.number(), reasoning: z.string().optional() });

const SYSTEM_PROMPT = [
  'You are an expert Blackjack player trying to maximise winnings.',
  'You are given the game state and the moves currently allowed.',
  'Reply with a single JSON object and nothing else.',
].join(' ');

/** Pulls the first JSON object out of a reply that may carry prose or code fences. */
export function extractJson(reply: string): unknown {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start < 0 || end < start) throw new Error('reply holds no JSON object');
  return JSON.parse(reply.slice(start, end + 1));
}

/**
 * Seat backed by a language model. Every failure (transport, unparsable
 * reply, move not on offer) is logged and answered with the safe default.
 */
export class InferenceProvider implements DecisionProvider {
  readonly kind = 'llm';
  private readonly log = log.withScope('inference');

  constructor(private readonly name: string, private readonly client: InferenceClient) {}

  private async ask<T>(schema: z.ZodType<T>, user: string): Promise<T> {
    const reply = await this.client.complete([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: user },
    ]);
    return schema.parse(extractJson(reply));
  }

  async chooseBet(available: readonly number[], chips: number): Promise<number> {
    const fallback = minimumBet(available);
    try {
      const { bet, reasoning } = await this.ask(
        betReply,
        `You have ${chips} chips. Choose your bet for this round from [${available.join(', ')}]. ` +
          'Manage your bankroll. Answer as {"bet": <number>, "reasoning": "<short>"}.',
      );
      if (available.includes(bet)) {
        this.log.debug(`${this.name} bets ${bet}`, { reasoning });
        return bet;
      }
      this.log.warn(`${this.name} chose unavailable bet ${bet}; using ${fallback}`);
    } catch (err) {
      this.log.warn(`${this.name}: bet request failed`, { model: this.client.model, error: normalizeError(err) });
    }
    return fallback;
  }

  async decide(hand: HandView, dealerUpcard: Card, context: DecisionContext, legal: readonly Decision[]): Promise<Decision> {
    const fallback = safeDecision(legal);
    if (legal.length === 0) return fallback;
    try {
      const { decision, reasoning } = await this.ask(
        decisionReply,
        [
          `Your hand: ${formatCards(hand.cards)} (value ${hand.value}${hand.soft ? ', soft' : ''}), bet ${hand.bet}, chips ${hand.chips}.`,
          `Dealer upcard: ${formatCard(dealerUpcard)}.`,
          `Players at the table: ${context.numParticipants}. Cards visible: ${formatCards(context.cardsVisible)}.`,
          context.numHandsForThisParticipant ? `You are playing ${context.numHandsForThisParticipant} hand(s).` : '',
          `Allowed moves: ${legal.join(', ')}.`,
          'Answer as {"decision": "<move>", "reasoning": "<short>"}.',
        ].filter(Boolean).join('\n'),
      );
      if (legal.includes(decision)) {
        this.log.debug(`${this.name} -> ${decision}`, { reasoning });
        return decision;
      }
      this.log.warn(`${this.name} chose ${decision}, which is not allowed; playing ${fallback}`);
    } catch (err) {
      this.log.warn(`${this.name}: decision request failed`, { model: this.client.model, error: normalizeError(err) });
    }
    return fallback;
  }

  async decideInsurance(context: DecisionContext): Promise<boolean> {
    try {
      const odds = context.probHoleCardIsTen === undefined ? 'unknown' : context.probHoleCardIsTen.toFixed(3);
      const { insurance } = await this.ask(
        insuranceReply,
        `The dealer shows an Ace. Cards visible: ${formatCards(context.cardsVisible)}. ` +
          `Probability the hole card is ten-valued: ${odds}. Insurance costs half your bet and pays 2:1. ` +
          'Answer as {"insurance": true|false, "reasoning": "<short>"}.',
      );
      return insurance;
    } catch (err) {
      this.log.warn(`${this.name}: insurance request failed`, { model: this.client.model, error: normalizeError(err) });
      return false;
    }
  }
}

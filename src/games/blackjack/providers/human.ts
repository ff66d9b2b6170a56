import { createInterface } from 'node:readline/promises';
import log from '../../../cli/logger.js';
import { normalizeError } from '../../../util/errors.js';
import { formatCard, formatCards } from '../cards.js';
import type { Card, Decision, DecisionContext, HandView } from '../types.js';
import { minimumBet, safeDecision, type DecisionProvider } from './types.js';

/** Asks one question, resolves with the raw answer line. */
export type Prompter = (question: string) => Promise<string>;

const SHORTCUTS: Record<string, Decision> = {
  h: 'hit',
  s: 'stand',
  d: 'double-down',
  p: 'split',
  r: 'surrender',
};

const MAX_ATTEMPTS = 5;

export function parseDecision(answer: string): Decision | null {
  const a = answer.trim().toLowerCase();
  if (SHORTCUTS[a]) return SHORTCUTS[a];
  const match = Object.values(SHORTCUTS).find((d) => d === a || d.replace('-', '') === a.replace(/[\s-]/g, ''));
  return match ?? null;
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): { ask: Prompter; close: () => void } {
  const rl = createInterface({ input, output });
  return { ask: (q) => rl.question(q), close: () => rl.close() };
}

/**
 * Seat played from the terminal. Unknown or illegal answers are asked again;
 * a prompt that fails outright (closed stdin) falls back to the safe default.
 */
export class HumanProvider implements DecisionProvider {
  readonly kind = 'human';
  private readonly log = log.withScope('human');

  constructor(private readonly name: string, private readonly ask: Prompter) {}

  async chooseBet(available: readonly number[], chips: number): Promise<number> {
    const fallback = minimumBet(available);
    try {
      for (let i = 0; i < MAX_ATTEMPTS; i++) {
        const answer = await this.ask(`${this.name}, you have ${chips} chips. Bet one of [${available.join(', ')}] (default ${fallback}): `);
        if (answer.trim() === '') return fallback;
        const n = Number(answer.trim());
        if (available.includes(n)) return n;
      }
    } catch (err) {
      this.log.warn(`${this.name}: bet prompt failed`, { error: normalizeError(err) });
    }
    return fallback;
  }

  async decide(hand: HandView, dealerUpcard: Card, context: DecisionContext, legal: readonly Decision[]): Promise<Decision> {
    const options = legal.map((d) => `${d} (${Object.keys(SHORTCUTS).find((k) => SHORTCUTS[k] === d)})`).join(', ');
    const question =
      `${this.name} hand ${hand.index + 1}: ${formatCards(hand.cards)} = ${hand.value}${hand.soft ? ' soft' : ''}` +
      ` | dealer shows ${formatCard(dealerUpcard)} | ${context.cardsVisible.length} cards visible\n` +
      `Choose: ${options}: `;
    try {
      for (let i = 0; i < MAX_ATTEMPTS; i++) {
        const choice = parseDecision(await this.ask(question));
        if (choice && legal.includes(choice)) return choice;
      }
    } catch (err) {
      this.log.warn(`${this.name}: decision prompt failed`, { error: normalizeError(err) });
    }
    return safeDecision(legal);
  }

  async decideInsurance(context: DecisionContext): Promise<boolean> {
    const odds = context.probHoleCardIsTen === undefined ? '' : ` (ten in the hole: ${(context.probHoleCardIsTen * 100).toFixed(1)}%)`;
    try {
      const answer = await this.ask(`${this.name}, dealer shows an Ace${odds}. Take insurance? [y/N]: `);
      return /^y(es)?$/i.test(answer.trim());
    } catch (err) {
      this.log.warn(`${this.name}: insurance prompt failed`, { error: normalizeError(err) });
      return false;
    }
  }
}

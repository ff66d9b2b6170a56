import { z } from 'zod';
import { TableError } from '../util/errors.js';

export const tableConfigSchema = z.object({
  decks: z.number().int().min(1).max(8).default(2),
  blackjackValue: z.number().int().positive().default(21),
  dealerStandValue: z.number().int().positive().default(17),
  /** Profit multiple on a natural Blackjack (3:2). */
  blackjackPayout: z.number().nonnegative().default(1.5),
  /** Profit multiple on a Blackjack scored on a split hand (even money). */
  splitBlackjackPayout: z.number().nonnegative().default(1.0),
  /** Gross multiple credited on a winning insurance bet. */
  insurancePayout: z.number().nonnegative().default(2),
  minBet: z.number().positive().default(2),
  maxBet: z.number().positive().default(500),
  betSizes: z.array(z.number().positive()).nonempty().default([10, 20, 50, 100]),
  minChipsToRemainActive: z.number().nonnegative().default(10),
  seed: z.number().int().optional(),
}).strict().superRefine((cfg, ctx) => {
  if (cfg.minBet > cfg.maxBet) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'minBet must not exceed maxBet', path: ['minBet'] });
  }
  if (!cfg.betSizes.some((b) => b >= cfg.minBet && b <= cfg.maxBet)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'no bet size falls within [minBet, maxBet]', path: ['betSizes'] });
  }
  if (cfg.dealerStandValue > cfg.blackjackValue) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'dealerStandValue must not exceed blackjackValue', path: ['dealerStandValue'] });
  }
});

export type TableConfigInput = z.input<typeof tableConfigSchema>;
export type TableConfig = Readonly<Omit<z.output<typeof tableConfigSchema>, 'betSizes'> & { betSizes: readonly number[] }>;

export function parseTableConfig(input: TableConfigInput = {}): TableConfig {
  const parsed = tableConfigSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`).join('; ');
    throw new TableError(`invalid table config: ${detail}`);
  }
  const betSizes = Object.freeze([...new Set(parsed.data.betSizes)].sort((a, b) => a - b));
  return Object.freeze({ ...parsed.data, betSizes });
}

export const defaultTableConfig: TableConfig = parseTableConfig();

/** Denominations a seat may choose from this round, ascending. */
export function availableBets(config: TableConfig, chips: number): number[] {
  return config.betSizes.filter((b) => b >= config.minBet && b <= config.maxBet && b <= chips);
}

export function isActive(config: TableConfig, chips: number): boolean {
  return chips >= config.minChipsToRemainActive && availableBets(config, chips).length > 0;
}

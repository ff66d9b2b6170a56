import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DECISIONS } from '../games/blackjack/types.js';
import { TableError } from '../util/errors.js';
import { tableConfigSchema } from './table.js';

const baseSeat = {
  name: z.string().min(1),
  chips: z.number().nonnegative().default(1000),
};

export const seatSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('basic'), ...baseSeat }),
  z.object({ type: z.literal('naive'), ...baseSeat }),
  z.object({ type: z.literal('human'), ...baseSeat }),
  z.object({ type: z.literal('llm'), ...baseSeat, model: z.string().optional() }),
  z.object({
    type: z.literal('scripted'),
    ...baseSeat,
    script: z.object({
      bets: z.array(z.number()).optional(),
      decisions: z.array(z.enum(DECISIONS)).optional(),
      insurance: z.array(z.boolean()).optional(),
    }).default({}),
  }),
]);

export const tableFileSchema = z.object({
  rules: tableConfigSchema.innerType().partial().default({}),
  seats: z.array(seatSchema).min(1),
});

export type SeatConfig = z.infer<typeof seatSchema>;
export type TableFile = z.infer<typeof tableFileSchema>;

export function parseTableFile(raw: unknown): TableFile {
  const parsed = tableFileSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'file'}: ${i.message}`).join('; ');
    throw new TableError(`invalid table file: ${detail}`);
  }
  return parsed.data;
}

export function loadTableFile(file: string): TableFile {
  const abs = path.resolve(process.cwd(), file);
  if (!fs.existsSync(abs)) throw new TableError(`table file not found: ${abs}`);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(abs, 'utf8'));
  } catch (err) {
    throw new TableError(`table file ${abs} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseTableFile(raw);
}

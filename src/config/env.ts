import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  /** Rounds per simulation run when --rounds is not given. */
  BJ_ROUNDS: z.coerce.number().int().positive().default(100),
  /** Fixed shuffle seed; unset means crypto randomness. */
  BJ_SEED: z.coerce.number().int().optional(),
  BJ_TABLE_FILE: z.string().default('config/table.json'),
  BJ_HISTORY_DIR: z.string().default('data/history'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
});

export type Env = z.infer<typeof envSchema>;

/** Reads `.env` from the working directory (if any), then validates. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env, dotenvPath = path.join(process.cwd(), '.env')): Env {
  if (source === process.env) loadDotenv({ path: dotenvPath });
  return envSchema.parse(source);
}

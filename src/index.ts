#!/usr/bin/env node
import { analyze, dealerSummary, reportRows } from './analysis/stats.js';
import { defaultHistoryFile, writeHistory } from './analysis/history.js';
import { SimulationRunner } from './analysis/runner.js';
import { parseArgs } from './cli/args.js';
import log from './cli/logger.js';
import { describeRound } from './cli/roundView.js';
import { ui } from './cli/ui.js';
import { loadEnv } from './config/env.js';
import { loadTableFile } from './config/seats.js';
import { parseTableConfig } from './config/table.js';
import { BlackjackTable } from './games/blackjack/engine.js';
import { Participant } from './games/blackjack/participant.js';
import { createProvider, createReadlinePrompter } from './games/blackjack/providers/index.js';
import { createOpenAIClient } from './games/blackjack/providers/openai.js';
import type { RoundRecord } from './games/blackjack/types.js';
import { normalizeError } from './util/errors.js';
import { rngFromSeed } from './util/rng.js';

const scope = log.withScope('main');

function printRound(record: RoundRecord) {
  for (const line of describeRound(record)) ui.say(line, 'dim');
}

async function main() {
  const env = loadEnv();
  log.setLevel(env.LOG_LEVEL);
  const args = parseArgs(process.argv.slice(2));
  const file = loadTableFile(args.table ?? env.BJ_TABLE_FILE);
  const config = parseTableConfig({ ...file.rules, seed: args.seed ?? file.rules.seed ?? env.BJ_SEED });
  const rng = rngFromSeed(config.seed);

  const needsTerminal = args.interactive || file.seats.some((s) => s.type === 'human');
  const terminal = needsTerminal ? createReadlinePrompter() : null;
  const apiKey = env.OPENAI_API_KEY;
  const inference = (model?: string) =>
    apiKey ? createOpenAIClient({ apiKey, model: model ?? env.OPENAI_MODEL, baseURL: env.OPENAI_BASE_URL }) : null;

  const participants = file.seats.map(
    (seat, i) =>
      new Participant({
        name: seat.name,
        seat: i + 1,
        chips: seat.chips,
        provider: createProvider(seat, { decks: config.decks, rng, prompter: terminal?.ask, inference }),
      }),
  );
  const table = new BlackjackTable(participants, { config, rng });
  const runner = new SimulationRunner(table);

  ui.say(`Blackjack: ${participants.length} seats, ${config.decks} decks${config.seed !== undefined ? `, seed ${config.seed}` : ''}`, 'title');
  try {
    const summary = terminal && args.interactive
      ? await runner.runInteractive(async () => /^y/i.test((await terminal.ask('Play another round? (y/n): ')).trim()), printRound)
      : await runner.run(args.rounds ?? env.BJ_ROUNDS);

    const report = analyze(runner.records);
    ui.say(`${summary.rounds} rounds in ${summary.durationMs}ms (${summary.stoppedBy})`, 'success');
    ui.table(reportRows(report));
    ui.say(dealerSummary(report.dealer), 'info');

    const out = writeHistory(defaultHistoryFile(args.out ?? env.BJ_HISTORY_DIR), runner.records);
    scope.info(`round history saved to ${out}`, { rounds: runner.records.length });
  } finally {
    terminal?.close();
  }
}

main().catch((err) => {
  scope.error('simulation aborted', { error: normalizeError(err) });
  process.exitCode = 1;
});

import log, { type ScopedLog } from '../cli/logger.js';
import { ui } from '../cli/ui.js';
import type { BlackjackTable } from '../games/blackjack/engine.js';
import type { RoundRecord } from '../games/blackjack/types.js';

export type StopReason = 'completed' | 'no-active-participants' | 'declined';

export interface RunSummary {
  rounds: number;
  stoppedBy: StopReason;
  durationMs: number;
}

/**
 * Plays rounds back to back on one table and keeps every record. Rounds never
 * overlap: each one is awaited before the next is dealt.
 */
export class SimulationRunner {
  private readonly history: RoundRecord[] = [];
  private readonly log: ScopedLog;

  constructor(private readonly table: BlackjackTable, opts: { logger?: ScopedLog } = {}) {
    this.log = opts.logger ?? log.withScope('runner');
  }

  get records(): readonly RoundRecord[] {
    return this.history;
  }

  private canContinue(): boolean {
    return this.table.activeParticipants().length > 0;
  }

  private async playOne(onRound?: (record: RoundRecord) => void): Promise<RoundRecord> {
    const record = await this.table.playRound();
    this.history.push(record);
    onRound?.(record);
    return record;
  }

  async run(rounds: number, onRound?: (record: RoundRecord) => void): Promise<RunSummary> {
    const started = Date.now();
    const progress = ui.bar(rounds);
    let played = 0;
    let stoppedBy: StopReason = 'completed';
    try {
      while (played < rounds) {
        if (!this.canContinue()) {
          stoppedBy = 'no-active-participants';
          this.log.info(`everyone is below the table minimum after ${played} rounds`);
          break;
        }
        await this.playOne(onRound);
        played++;
        progress.tick();
      }
    } finally {
      progress.stop();
    }
    return { rounds: played, stoppedBy, durationMs: Date.now() - started };
  }

  /** Keeps dealing while `again` says yes and someone can still bet. */
  async runInteractive(again: () => Promise<boolean>, onRound?: (record: RoundRecord) => void): Promise<RunSummary> {
    const started = Date.now();
    let played = 0;
    for (;;) {
      if (!this.canContinue()) {
        this.log.info('all players are out of chips');
        return { rounds: played, stoppedBy: 'no-active-participants', durationMs: Date.now() - started };
      }
      await this.playOne(onRound);
      played++;
      if (!(await again())) {
        return { rounds: played, stoppedBy: 'declined', durationMs: Date.now() - started };
      }
    }
  }
}

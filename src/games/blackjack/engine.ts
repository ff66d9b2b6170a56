import log, { type ScopedLog } from '../../cli/logger.js';
import { availableBets, defaultTableConfig, isActive, type TableConfig } from '../../config/table.js';
import { InvariantError, TableError, type Result } from '../../util/errors.js';
import { RNG, rngFromSeed } from '../../util/rng.js';
import { Shoe, formatCard, formatCards } from './cards.js';
import { buildContext, probHoleCardIsTen, visibleCards } from './context.js';
import { handTotal, legalDecisions } from './hand.js';
import { Dealer, Participant } from './participant.js';
import { buildRoundRecord } from './record.js';
import { determineOutcome, grossReturn } from './settle.js';
import { isDecision, type Decision, type HandView, type RoundPhase, type RoundRecord } from './types.js';

export type ShoeFactory = (decks: number, rng: RNG) => Shoe;

export interface TableOptions {
  config?: TableConfig;
  /** Defaults to a generator seeded from `config.seed`, or crypto when unseeded. */
  rng?: RNG;
  /** Builds the round's shoe; tests stack the deck through this. */
  shoeFactory?: ShoeFactory;
  logger?: ScopedLog;
}

/**
 * Maps whatever a provider answered onto a move the table will execute.
 * An unaffordable double on the opening two cards becomes a hit; anything
 * else outside the legal set becomes a stand.
 */
export function normalizeDecision(choice: unknown, legal: readonly Decision[], firstAction: boolean): Decision {
  if (isDecision(choice) && legal.includes(choice)) return choice;
  if (firstAction && choice === 'double-down' && legal.includes('hit')) return 'hit';
  return 'stand';
}

/**
 * Runs complete rounds for a fixed set of seats against a house dealer.
 * Only chip balances survive from one round to the next; the shoe, hands
 * and bets are rebuilt every time.
 */
export class BlackjackTable {
  readonly config: TableConfig;
  private readonly participants: readonly Participant[];
  private readonly dealer = new Dealer();
  private readonly rng: RNG;
  private readonly shoeFactory: ShoeFactory;
  private readonly log: ScopedLog;
  private shoe: Shoe | null = null;
  private phaseValue: RoundPhase = 'idle';
  private rounds = 0;

  constructor(participants: readonly Participant[], opts: TableOptions = {}) {
    const seats = new Set(participants.map((p) => p.seat));
    const names = new Set(participants.map((p) => p.name));
    if (seats.size !== participants.length) throw new TableError('two participants share a seat');
    if (names.size !== participants.length) throw new TableError('participant names must be unique');
    this.participants = [...participants].sort((a, b) => a.seat - b.seat);
    this.config = opts.config ?? defaultTableConfig;
    this.rng = opts.rng ?? rngFromSeed(this.config.seed);
    this.shoeFactory = opts.shoeFactory ?? ((decks, rng) => Shoe.fresh(decks, rng));
    this.log = opts.logger ?? log.withScope('table');
  }

  get phase(): RoundPhase {
    return this.phaseValue;
  }

  get roundNumber(): number {
    return this.rounds;
  }

  activeParticipants(): Participant[] {
    return this.participants.filter((p) => isActive(this.config, p.chips));
  }

  async playRound(): Promise<RoundRecord> {
    if (this.phaseValue !== 'idle' && this.phaseValue !== 'done') {
      throw new TableError(`round already in progress (${this.phaseValue})`);
    }
    const chipsBefore = new Map(this.participants.map((p) => [p, p.chips] as const));
    const insurancePaid = new Map<Participant, number>();
    const limit = this.config.blackjackValue;

    let roundNumber = 0;
    try {
      const seated = await this.setup();
      roundNumber = ++this.rounds;
      this.deal(seated);

      if (this.dealer.upcard.r === 'A') await this.offerInsurance(seated);

      const dealerBlackjack = this.resolveBlackjacks(seated, insurancePaid);
      if (!dealerBlackjack) {
        this.enter('player-turns');
        for (const p of seated) {
          if (p.slot(0).outcome === undefined) await this.playTurns(p, seated);
        }
        if (seated.some((p) => p.hasUnresolvedHand())) this.dealerTurn();
        this.determineOutcomes(seated);
      }

      this.settle(seated);
      const record = buildRoundRecord(roundNumber, this.dealer, seated, { chipsBefore, insurancePaid }, limit);
      this.enter('done');
      this.log.debug(`round ${roundNumber} done`, { dealer: record.dealer.finalValue });
      return record;
    } catch (err) {
      this.voidRound(roundNumber, chipsBefore);
      throw err;
    } finally {
      this.shoe = null;
    }
  }

  /**
   * A round that cannot finish is voided: every seat gets its opening balance
   * back and the round number is not used up.
   */
  private voidRound(roundNumber: number, chipsBefore: ReadonlyMap<Participant, number>) {
    for (const p of this.participants) {
      const opening = chipsBefore.get(p);
      if (opening !== undefined) p.restoreBalance(opening);
    }
    if (roundNumber > 0) {
      this.log.warn(`round ${roundNumber} voided during ${this.phaseValue}; bets returned`);
      this.rounds--;
    }
    this.dealer.reset();
    this.enter('idle');
  }

  private enter(phase: RoundPhase) {
    this.phaseValue = phase;
  }

  private draw() {
    if (!this.shoe) throw new InvariantError(`no shoe during ${this.phaseValue}`);
    return this.shoe.deal();
  }

  private expectOk(result: Result, what: string) {
    if (!result.ok) throw new InvariantError(`${what}: ${result.reason}`);
  }

  private async setup(): Promise<Participant[]> {
    this.enter('setup');
    this.shoe = this.shoeFactory(this.config.decks, this.rng);
    this.dealer.reset();
    for (const p of this.participants) p.resetForRound();

    const seated: Participant[] = [];
    for (const p of this.participants) {
      if (!isActive(this.config, p.chips)) {
        this.log.debug(`${p.name} sits out`, { chips: p.chips });
        continue;
      }
      const offered = availableBets(this.config, p.chips);
      const choice = await p.provider.chooseBet(offered, p.chips);
      const amount = offered.includes(choice) ? choice : offered[0];
      if (amount !== choice) this.log.warn(`${p.name} bet ${choice} is not offered; using ${amount}`);
      const placed = p.placeBet(amount);
      if (!placed.ok) {
        this.log.warn(`${p.name} bet rejected`, { reason: placed.reason });
        continue;
      }
      seated.push(p);
    }
    if (seated.length === 0) throw new TableError('no participant could be seated');
    return seated;
  }

  /** One card to each seat in order, then the dealer; twice. */
  private deal(seated: readonly Participant[]) {
    this.enter('deal');
    for (let pass = 0; pass < 2; pass++) {
      for (const p of seated) p.receive(this.draw());
      this.dealer.receive(this.draw());
    }
    for (const p of seated) p.markInitial(0);
    this.log.debug('dealt', {
      upcard: formatCard(this.dealer.upcard),
      seats: Object.fromEntries(seated.map((p) => [p.name, formatCards(p.slot(0).hand.cards)])),
    });
  }

  private async offerInsurance(seated: readonly Participant[]) {
    this.enter('insurance');
    const upcard = this.dealer.upcard;
    const prob = probHoleCardIsTen(visibleCards(seated, upcard), this.config.decks);
    const context = buildContext(seated, upcard, { probHoleCardIsTen: prob });
    for (const p of seated) {
      if (!(await p.provider.decideInsurance(context))) continue;
      const placed = p.placeInsurance();
      if (placed.ok) this.log.debug(`${p.name} insures for ${p.insuranceBet}`);
      else this.log.debug(`${p.name} cannot insure`, { reason: placed.reason });
    }
  }

  /** Returns true when the dealer's Blackjack ends the round. */
  private resolveBlackjacks(seated: readonly Participant[], insurancePaid: Map<Participant, number>): boolean {
    this.enter('blackjack-check');
    const limit = this.config.blackjackValue;
    if (this.dealer.hasBlackjack(limit)) {
      for (const p of seated) {
        if (p.insuranceBet > 0) {
          const paid = p.insuranceBet * this.config.insurancePayout;
          p.credit(paid);
          insurancePaid.set(p, paid);
        }
        p.assignOutcome(0, p.hasBlackjack(limit) ? 'push' : 'loss');
      }
      this.log.debug('dealer blackjack', { hand: formatCards(this.dealer.hand.cards) });
      return true;
    }
    for (const p of seated) {
      if (p.hasBlackjack(limit)) p.assignOutcome(0, 'blackjack');
    }
    return false;
  }

  /** Hands are played in index order; a split appends a hand that this loop then reaches. */
  private async playTurns(p: Participant, seated: readonly Participant[]) {
    for (let index = 0; index < p.slots.length; index++) {
      await this.playHand(p, index, seated);
    }
  }

  private async playHand(p: Participant, index: number, seated: readonly Participant[]) {
    const limit = this.config.blackjackValue;
    const upcard = this.dealer.upcard;
    for (;;) {
      const slot = p.slot(index);
      if (slot.outcome !== undefined || slot.frozen) return;

      const legal = legalDecisions(slot.hand, slot.bet, p.chips, p.slots.length, limit);
      if (legal.length === 0) {
        p.assignOutcome(index, 'bust');
        return;
      }
      const firstAction = slot.hand.cards.length === 2;
      const context = buildContext(seated, upcard, { numHandsForThisParticipant: p.slots.length });
      const choice = await p.provider.decide(this.view(p, index), upcard, context, legal);
      const decision = normalizeDecision(choice, legal, firstAction);
      if (decision !== choice) {
        this.log.debug(`${p.name} hand ${index}: ${String(choice)} not allowed, playing ${decision}`, { legal });
      }

      switch (decision) {
        case 'surrender':
          this.expectOk(p.surrender(index), `${p.name} surrender`);
          return;
        case 'split':
          this.split(p, index);
          continue;
        case 'double-down':
          this.expectOk(p.doubleDown(index), `${p.name} double-down`);
          p.receive(this.draw(), index);
          if (handTotal(slot.hand.cards, limit).total > limit) p.assignOutcome(index, 'bust');
          return;
        case 'hit':
          p.receive(this.draw(), index);
          if (handTotal(slot.hand.cards, limit).total > limit) {
            p.assignOutcome(index, 'bust');
            return;
          }
          continue;
        case 'stand':
          return;
      }
    }
  }

  /**
   * Each half of the pair takes one new card. Split Aces stop there: both
   * hands stand on two cards.
   */
  private split(p: Participant, index: number) {
    const aces = p.slot(index).hand.cards[0].r === 'A';
    this.expectOk(p.split(index), `${p.name} split`);
    const added = p.slots.length - 1;
    p.receive(this.draw(), index);
    p.receive(this.draw(), added);
    p.markInitial(index);
    p.markInitial(added);
    if (aces) {
      p.freeze(index);
      p.freeze(added);
    }
    this.log.debug(`${p.name} splits`, {
      hands: p.slots.map((s) => formatCards(s.hand.cards)),
      aces,
    });
  }

  private view(p: Participant, index: number): HandView {
    const slot = p.slot(index);
    const { total, soft } = handTotal(slot.hand.cards, this.config.blackjackValue);
    return Object.freeze({
      index,
      cards: Object.freeze(slot.hand.cards.slice()),
      value: total,
      soft,
      bet: slot.bet,
      chips: p.chips,
      fromSplit: slot.hand.fromSplit,
    });
  }

  private dealerTurn() {
    this.enter('dealer-turn');
    const limit = this.config.blackjackValue;
    while (this.dealer.shouldHit(this.config.dealerStandValue, limit)) {
      this.dealer.receive(this.draw());
    }
    this.log.debug('dealer stands', { hand: formatCards(this.dealer.hand.cards), value: this.dealer.value(limit) });
  }

  private determineOutcomes(seated: readonly Participant[]) {
    this.enter('outcomes');
    const limit = this.config.blackjackValue;
    const dealerValue = this.dealer.value(limit);
    for (const p of seated) {
      p.slots.forEach((slot, i) => {
        if (slot.outcome !== undefined) return;
        p.assignOutcome(i, determineOutcome(handTotal(slot.hand.cards, limit).total, dealerValue, limit));
      });
    }
  }

  private settle(seated: readonly Participant[]) {
    this.enter('settlement');
    for (const p of seated) {
      p.slots.forEach((slot, i) => {
        if (slot.outcome === undefined) throw new InvariantError(`${p.name} hand ${i} reached settlement unresolved`);
        p.settleHand(i, grossReturn(slot.outcome, slot.bet, slot.hand.fromSplit, this.config));
      });
    }
  }
}

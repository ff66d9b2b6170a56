import { InvariantError, OK, fail, type Result } from '../../util/errors.js';
import type { DecisionProvider } from './providers/types.js';
import { BLACKJACK, canDouble, canPairSplit, handValue, isBlackjack, newHand } from './hand.js';
import type { Card, HandState, Outcome } from './types.js';

/**
 * One bet and the hand it funds. Hands and bets travel together so a split
 * can never leave them misaligned.
 */
export interface HandSlot {
  readonly hand: HandState;
  bet: number;
  /** The hand's first two cards, captured when it was dealt or split. */
  initialCards: Card[];
  outcome?: Outcome;
  /** Split Aces: no further decisions. */
  frozen: boolean;
  /** Chips handed back during the turn (surrender). */
  refunded: number;
  /** Chips credited at settlement. */
  credited: number;
}

export interface ParticipantOptions {
  name: string;
  seat: number;
  chips: number;
  provider: DecisionProvider;
}

export class Participant {
  readonly name: string;
  readonly seat: number;
  readonly provider: DecisionProvider;
  private balance: number;
  private slotList: HandSlot[] = [];
  private insurance = 0;

  constructor(opts: ParticipantOptions) {
    if (!Number.isFinite(opts.chips) || opts.chips < 0) {
      throw new InvariantError(`${opts.name}: starting chips must be a non-negative number`);
    }
    this.name = opts.name;
    this.seat = opts.seat;
    this.provider = opts.provider;
    this.balance = opts.chips;
  }

  get chips(): number {
    return this.balance;
  }

  get insuranceBet(): number {
    return this.insurance;
  }

  get slots(): readonly HandSlot[] {
    return this.slotList;
  }

  slot(index: number): HandSlot {
    const s = this.slotList[index];
    if (!s) throw new InvariantError(`${this.name}: no hand at index ${index}`);
    return s;
  }

  /** Drops the round's hands and bets and resets the stack to `chips`. */
  restoreBalance(chips: number): void {
    this.balance = chips;
    this.resetForRound();
  }

  resetForRound(): void {
    this.slotList = [];
    this.insurance = 0;
  }

  /** Opens the round's first hand. Chips leave the stack immediately. */
  placeBet(amount: number): Result {
    if (!Number.isFinite(amount) || amount <= 0) return fail('Bet must be positive.');
    if (amount > this.balance) return fail(`Bet ${amount} exceeds available chips ${this.balance}.`);
    if (this.slotList.length > 0) return fail('A bet is already placed this round.');
    this.balance -= amount;
    this.slotList.push({ hand: newHand(), bet: amount, initialCards: [], frozen: false, refunded: 0, credited: 0 });
    return OK;
  }

  placeInsurance(): Result {
    const primary = this.slotList[0];
    if (!primary) return fail('No primary bet to insure.');
    if (this.insurance > 0) return fail('Insurance already placed.');
    const amount = primary.bet / 2;
    if (amount > this.balance) return fail(`Insurance ${amount} exceeds available chips ${this.balance}.`);
    this.insurance = amount;
    this.balance -= amount;
    return OK;
  }

  receive(card: Card, index = 0): void {
    this.slot(index).hand.cards.push(card);
  }

  /** Snapshot the opening two cards of a hand for the round record. */
  markInitial(index: number): void {
    const s = this.slot(index);
    s.initialCards = s.hand.cards.slice();
  }

  canSplit(index: number): boolean {
    const s = this.slot(index);
    return canPairSplit(s.hand, s.bet, this.balance, this.slotList.length);
  }

  /**
   * Moves the second card of the pair into a new hand at the end of the list,
   * funded by a matching bet. Both hands are marked as split hands.
   */
  split(index: number): Result {
    if (!this.canSplit(index)) return fail('Hand cannot be split.');
    const s = this.slot(index);
    const moved = s.hand.cards.pop();
    if (!moved) throw new InvariantError(`${this.name}: pair vanished during split`);
    s.hand.fromSplit = true;
    this.balance -= s.bet;
    this.slotList.push({ hand: newHand([moved], true), bet: s.bet, initialCards: [], frozen: false, refunded: 0, credited: 0 });
    return OK;
  }

  doubleDown(index: number): Result {
    const s = this.slot(index);
    if (!canDouble(s.hand, s.bet, this.balance)) return fail('Hand cannot be doubled.');
    this.balance -= s.bet;
    s.bet *= 2;
    return OK;
  }

  /** Gives up the hand and returns half its bet straight away. */
  surrender(index: number): Result {
    const s = this.slot(index);
    if (s.outcome !== undefined) return fail('Hand is already resolved.');
    if (s.hand.cards.length !== 2) return fail('Surrender is only allowed on the first two cards.');
    const refund = s.bet / 2;
    this.balance += refund;
    s.refunded += refund;
    this.assignOutcome(index, 'surrender');
    return OK;
  }

  freeze(index: number): void {
    this.slot(index).frozen = true;
  }

  assignOutcome(index: number, outcome: Outcome): void {
    const s = this.slot(index);
    if (s.outcome !== undefined) {
      throw new InvariantError(`${this.name}: hand ${index} already resolved as ${s.outcome}`);
    }
    s.outcome = outcome;
  }

  /** Credits a resolved hand's gross return. */
  settleHand(index: number, amount: number): void {
    const s = this.slot(index);
    if (s.outcome === undefined) throw new InvariantError(`${this.name}: hand ${index} settled without an outcome`);
    this.credit(amount);
    s.credited += amount;
  }

  credit(amount: number): void {
    if (!Number.isFinite(amount) || amount < 0) throw new InvariantError(`invalid credit ${amount}`);
    this.balance += amount;
  }

  hasBlackjack(limit = BLACKJACK): boolean {
    const first = this.slotList[0];
    return !!first && isBlackjack(first.hand, limit);
  }

  hasUnresolvedHand(): boolean {
    return this.slotList.some((s) => s.outcome === undefined);
  }

  cards(): Card[] {
    return this.slotList.flatMap((s) => s.hand.cards);
  }
}

export class Dealer {
  readonly hand: HandState = newHand();
  private opening: Card[] = [];

  reset(): void {
    this.hand.cards.length = 0;
    this.opening = [];
  }

  receive(card: Card): void {
    this.hand.cards.push(card);
    if (this.hand.cards.length === 2) this.opening = this.hand.cards.slice();
  }

  get upcard(): Card {
    const up = this.hand.cards[0];
    if (!up) throw new InvariantError('dealer has no upcard');
    return up;
  }

  get initialCards(): Card[] {
    return this.opening.slice();
  }

  value(limit = BLACKJACK): number {
    return handValue(this.hand.cards, limit);
  }

  hasBlackjack(limit = BLACKJACK): boolean {
    return isBlackjack(this.hand, limit);
  }

  /** Fixed house rule: draw below the stand value, stand on every 17 including soft. */
  shouldHit(standValue: number, limit = BLACKJACK): boolean {
    return this.value(limit) < standValue;
  }
}

import { InvariantError } from '../../util/errors.js';
import { handValue, isBlackjack } from './hand.js';
import type { Dealer, HandSlot, Participant } from './participant.js';
import type { DealerRecord, HandRecord, ParticipantRecord, RoundRecord } from './types.js';

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

export function handRecord(slot: HandSlot, limit: number): HandRecord {
  if (slot.outcome === undefined) throw new InvariantError('cannot record a hand without an outcome');
  const finalValue = handValue(slot.hand.cards, limit);
  const returned = slot.credited + slot.refunded;
  return {
    initialHand: slot.initialCards.slice(),
    finalHand: slot.hand.cards.slice(),
    finalValue,
    bet: slot.bet,
    outcome: slot.outcome,
    payout: returned - slot.bet,
    returned,
    fromSplit: slot.hand.fromSplit,
    isBlackjack: isBlackjack(slot.hand, limit),
    isBusted: finalValue > limit,
  };
}

export function dealerRecord(dealer: Dealer, limit: number): DealerRecord {
  const finalValue = dealer.value(limit);
  return {
    initialHand: dealer.initialCards,
    finalHand: dealer.hand.cards.slice(),
    finalValue,
    isBlackjack: dealer.hasBlackjack(limit),
    isBusted: finalValue > limit,
  };
}

export interface RoundLedger {
  chipsBefore: ReadonlyMap<Participant, number>;
  insurancePaid: ReadonlyMap<Participant, number>;
}

export function buildRoundRecord(
  roundNumber: number,
  dealer: Dealer,
  seated: readonly Participant[],
  ledger: RoundLedger,
  limit: number,
): RoundRecord {
  const participants: ParticipantRecord[] = seated.map((p) => {
    const chipsBefore = ledger.chipsBefore.get(p);
    if (chipsBefore === undefined) throw new InvariantError(`${p.name} was seated without an opening balance`);
    return {
      name: p.name,
      seat: p.seat,
      chipsBefore,
      chipsAfter: p.chips,
      insuranceBet: p.insuranceBet,
      insurancePayout: ledger.insurancePaid.get(p) ?? 0,
      hands: p.slots.map((s) => handRecord(s, limit)),
    };
  });
  return deepFreeze({ roundNumber, dealer: dealerRecord(dealer, limit), participants });
}

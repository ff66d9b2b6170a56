import { isTenValued, makeShoe, sameCard } from './cards.js';
import type { Participant } from './participant.js';
import type { Card, DecisionContext } from './types.js';

/**
 * Chance that the hole card is ten-valued, judged from a full reference shoe
 * with every visible card removed (as a multiset: one copy per sighting).
 */
export function probHoleCardIsTen(visible: readonly Card[], decks: number): number {
  const unseen = makeShoe(decks);
  for (const seen of visible) {
    const at = unseen.findIndex((c) => sameCard(c, seen));
    if (at >= 0) unseen.splice(at, 1);
  }
  if (unseen.length === 0) return 0;
  return unseen.filter((c) => isTenValued(c.r)).length / unseen.length;
}

export function visibleCards(participants: readonly Participant[], upcard: Card): Card[] {
  return [...participants.flatMap((p) => p.cards()), upcard];
}

export function buildContext(
  participants: readonly Participant[],
  upcard: Card,
  extra: { numHandsForThisParticipant?: number; probHoleCardIsTen?: number } = {},
): DecisionContext {
  const cardsVisible = Object.freeze(visibleCards(participants, upcard));
  return Object.freeze({
    numParticipants: participants.length,
    cardsVisible,
    ...extra,
  });
}

export type Suit = 'S' | 'H' | 'D' | 'C';
export type Rank = 'A' | 'K' | 'Q' | 'J' | '10' | '9' | '8' | '7' | '6' | '5' | '4' | '3' | '2';
export interface Card { readonly r: Rank; readonly s: Suit }

export const DECISIONS = ['hit', 'stand', 'double-down', 'split', 'surrender'] as const;
export type Decision = (typeof DECISIONS)[number];

export type Outcome = 'win' | 'loss' | 'push' | 'blackjack' | 'bust' | 'surrender';

export interface HandState {
  cards: Card[];
  fromSplit: boolean;
}

export interface HandTotal {
  total: number;
  soft: boolean;
}

/**
 * Snapshot handed to decision providers. Rebuilt by the table whenever new
 * cards become visible; providers never see the dealer's hole card.
 */
export interface DecisionContext {
  readonly numParticipants: number;
  readonly cardsVisible: readonly Card[];
  readonly numHandsForThisParticipant?: number;
  readonly probHoleCardIsTen?: number;
}

/** Read-only view of one seat's hand at decision time. */
export interface HandView {
  readonly index: number;
  readonly cards: readonly Card[];
  readonly value: number;
  readonly soft: boolean;
  readonly bet: number;
  readonly chips: number;
  readonly fromSplit: boolean;
}

export type RoundPhase =
  | 'idle'
  | 'setup'
  | 'deal'
  | 'insurance'
  | 'blackjack-check'
  | 'player-turns'
  | 'dealer-turn'
  | 'outcomes'
  | 'settlement'
  | 'done';

export interface HandRecord {
  initialHand: Card[];
  finalHand: Card[];
  finalValue: number;
  bet: number;
  outcome: Outcome;
  /** Net result of the hand: `returned - bet`. */
  payout: number;
  /** Everything credited back for this hand, stake included. */
  returned: number;
  fromSplit: boolean;
  isBlackjack: boolean;
  isBusted: boolean;
}

export interface ParticipantRecord {
  name: string;
  seat: number;
  chipsBefore: number;
  chipsAfter: number;
  insuranceBet: number;
  insurancePayout: number;
  hands: HandRecord[];
}

export interface DealerRecord {
  initialHand: Card[];
  finalHand: Card[];
  finalValue: number;
  isBlackjack: boolean;
  isBusted: boolean;
}

export interface RoundRecord {
  roundNumber: number;
  dealer: DealerRecord;
  participants: ParticipantRecord[];
}

export function isDecision(value: unknown): value is Decision {
  return typeof value === 'string' && (DECISIONS as readonly string[]).includes(value);
}

import type { RoundRecord } from '../games/blackjack/types.js';

export interface ParticipantStats {
  name: string;
  handsPlayed: number;
  totalWagered: number;
  net: number;
  wins: number;
  losses: number;
  pushes: number;
  blackjacks: number;
  busts: number;
  surrenders: number;
  insuranceTaken: number;
  insuranceNet: number;
  finalChips: number;
}

export interface DealerStats {
  rounds: number;
  busts: number;
  blackjacks: number;
  /** What the house took off the table, insurance included. */
  houseProfit: number;
}

export interface Report {
  rounds: number;
  participants: ParticipantStats[];
  dealer: DealerStats;
}

function blank(name: string): ParticipantStats {
  return {
    name, handsPlayed: 0, totalWagered: 0, net: 0, wins: 0, losses: 0, pushes: 0,
    blackjacks: 0, busts: 0, surrenders: 0, insuranceTaken: 0, insuranceNet: 0, finalChips: 0,
  };
}

/** Blackjacks count as wins and busts as losses, on top of their own tallies. */
export function analyze(records: readonly RoundRecord[]): Report {
  const byName = new Map<string, ParticipantStats>();
  const dealer: DealerStats = { rounds: 0, busts: 0, blackjacks: 0, houseProfit: 0 };

  for (const round of records) {
    dealer.rounds++;
    if (round.dealer.isBusted) dealer.busts++;
    if (round.dealer.isBlackjack) dealer.blackjacks++;

    for (const p of round.participants) {
      let s = byName.get(p.name);
      if (!s) {
        s = blank(p.name);
        byName.set(p.name, s);
      }
      s.finalChips = p.chipsAfter;
      if (p.insuranceBet > 0) {
        s.insuranceTaken++;
        const insuranceNet = p.insurancePayout - p.insuranceBet;
        s.insuranceNet += insuranceNet;
        dealer.houseProfit -= insuranceNet;
      }
      for (const h of p.hands) {
        s.handsPlayed++;
        s.totalWagered += h.bet;
        s.net += h.payout;
        dealer.houseProfit -= h.payout;
        switch (h.outcome) {
          case 'win': s.wins++; break;
          case 'blackjack': s.blackjacks++; s.wins++; break;
          case 'loss': s.losses++; break;
          case 'bust': s.busts++; s.losses++; break;
          case 'push': s.pushes++; break;
          case 'surrender': s.surrenders++; break;
        }
      }
    }
  }
  return { rounds: records.length, participants: [...byName.values()], dealer };
}

export function winRate(s: ParticipantStats): number {
  return s.handsPlayed ? s.wins / s.handsPlayed : 0;
}

/** Net return per chip wagered on hands. */
export function roi(s: ParticipantStats): number {
  return s.totalWagered ? s.net / s.totalWagered : 0;
}

const pct = (n: number) => `${(n * 100).toFixed(1)}%`;

export function reportRows(report: Report): Array<Record<string, string | number>> {
  return report.participants.map((s) => ({
    player: s.name,
    hands: s.handsPlayed,
    wagered: s.totalWagered,
    net: s.net,
    'win%': pct(winRate(s)),
    roi: pct(roi(s)),
    W: s.wins,
    L: s.losses,
    P: s.pushes,
    BJ: s.blackjacks,
    bust: s.busts,
    surr: s.surrenders,
    chips: s.finalChips,
  }));
}

export function dealerSummary(d: DealerStats): string {
  const bustRate = d.rounds ? d.busts / d.rounds : 0;
  return `dealer: ${d.rounds} rounds, ${d.busts} busts (${pct(bustRate)}), ${d.blackjacks} blackjacks, house net ${d.houseProfit}`;
}

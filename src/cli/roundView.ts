import { formatCards } from '../games/blackjack/cards.js';
import type { RoundRecord } from '../games/blackjack/types.js';

function signed(n: number): string {
  return n > 0 ? `+${n}` : String(n);
}

/** Plain-text summary of one finished round, one line per hand. */
export function describeRound(record: RoundRecord): string[] {
  const d = record.dealer;
  const dealerNote = d.isBlackjack ? ' blackjack' : d.isBusted ? ' bust' : '';
  const lines = [`Round ${record.roundNumber}: dealer ${formatCards(d.finalHand)} (${d.finalValue}${dealerNote})`];
  for (const p of record.participants) {
    p.hands.forEach((h, i) => {
      const label = p.hands.length > 1 ? `${p.name} #${i + 1}` : p.name;
      lines.push(`  ${label}: ${formatCards(h.finalHand)} (${h.finalValue}) ${h.outcome} bet ${h.bet} net ${signed(h.payout)}`);
    });
    if (p.insuranceBet > 0) {
      lines.push(`  ${p.name} insurance: ${p.insuranceBet} net ${signed(p.insurancePayout - p.insuranceBet)}`);
    }
    lines.push(`  ${p.name} chips: ${p.chipsBefore} -> ${p.chipsAfter}`);
  }
  return lines;
}

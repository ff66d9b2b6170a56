import { handTotal, legalDecisions, newHand } from '../../hand.js';
import { c, cs } from '../../tests/helpers.js';
import type { Card, DecisionContext, HandView } from '../../types.js';
import { BasicStrategyProvider } from '../basicStrategy.js';

const bot = new BasicStrategyProvider(2);
const ctx: DecisionContext = { numParticipants: 1, cardsVisible: [] };

function view(cards: Card[]): HandView {
  const { total, soft } = handTotal(cards);
  return { index: 0, cards, value: total, soft, bet: 10, chips: 990, fromSplit: false };
}

async function play(codes: string[], upcard: string) {
  const cards = cs(...codes);
  return bot.decide(view(cards), c(upcard), ctx, legalDecisions(newHand(cards), 10, 990, 1));
}

describe('basic strategy', () => {
  test('pairs', async () => {
    expect(await play(['8S', '8H'], '10D')).toBe('split');
    expect(await play(['AS', 'AH'], '6D')).toBe('split');
    expect(await play(['10S', '10H'], '6D')).toBe('stand');
    expect(await play(['9S', '9H'], '7D')).toBe('stand');
    expect(await play(['4S', '4H'], '5D')).toBe('hit');
  });

  test('fives play as a hard ten', async () => {
    expect(await play(['5S', '5H'], '6D')).toBe('double-down');
    expect(await play(['5S', '5H'], 'AD')).toBe('hit');
  });

  test('soft totals', async () => {
    expect(await play(['AS', '7H'], '4D')).toBe('double-down');
    expect(await play(['AS', '7H'], '8D')).toBe('stand');
    expect(await play(['AS', '7H'], '9D')).toBe('hit');
    expect(await play(['AS', '5H', '2D'], '4C')).toBe('stand');
    expect(await play(['AS', '8H'], '6D')).toBe('stand');
  });

  test('hard totals', async () => {
    expect(await play(['10S', '6H'], '10D')).toBe('surrender');
    expect(await play(['10S', '4H', '2D'], '10C')).toBe('hit');
    expect(await play(['10S', '6H'], '5D')).toBe('stand');
    expect(await play(['10S', '2H'], '4D')).toBe('stand');
    expect(await play(['10S', '2H'], '2D')).toBe('hit');
    expect(await play(['6S', '5H'], 'AD')).toBe('hit');
    expect(await play(['6S', '5H'], '10D')).toBe('double-down');
    expect(await play(['10S', '7H'], 'AD')).toBe('stand');
  });

  test('never answers with a move that is not allowed', async () => {
    expect(await bot.decide(view(cs('6S', '5H')), c('6D'), ctx, ['stand'])).toBe('stand');
    expect(await bot.decide(view(cs('10S', '6H')), c('10D'), ctx, ['hit', 'stand'])).toBe('hit');
  });

  test('bets the minimum and insures on a rich shoe', async () => {
    expect(await bot.chooseBet([10, 20, 50])).toBe(10);
    expect(await bot.decideInsurance({ ...ctx, probHoleCardIsTen: 0.31 })).toBe(true);
    expect(await bot.decideInsurance({ ...ctx, probHoleCardIsTen: 0.29 })).toBe(false);
    // falls back to computing from visible cards: 32/104
    expect(await bot.decideInsurance(ctx)).toBe(true);
  });
});

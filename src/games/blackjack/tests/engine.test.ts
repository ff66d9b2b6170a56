import { parseTableConfig } from '../../../config/table.js';
import { ShoeExhaustedError, TableError } from '../../../util/errors.js';
import { Shoe } from '../cards.js';
import { BlackjackTable, normalizeDecision } from '../engine.js';
import { Participant } from '../participant.js';
import { ScriptedProvider } from '../providers/scripted.js';
import type { DecisionProvider } from '../providers/types.js';
import type { DecisionContext } from '../types.js';
import { cs, stackedTable } from './helpers.js';

describe('normalizeDecision', () => {
  test('legal choices pass through', () => {
    expect(normalizeDecision('hit', ['hit', 'stand'], false)).toBe('hit');
  });

  test('unaffordable opening double becomes a hit', () => {
    expect(normalizeDecision('double-down', ['hit', 'stand', 'surrender'], true)).toBe('hit');
  });

  test('everything else becomes a stand', () => {
    expect(normalizeDecision('double-down', ['hit', 'stand'], false)).toBe('stand');
    expect(normalizeDecision('split', ['hit', 'stand', 'surrender'], true)).toBe('stand');
    expect(normalizeDecision('fold', ['hit', 'stand'], true)).toBe('stand');
    expect(normalizeDecision(undefined, ['hit', 'stand'], true)).toBe('stand');
  });
});

describe('blackjack round', () => {
  test('insurance pays against a dealer blackjack', async () => {
    const { table, providers } = stackedTable(
      [{ name: 'alice', script: { bets: [20], insurance: [true] } }],
      ['10S', 'AS', '9H', 'KH'],
    );
    const record = await table.playRound();
    const [alice] = record.participants;
    expect(alice.chipsBefore).toBe(1000);
    expect(alice.chipsAfter).toBe(990);
    expect(alice.insuranceBet).toBe(10);
    expect(alice.insurancePayout).toBe(20);
    expect(alice.hands).toHaveLength(1);
    expect(alice.hands[0]).toMatchObject({ outcome: 'loss', bet: 20, payout: -20, returned: 0, initialHand: cs('10S', '9H') });
    expect(record.dealer).toMatchObject({ isBlackjack: true, finalValue: 21, finalHand: cs('AS', 'KH') });
    expect(providers[0].seen).toHaveLength(0);
    expect(table.phase).toBe('done');
  });

  test('lost insurance when the dealer has no blackjack', async () => {
    const { table } = stackedTable(
      [{ name: 'alice', script: { bets: [20], insurance: [true] } }],
      ['10S', 'AS', '9H', '7D'],
    );
    const record = await table.playRound();
    const [alice] = record.participants;
    expect(alice.hands[0].outcome).toBe('win');
    expect(alice.insurancePayout).toBe(0);
    expect(alice.chipsAfter).toBe(1010);
    expect(record.dealer.finalHand).toEqual(cs('AS', '7D'));
  });

  test('dealer and player blackjack push', async () => {
    const { table } = stackedTable([{ name: 'alice', script: { bets: [20] } }], ['AD', 'AS', 'KD', 'KH']);
    const record = await table.playRound();
    expect(record.participants[0].hands[0]).toMatchObject({ outcome: 'push', payout: 0, isBlackjack: true });
    expect(record.participants[0].chipsAfter).toBe(1000);
  });

  test('natural blackjack pays 3:2 and skips the dealer turn', async () => {
    const { table, providers } = stackedTable([{ name: 'alice', script: { bets: [20] } }], ['AS', '9D', 'KH', '7C', '5S']);
    const record = await table.playRound();
    expect(record.participants[0].hands[0]).toMatchObject({ outcome: 'blackjack', payout: 30, returned: 50 });
    expect(record.participants[0].chipsAfter).toBe(1030);
    expect(record.dealer.finalHand).toEqual(cs('9D', '7C'));
    expect(providers[0].seen).toHaveLength(0);
  });

  test('splitting eights plays two funded hands', async () => {
    const { table, providers } = stackedTable(
      [{ name: 'alice', script: { bets: [10], decisions: ['split', 'stand', 'stand'] } }],
      ['8S', '10D', '8H', '7C', 'KS', 'QH'],
    );
    const record = await table.playRound();
    const hands = record.participants[0].hands;
    expect(hands).toHaveLength(2);
    expect(hands.map((h) => h.initialHand)).toEqual([cs('8S', 'KS'), cs('8H', 'QH')]);
    expect(hands.map((h) => h.outcome)).toEqual(['win', 'win']);
    expect(hands.every((h) => h.fromSplit && h.bet === 10 && h.payout === 10)).toBe(true);
    expect(record.participants[0].chipsAfter).toBe(1020);
    expect(providers[0].seen[1].legal).toEqual(['hit', 'stand', 'surrender', 'double-down']);
  });

  test('split aces take one card each and stop', async () => {
    const { table, providers } = stackedTable(
      [{ name: 'alice', script: { bets: [10], decisions: ['split', 'hit', 'hit'] } }],
      ['AS', '10D', 'AH', '7C', 'KS', '9H'],
    );
    const record = await table.playRound();
    const hands = record.participants[0].hands;
    expect(providers[0].seen).toHaveLength(1);
    expect(providers[0].remaining).toBe(2);
    expect(hands.map((h) => h.finalHand)).toEqual([cs('AS', 'KS'), cs('AH', '9H')]);
    expect(hands[0]).toMatchObject({ finalValue: 21, isBlackjack: false, outcome: 'win', returned: 20 });
    expect(hands[1]).toMatchObject({ finalValue: 20, outcome: 'win' });
    expect(record.participants[0].chipsAfter).toBe(1020);
  });

  test('double-down takes exactly one card on a doubled stake', async () => {
    const { table } = stackedTable(
      [{ name: 'alice', script: { bets: [10], decisions: ['double-down'] } }],
      ['6S', '10D', '5H', '7C', '10H'],
    );
    const record = await table.playRound();
    expect(record.participants[0].hands[0]).toMatchObject({
      bet: 20,
      finalHand: cs('6S', '5H', '10H'),
      finalValue: 21,
      outcome: 'win',
      payout: 20,
    });
    expect(record.participants[0].chipsAfter).toBe(1020);
  });

  test('surrender returns half and the dealer never draws', async () => {
    const { table } = stackedTable(
      [{ name: 'alice', script: { bets: [20], decisions: ['surrender'] } }],
      ['10S', '10D', '6H', '5C', '9S'],
    );
    const record = await table.playRound();
    expect(record.participants[0].hands[0]).toMatchObject({ outcome: 'surrender', returned: 10, payout: -10 });
    expect(record.participants[0].chipsAfter).toBe(990);
    expect(record.dealer.finalHand).toEqual(cs('10D', '5C'));
    expect(record.dealer.finalValue).toBe(15);
  });

  test('a bust is settled before the dealer plays', async () => {
    const { table } = stackedTable(
      [{ name: 'alice', script: { bets: [10], decisions: ['hit'] } }],
      ['10S', '10D', '6H', '6C', 'KS', '9D'],
    );
    const record = await table.playRound();
    expect(record.participants[0].hands[0]).toMatchObject({ outcome: 'bust', isBusted: true, finalValue: 26, payout: -10 });
    expect(record.dealer.finalHand).toEqual(cs('10D', '6C'));
  });

  test('an unaffordable double on the first action is played as a hit', async () => {
    const { table, providers } = stackedTable(
      [{ name: 'alice', chips: 10, script: { bets: [10], decisions: ['double-down'] } }],
      ['10S', '10D', '6H', '7C', '2C'],
    );
    const record = await table.playRound();
    expect(providers[0].seen[0].legal).toEqual(['hit', 'stand', 'surrender']);
    expect(record.participants[0].hands[0]).toMatchObject({ bet: 10, finalHand: cs('10S', '6H', '2C'), outcome: 'win' });
    expect(record.participants[0].chipsAfter).toBe(20);
  });

  test('surrender after a hit is played as a stand', async () => {
    const { table, providers } = stackedTable(
      [{ name: 'alice', script: { bets: [10], decisions: ['hit', 'surrender'] } }],
      ['10S', '10D', '2H', '7C', '3D'],
    );
    const record = await table.playRound();
    expect(providers[0].seen[1].legal).toEqual(['hit', 'stand']);
    expect(record.participants[0].hands[0]).toMatchObject({ finalHand: cs('10S', '2H', '3D'), outcome: 'loss', returned: 0 });
    expect(record.participants[0].chipsAfter).toBe(990);
  });

  test('split after a hit is played as a stand', async () => {
    const { table } = stackedTable(
      [{ name: 'alice', script: { bets: [10], decisions: ['hit', 'split'] } }],
      ['8S', '10D', '8H', '7C', '2D'],
    );
    const record = await table.playRound();
    expect(record.participants[0].hands).toHaveLength(1);
    expect(record.participants[0].hands[0]).toMatchObject({ finalHand: cs('8S', '8H', '2D'), outcome: 'win' });
  });

  test('a natural settles while the next seat plays and the dealer draws', async () => {
    const { table, providers } = stackedTable(
      [
        { name: 'alice', script: { bets: [20] } },
        { name: 'bob', script: { bets: [10], decisions: ['hit', 'stand'] } },
      ],
      ['AS', '10S', '9D', 'KH', '2H', '6C', '3D', '4C'],
    );
    const record = await table.playRound();
    const [alice, bob] = record.participants;
    expect(alice.hands[0]).toMatchObject({ outcome: 'blackjack', finalValue: 21, payout: 30 });
    expect(bob.hands[0]).toMatchObject({ outcome: 'loss', finalHand: cs('10S', '2H', '3D'), finalValue: 15, payout: -10 });
    expect(record.dealer).toMatchObject({ finalHand: cs('9D', '6C', '4C'), finalValue: 19 });
    expect(providers[0].seen).toHaveLength(0);
    expect(providers[1].seen).toHaveLength(2);
  });

  test('an illegal split is played as a stand', async () => {
    const { table } = stackedTable(
      [{ name: 'alice', script: { bets: [10], decisions: ['split'] } }],
      ['10S', '10D', '9H', '7C'],
    );
    const record = await table.playRound();
    expect(record.participants[0].hands).toHaveLength(1);
    expect(record.participants[0].hands[0]).toMatchObject({ finalHand: cs('10S', '9H'), outcome: 'win' });
  });

  test('bets that are not on offer fall back to the smallest size', async () => {
    const { table } = stackedTable([{ name: 'alice', script: { bets: [7] } }], ['10S', '10D', '9H', '7C']);
    const record = await table.playRound();
    expect(record.participants[0].hands[0].bet).toBe(10);
  });

  test('seats are dealt in seat order and the dealer draws to a bust', async () => {
    const providerA = new ScriptedProvider({ bets: [10] });
    const providerB = new ScriptedProvider({ bets: [20] });
    const table = new BlackjackTable(
      [
        new Participant({ name: 'bob', seat: 2, chips: 500, provider: providerB }),
        new Participant({ name: 'alice', seat: 1, chips: 500, provider: providerA }),
      ],
      { shoeFactory: () => new Shoe(cs('10S', '9S', '10D', '8H', '7H', '6C', '9D')) },
    );
    const record = await table.playRound();
    expect(record.participants.map((p) => p.name)).toEqual(['alice', 'bob']);
    expect(record.participants.map((p) => p.hands[0].initialHand)).toEqual([cs('10S', '8H'), cs('9S', '7H')]);
    expect(record.dealer).toMatchObject({ finalHand: cs('10D', '6C', '9D'), finalValue: 25, isBusted: true });
    expect(record.participants.map((p) => p.chipsAfter)).toEqual([510, 520]);
  });

  test('round numbers count up and every round gets a fresh shoe', async () => {
    const { table } = stackedTable([{ name: 'alice', script: { bets: [10, 10] } }], ['10S', '10D', '8H', '7C']);
    const first = await table.playRound();
    const second = await table.playRound();
    expect([first.roundNumber, second.roundNumber]).toEqual([1, 2]);
    expect(second.participants[0].chipsBefore).toBe(1010);
    expect(second.participants[0].chipsAfter).toBe(1020);
  });

  test('records are frozen', async () => {
    const { table } = stackedTable([{ name: 'alice' }], ['10S', '10D', '9H', '7C']);
    const record = await table.playRound();
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.participants[0].hands[0].finalHand)).toBe(true);
  });

  test('insurance context carries the hole-card probability', async () => {
    const contexts: DecisionContext[] = [];
    const provider: DecisionProvider = {
      kind: 'probe',
      chooseBet: async (available) => available[0],
      decide: async () => 'stand',
      decideInsurance: async (context) => {
        contexts.push(context);
        return false;
      },
    };
    const table = new BlackjackTable([new Participant({ name: 'p', seat: 1, chips: 100, provider })], {
      shoeFactory: () => new Shoe(cs('10S', 'AS', '9H', '7D')),
    });
    await table.playRound();
    expect(contexts).toHaveLength(1);
    expect(contexts[0].cardsVisible).toEqual(cs('10S', '9H', 'AS'));
    expect(contexts[0].probHoleCardIsTen).toBeCloseTo(31 / 101);
  });
});

describe('voided rounds', () => {
  test('a round that runs out of cards returns the bets and frees the table', async () => {
    const shoes = [cs('10S', '10D', '6H', '7C'), cs('10S', '10D', '8H', '7C')];
    const alice = new Participant({
      name: 'alice',
      seat: 1,
      chips: 100,
      provider: new ScriptedProvider({ bets: [10, 10], decisions: ['hit'] }),
    });
    const table = new BlackjackTable([alice], {
      shoeFactory: () => new Shoe(shoes.shift() ?? []),
    });

    await expect(table.playRound()).rejects.toThrow(ShoeExhaustedError);
    expect(table.phase).toBe('idle');
    expect(table.roundNumber).toBe(0);
    expect(alice.chips).toBe(100);
    expect(alice.slots).toHaveLength(0);

    const record = await table.playRound();
    expect(record.roundNumber).toBe(1);
    expect(record.participants[0]).toMatchObject({ chipsBefore: 100, chipsAfter: 110 });
    expect(table.phase).toBe('done');
  });

  test('a provider failing during bets refunds seats that already bet', async () => {
    const failing: DecisionProvider = {
      kind: 'broken',
      chooseBet: async () => {
        throw new Error('offline');
      },
      decide: async () => 'stand',
      decideInsurance: async () => false,
    };
    const alice = new Participant({ name: 'alice', seat: 1, chips: 100, provider: new ScriptedProvider({ bets: [20] }) });
    const table = new BlackjackTable([alice, new Participant({ name: 'bob', seat: 2, chips: 100, provider: failing })], {
      shoeFactory: () => new Shoe(cs('10S', '9S', '10D', '8H', '7H', '7C')),
    });
    await expect(table.playRound()).rejects.toThrow('offline');
    expect(alice.chips).toBe(100);
    expect(table.phase).toBe('idle');
  });
});

describe('table seating', () => {
  const provider = new ScriptedProvider();

  test('duplicate seats or names are rejected', () => {
    const a = new Participant({ name: 'a', seat: 1, chips: 100, provider });
    expect(() => new BlackjackTable([a, new Participant({ name: 'b', seat: 1, chips: 100, provider })])).toThrow(TableError);
    expect(() => new BlackjackTable([a, new Participant({ name: 'a', seat: 2, chips: 100, provider })])).toThrow(TableError);
  });

  test('seats below the activity threshold sit out', async () => {
    const { table } = stackedTable(
      [{ name: 'broke', chips: 5 }, { name: 'alice' }],
      ['10S', '10D', '9H', '7C'],
    );
    expect(table.activeParticipants().map((p) => p.name)).toEqual(['alice']);
    const record = await table.playRound();
    expect(record.participants.map((p) => p.name)).toEqual(['alice']);
  });

  test('a round with nobody able to bet fails and leaves the table idle', async () => {
    const { table } = stackedTable([{ name: 'broke', chips: 5 }], ['10S', '10D', '9H', '7C']);
    await expect(table.playRound()).rejects.toThrow(TableError);
    expect(table.phase).toBe('idle');
    expect(table.roundNumber).toBe(0);
  });

  test('custom limits flow through config', async () => {
    const config = parseTableConfig({ betSizes: [25, 5], minBet: 5, maxBet: 20 });
    const { table } = stackedTable([{ name: 'alice', chips: 100 }], ['10S', '10D', '9H', '7C'], config);
    const record = await table.playRound();
    expect(record.participants[0].hands[0].bet).toBe(5);
  });
});

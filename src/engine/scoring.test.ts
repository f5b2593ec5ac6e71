import { describe, test, expect } from 'vitest';
import { score } from './scoring';
import { HandLevel } from './handLevels';
import { createCard, createJoker, deal, makeDeck, shuffle } from './deck';
import type { CardExtras } from './deck';
import type { Card, Joker, Rank, Suit } from './types';

function makeCard(rank: Rank, suit: Suit, extras: CardExtras = {}): Card {
  return createCard(rank, suit, extras);
}

const kings = (extras: CardExtras = {}): Card[] => [
  makeCard(13, 'H', { ...extras, index: 0 }),
  makeCard(13, 'S', { index: 1 })
];

describe('score', () => {
  test('three tens with no jokers at level 1', () => {
    const played = [
      makeCard(10, 'H'), makeCard(10, 'D'), makeCard(10, 'S'),
      makeCard(2, 'C'), makeCard(3, 'D')
    ];
    const result = score(played, [], []);
    expect(result.handType).toBe('Three of a Kind');
    expect(result.handRank).toBe(4);
    expect(result.scoringIndices).toEqual([0, 1, 2]);
    expect(result.playedIndices).toEqual([0, 1, 2, 3, 4]);
    expect(result.baseChips).toBe(30);
    expect(result.baseMult).toBe(3);
    expect(result.cardChips).toBe(30); // 3 x 10
    expect(result.chips).toBe(60);
    expect(result.mult).toBe(3);
    expect(result.finalScore).toBe(180);
  });

  test('flat mult before the pair multiplier differs from after', () => {
    const joker = createJoker('Joker');
    const duo = createJoker('The Duo');

    // (2 x 2) + 4 = 8 -> 30 x 8
    const duoFirst = score(kings(), [], [duo, joker]);
    expect(duoFirst.chips).toBe(30);
    expect(duoFirst.mult).toBe(8);
    expect(duoFirst.finalScore).toBe(240);

    // (2 + 4) x 2 = 12 -> 30 x 12
    const jokerFirst = score(kings(), [], [joker, duo]);
    expect(jokerFirst.mult).toBe(12);
    expect(jokerFirst.finalScore).toBe(360);

    // the tallies match even though the scores differ
    expect(duoFirst.addMult).toBe(4);
    expect(jokerFirst.addMult).toBe(4);
    expect(duoFirst.xMult).toBe(2);
    expect(jokerFirst.xMult).toBe(2);
  });

  test('identical input gives identical breakdowns', () => {
    const played = [makeCard(9, 'H', { seal: 'red' }), makeCard(9, 'D', { edition: 'polychrome' })];
    const held = [makeCard(4, 'C', { enhancement: 'steel' })];
    const jokers = [createJoker('Bloodstone'), createJoker('Jolly Joker', { edition: 'foil' })];
    expect(score(played, held, jokers)).toEqual(score(played, held, jokers));
  });

  test('appending a flat mult joker never lowers the score', () => {
    const jokers: Joker[] = [createJoker('The Duo'), createJoker('Scary Face')];
    for (let round = 0; round < 20; round++) {
      const hand = deal(shuffle(makeDeck(), `mono-${round}`), 5);
      const before = score(hand, [], jokers).finalScore;
      const after = score(hand, [], [...jokers, createJoker('Joker')]).finalScore;
      expect(after).toBeGreaterThanOrEqual(before);
    }
  });

  test('empty play scores base High Card', () => {
    const result = score([], [], []);
    expect(result.handType).toBe('High Card');
    expect(result.scoringIndices).toEqual([]);
    expect(result.finalScore).toBe(5);
  });
});

describe('hand levels', () => {
  test('all-zero override falls back to level values', () => {
    const levels = new HandLevel({}, { Pair: { chips: 0, mult: 0 } });
    const result = score(kings(), [], [], levels);
    expect(result.baseChips).toBe(10);
    expect(result.baseMult).toBe(2);
    expect(result.finalScore).toBe(60);
  });

  test('reported values win over the level formula', () => {
    const levels = new HandLevel({ Pair: 4 }, { Pair: { chips: 50, mult: 5 } });
    // (50 + 20) x 5
    expect(score(kings(), [], [], levels).finalScore).toBe(350);
  });

  test('planet levels raise base chips and mult', () => {
    const levels = new HandLevel({ Pair: 3 });
    // chips 10 + 15 x 2 = 40, mult 2 + 1 x 2 = 4 -> (40 + 20) x 4
    expect(score(kings(), [], [], levels).finalScore).toBe(240);
  });
});

describe('card enhancements', () => {
  test('bonus card adds flat chips', () => {
    const result = score(kings({ enhancement: 'bonus' }), [], []);
    expect(result.cardChips).toBe(20);
    expect(result.addChips).toBe(30);
    expect(result.finalScore).toBe(120); // (10 + 20 + 30) x 2
  });

  test('mult card adds flat mult', () => {
    expect(score(kings({ enhancement: 'mult' }), [], []).finalScore).toBe(180); // 30 x 6
  });

  test('glass card doubles mult', () => {
    const result = score(kings({ enhancement: 'glass' }), [], []);
    expect(result.xMult).toBe(2);
    expect(result.finalScore).toBe(120); // 30 x 4
  });

  test('lucky card adds its expected mult', () => {
    expect(score(kings({ enhancement: 'lucky' }), [], []).finalScore).toBe(180); // 30 x (2 + 20 / 5)
  });

  test('stone card scores a flat 50 without rank chips', () => {
    const result = score([makeCard(13, 'H', { enhancement: 'stone' })], [], []);
    expect(result.handType).toBe('High Card');
    expect(result.cardChips).toBe(50);
    expect(result.finalScore).toBe(55); // (5 + 50) x 1
  });

  test('steel card does nothing when played', () => {
    expect(score(kings({ enhancement: 'steel' }), [], []).finalScore).toBe(60);
  });
});

describe('card editions', () => {
  test('foil adds chips', () => {
    expect(score(kings({ edition: 'foil' }), [], []).finalScore).toBe(160); // (30 + 50) x 2
  });

  test('holographic adds mult', () => {
    expect(score(kings({ edition: 'holographic' }), [], []).finalScore).toBe(360); // 30 x 12
  });

  test('polychrome multiplies before jokers add', () => {
    const result = score(kings({ edition: 'polychrome' }), [], [createJoker('Joker')]);
    // 2 x 1.5 = 3, then + 4
    expect(result.mult).toBe(7);
    expect(result.finalScore).toBe(210);
  });
});

describe('seals', () => {
  test('red seal scores the card twice', () => {
    const result = score(kings({ seal: 'red' }), [], []);
    expect(result.cardChips).toBe(30); // 10 + 10 + 10
    expect(result.finalScore).toBe(80); // (10 + 30) x 2
  });

  test('red seal retriggers per-card jokers too', () => {
    const result = score(kings({ seal: 'red' }), [], [createJoker('Lusty Joker')]);
    // the heart king triggers twice: 2 + 3 + 3
    expect(result.mult).toBe(8);
    expect(result.finalScore).toBe(320);
  });
});

describe('held cards', () => {
  test('steel card in hand multiplies mult', () => {
    const held = [makeCard(2, 'C', { enhancement: 'steel' })];
    expect(score(kings(), held, []).finalScore).toBe(90); // 30 x 3
  });

  test('polychrome steel card compounds', () => {
    const held = [makeCard(2, 'C', { enhancement: 'steel', edition: 'polychrome' })];
    expect(score(kings(), held, []).finalScore).toBe(135); // 30 x 2 x 1.5 x 1.5
  });

  test('red seal steel card triggers twice', () => {
    const held = [makeCard(2, 'C', { enhancement: 'steel', seal: 'red' })];
    expect(score(kings(), held, []).finalScore).toBe(135);
  });

  test('plain held cards do nothing', () => {
    const held = [makeCard(2, 'C', { edition: 'holographic' }), makeCard(7, 'D', { enhancement: 'glass' })];
    expect(score(kings(), held, []).finalScore).toBe(60);
  });
});

describe('joker editions', () => {
  test('edition applies straight after its own joker', () => {
    const jokers = [createJoker('Joker', { edition: 'holographic' }), createJoker('The Duo')];
    // ((2 + 4) + 10) x 2 = 32
    const result = score(kings(), [], jokers);
    expect(result.mult).toBe(32);
    expect(result.finalScore).toBe(960);
  });

  test('foil joker adds chips', () => {
    const result = score(kings(), [], [createJoker('Joker', { edition: 'foil' })]);
    expect(result.chips).toBe(80);
    expect(result.finalScore).toBe(480); // 80 x 6
  });

  test('unknown joker still carries its edition', () => {
    const result = score(kings(), [], [createJoker('Not A Real Joker', { edition: 'foil' })]);
    expect(result.finalScore).toBe(160);
  });

  test('unknown joker without edition changes nothing', () => {
    expect(score(kings(), [], [createJoker('Not A Real Joker')]).finalScore).toBe(60);
  });
});

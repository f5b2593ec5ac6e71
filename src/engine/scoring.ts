import type { Card, ClassifiedHand, Joker, ScoreBreakdown } from './types';
import type { EngineConfig } from './config';
import type { HandContext, JokerEffect } from './jokers';
import { DEFAULT_CONFIG } from './config';
import { ScoreAccumulator } from './accumulator';
import { HandLevel } from './handLevels';
import { cardValue } from './deck';
import { classify, handContains } from './evaluation';
import { jokerEffect } from './jokers';
import {
  BONUS_CHIPS,
  EDITION_XMULT,
  GLASS_XMULT,
  HAND_BASE,
  MULT_CARD_MULT,
  STEEL_HELD_XMULT,
  STONE_CHIPS
} from './tables';

const DEFAULT_LEVELS = new HandLevel();

function triggerCount(card: Card): number {
  return card.seal === 'red' ? 2 : 1;
}

function scoreCard(
  acc: ScoreAccumulator,
  card: Card,
  context: HandContext,
  effects: readonly (JokerEffect | undefined)[]
): void {
  acc.cardChip(card.enhancement === 'stone' ? STONE_CHIPS : cardValue(card));

  switch (card.enhancement) {
    case 'bonus':
      acc.plusChips(BONUS_CHIPS);
      break;
    case 'mult':
      acc.plusMult(MULT_CARD_MULT);
      break;
    case 'glass':
      acc.timesMult(GLASS_XMULT);
      break;
    case 'lucky': {
      const { luckyMult, luckyOdds } = context.config.approximations;
      acc.plusMult(luckyMult / luckyOdds);
      break;
    }
    case 'none':
    case 'wild':
    case 'steel':
    case 'stone':
    case 'gold':
      break;
  }

  acc.edition(card.edition);

  const trigger = { ...context, card };
  for (const effect of effects) {
    effect?.perCard?.(acc, trigger);
  }
}

// Only Steel cards act from the hand; a held Polychrome Steel card compounds
function scoreHeldCard(acc: ScoreAccumulator, card: Card): void {
  if (card.enhancement !== 'steel') return;
  for (let t = 0; t < triggerCount(card); t++) {
    acc.timesMult(STEEL_HELD_XMULT);
    acc.timesMult(EDITION_XMULT[card.edition] ?? 1);
  }
}

export function scoreClassified(
  played: readonly Card[],
  classified: ClassifiedHand,
  held: readonly Card[],
  jokers: readonly Joker[],
  handLevels: HandLevel = DEFAULT_LEVELS,
  config: EngineConfig = DEFAULT_CONFIG
): ScoreBreakdown {
  const { handType, scoringIndices } = classified;
  const base = handLevels.getBase(handType);
  const acc = new ScoreAccumulator(base.chips, base.mult);

  const context: HandContext = {
    handType,
    contains: handContains(handType),
    played,
    scoring: scoringIndices.map(i => played[i]),
    held,
    jokers,
    config
  };
  const effects = jokers.map(joker => jokerEffect(joker.name));

  for (const card of context.scoring) {
    for (let t = 0; t < triggerCount(card); t++) {
      scoreCard(acc, card, context, effects);
    }
  }

  for (const card of held) {
    scoreHeldCard(acc, card);
  }

  // Each joker's edition lands right after its own effect
  jokers.forEach((joker, slot) => {
    effects[slot]?.independent?.(acc, { ...context, joker, slot });
    acc.edition(joker.edition);
  });

  return {
    handType,
    handRank: HAND_BASE[handType].rank,
    baseChips: base.chips,
    baseMult: base.mult,
    cardChips: acc.cardChips,
    addChips: acc.addChips,
    addMult: acc.addMult,
    xMult: acc.xMult,
    chips: acc.chips,
    mult: acc.mult,
    finalScore: acc.score,
    scoringIndices: [...scoringIndices],
    playedIndices: played.map((_, i) => i)
  };
}

export function score(
  played: readonly Card[],
  held: readonly Card[],
  jokers: readonly Joker[],
  handLevels: HandLevel = DEFAULT_LEVELS,
  config: EngineConfig = DEFAULT_CONFIG
): ScoreBreakdown {
  return scoreClassified(played, classify(played), held, jokers, handLevels, config);
}

import type { Card, HandType, Joker, Rank, Suit } from './types';
import type { EngineConfig } from './config';
import type { ScoreAccumulator } from './accumulator';
import { hasSuit, isFace, rankNumber, rankOf } from './deck';
import { EVEN_RANKS, FIBONACCI_RANKS, ODD_RANKS } from './tables';

export interface HandContext {
  handType: HandType;
  contains: ReadonlySet<HandType>;
  played: readonly Card[];
  scoring: readonly Card[]; // ascending position order
  held: readonly Card[];
  jokers: readonly Joker[];
  config: EngineConfig;
}

export interface CardTrigger extends HandContext {
  card: Card;
}

export interface JokerTrigger extends HandContext {
  joker: Joker;
  slot: number;
}

export type PerCardHandler = (acc: ScoreAccumulator, trigger: CardTrigger) => void;
export type IndependentHandler = (acc: ScoreAccumulator, trigger: JokerTrigger) => void;

export interface JokerEffect {
  perCard?: PerCardHandler;
  independent?: IndependentHandler;
}

function hasRankIn(card: Card, ranks: ReadonlySet<Rank>): boolean {
  const rank = rankOf(card);
  return rank !== null && ranks.has(rank);
}

const suitMult = (suit: Suit, mult: number): JokerEffect => ({
  perCard: (acc, { card }) => {
    if (hasSuit(card, suit)) acc.plusMult(mult);
  }
});

const suitChips = (suit: Suit, chips: number): JokerEffect => ({
  perCard: (acc, { card }) => {
    if (hasSuit(card, suit)) acc.plusChips(chips);
  }
});

const containsMult = (sub: HandType, mult: number): JokerEffect => ({
  independent: (acc, { contains }) => {
    if (contains.has(sub)) acc.plusMult(mult);
  }
});

const containsChips = (sub: HandType, chips: number): JokerEffect => ({
  independent: (acc, { contains }) => {
    if (contains.has(sub)) acc.plusChips(chips);
  }
});

const containsXMult = (sub: HandType, factor: number): JokerEffect => ({
  independent: (acc, { contains }) => {
    if (contains.has(sub)) acc.timesMult(factor);
  }
});

const flatMult = (pick: (config: EngineConfig) => number): JokerEffect => ({
  independent: (acc, { config }) => acc.plusMult(pick(config))
});

const jokerStencil: JokerEffect = {
  independent: (acc, { jokers, config }) => {
    // Negative jokers bring their own slot
    const occupied = jokers.filter(j => j.edition !== 'negative').length;
    const empty = Math.max(0, config.jokerSlots - occupied);
    if (empty > 0) acc.timesMult(1 + empty);
  }
};

const EFFECTS: Record<string, JokerEffect> = {
  // Per scoring card
  'Greedy Joker': suitMult('D', 3),
  'Lusty Joker': suitMult('H', 3),
  'Wrathful Joker': suitMult('S', 3),
  'Gluttonous Joker': suitMult('C', 3),
  'Onyx Agate': suitMult('C', 7),
  'Arrowhead': suitChips('S', 50),
  'Bloodstone': {
    perCard: (acc, { card, config }) => {
      const { bloodstoneOdds, bloodstoneXMult } = config.approximations;
      if (hasSuit(card, 'H')) acc.timesMult(1 + (bloodstoneXMult - 1) / bloodstoneOdds);
    }
  },
  'Scary Face': {
    perCard: (acc, { card }) => {
      if (isFace(card)) acc.plusChips(30);
    }
  },
  'Fibonacci': {
    perCard: (acc, { card }) => {
      if (hasRankIn(card, FIBONACCI_RANKS)) acc.plusMult(8);
    }
  },
  'Even Steven': {
    perCard: (acc, { card }) => {
      if (hasRankIn(card, EVEN_RANKS)) acc.plusMult(4);
    }
  },
  'Odd Todd': {
    perCard: (acc, { card }) => {
      if (hasRankIn(card, ODD_RANKS)) acc.plusChips(31);
    }
  },
  'Scholar': {
    perCard: (acc, { card }) => {
      if (rankOf(card) !== 14) return;
      acc.plusChips(20);
      acc.plusMult(4);
    }
  },
  'Walkie Talkie': {
    perCard: (acc, { card }) => {
      const rank = rankOf(card);
      if (rank !== 10 && rank !== 4) return;
      acc.plusChips(10);
      acc.plusMult(4);
    }
  },
  'Photograph': {
    perCard: (acc, { card, scoring }) => {
      if (scoring.find(isFace) === card) acc.timesMult(2);
    }
  },

  // Hand-type conditions
  'Jolly Joker': containsMult('Pair', 8),
  'Zany Joker': containsMult('Three of a Kind', 12),
  'Mad Joker': containsMult('Two Pair', 10),
  'Crazy Joker': containsMult('Straight', 12),
  'Droll Joker': containsMult('Flush', 10),
  'Sly Joker': containsChips('Pair', 50),
  'Wily Joker': containsChips('Three of a Kind', 100),
  'Clever Joker': containsChips('Two Pair', 80),
  'Devious Joker': containsChips('Straight', 100),
  'Crafty Joker': containsChips('Flush', 80),
  'The Duo': containsXMult('Pair', 2),
  'The Trio': containsXMult('Three of a Kind', 3),
  'The Family': containsXMult('Four of a Kind', 4),
  'The Order': containsXMult('Straight', 3),
  'The Tribe': containsXMult('Flush', 2),

  // Whole-hand effects
  'Joker': flatMult(() => 4),
  'Half Joker': {
    independent: (acc, { played }) => {
      if (played.length <= 3) acc.plusMult(20);
    }
  },
  'Joker Stencil': jokerStencil,
  'Stencil Joker': jokerStencil,
  'Abstract Joker': {
    independent: (acc, { jokers }) => acc.plusMult(3 * jokers.length)
  },
  'Raised Fist': {
    independent: (acc, { held }) => {
      // Stone cards and unknown ranks are skipped
      const ranked = held.filter(card => rankOf(card) !== null);
      if (ranked.length === 0) return;
      const lowest = ranked.reduce((low, card) => (rankNumber(card) < rankNumber(low) ? card : low));
      acc.plusMult(rankNumber(lowest));
    }
  },
  'Blackboard': {
    independent: (acc, { held }) => {
      if (held.length > 0 && held.every(c => hasSuit(c, 'S') || hasSuit(c, 'C'))) acc.timesMult(3);
    }
  },
  'Steel Joker': {
    independent: (acc, { held }) => {
      const steel = held.filter(c => c.enhancement === 'steel').length;
      if (steel > 0) acc.timesMult(1 + 0.2 * steel);
    }
  },
  'Swashbuckler': {
    independent: (acc, { jokers, slot, config }) => {
      const peers = jokers.filter((_, i) => i !== slot);
      const known = peers.flatMap(j => (j.sellValue === undefined ? [] : [j.sellValue]));
      if (peers.length > 0 && known.length === 0) {
        acc.plusMult(config.approximations.swashbucklerMult);
        return;
      }
      acc.plusMult(known.reduce((sum, value) => sum + value, 0));
    }
  },

  // Approximated: the snapshot lacks round history, discards and deck size
  'Green Joker': flatMult(c => c.approximations.greenJokerMult),
  'Red Card': flatMult(c => c.approximations.redCardMult),
  'Misprint': flatMult(c => c.approximations.misprintMult),
  'Mystic Summit': flatMult(c => c.approximations.mysticSummitMult),
  'Ride the Bus': flatMult(c => c.approximations.rideTheBusMult),
  'Supernova': flatMult(c => c.approximations.supernovaMult),
  'Blue Joker': {
    independent: (acc, { config }) => acc.plusChips(config.approximations.blueJokerChips)
  },
  'Banner': {
    independent: (acc, { config }) => {
      const { bannerChipsPerDiscard, assumedDiscardsLeft } = config.approximations;
      acc.plusChips(bannerChipsPerDiscard * assumedDiscardsLeft);
    }
  },
  'Loyalty Card': {
    independent: (acc, { config }) => acc.timesMult(config.approximations.loyaltyXMult)
  },
  'Hiker': {
    independent: (acc, { config }) => acc.plusChips(config.approximations.hikerChips)
  }
};

const REGISTRY: ReadonlyMap<string, JokerEffect> = new Map(Object.entries(EFFECTS));

export function jokerEffect(name: string): JokerEffect | undefined {
  return REGISTRY.get(name);
}

export function isImplemented(name: string): boolean {
  return REGISTRY.has(name);
}

export function implementedJokers(): string[] {
  return Array.from(REGISTRY.keys());
}

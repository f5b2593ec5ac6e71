import type { Edition, HandType, Rank } from './types';

// (base chips, base mult, rank) per hand type
export const HAND_BASE: Record<HandType, { chips: number; mult: number; rank: number }> = {
  'Flush Five': { chips: 160, mult: 16, rank: 12 },
  'Flush House': { chips: 140, mult: 14, rank: 11 },
  'Five of a Kind': { chips: 120, mult: 12, rank: 10 },
  'Straight Flush': { chips: 100, mult: 8, rank: 9 },
  'Four of a Kind': { chips: 60, mult: 7, rank: 8 },
  'Full House': { chips: 40, mult: 4, rank: 7 },
  'Flush': { chips: 35, mult: 4, rank: 6 },
  'Straight': { chips: 30, mult: 4, rank: 5 },
  'Three of a Kind': { chips: 30, mult: 3, rank: 4 },
  'Two Pair': { chips: 20, mult: 2, rank: 3 },
  'Pair': { chips: 10, mult: 2, rank: 2 },
  'High Card': { chips: 5, mult: 1, rank: 1 }
};

// Planet upgrade gained per level above 1
export const PLANET_BONUS: Record<HandType, { chips: number; mult: number }> = {
  'Flush Five': { chips: 50, mult: 3 },
  'Flush House': { chips: 40, mult: 4 },
  'Five of a Kind': { chips: 35, mult: 3 },
  'Straight Flush': { chips: 40, mult: 4 },
  'Four of a Kind': { chips: 30, mult: 3 },
  'Full House': { chips: 25, mult: 2 },
  'Flush': { chips: 15, mult: 2 },
  'Straight': { chips: 30, mult: 3 },
  'Three of a Kind': { chips: 20, mult: 2 },
  'Two Pair': { chips: 20, mult: 2 },
  'Pair': { chips: 15, mult: 1 },
  'High Card': { chips: 10, mult: 1 }
};

export const HAND_TYPES: readonly HandType[] = [
  'High Card', 'Pair', 'Two Pair', 'Three of a Kind', 'Straight', 'Flush',
  'Full House', 'Four of a Kind', 'Straight Flush', 'Five of a Kind', 'Flush House', 'Flush Five'
];

// Which weaker hands each classification also satisfies (itself included)
export const HAND_CONTAINS: Record<HandType, readonly HandType[]> = {
  'High Card': ['High Card'],
  'Pair': ['Pair', 'High Card'],
  'Two Pair': ['Two Pair', 'Pair', 'High Card'],
  'Three of a Kind': ['Three of a Kind', 'Pair', 'High Card'],
  'Straight': ['Straight', 'High Card'],
  'Flush': ['Flush', 'High Card'],
  'Full House': ['Full House', 'Three of a Kind', 'Two Pair', 'Pair', 'High Card'],
  'Four of a Kind': ['Four of a Kind', 'Three of a Kind', 'Pair', 'High Card'],
  'Straight Flush': ['Straight Flush', 'Straight', 'Flush', 'High Card'],
  'Five of a Kind': ['Five of a Kind', 'Four of a Kind', 'Three of a Kind', 'Pair', 'High Card'],
  'Flush House': ['Flush House', 'Full House', 'Flush', 'Three of a Kind', 'Two Pair', 'Pair', 'High Card'],
  'Flush Five': ['Flush Five', 'Five of a Kind', 'Flush', 'Four of a Kind', 'Three of a Kind', 'Pair', 'High Card']
};

export const STONE_CHIPS = 50;
export const BONUS_CHIPS = 30;
export const MULT_CARD_MULT = 4;
export const GLASS_XMULT = 2;
export const STEEL_HELD_XMULT = 1.5;

export const EDITION_CHIPS: Partial<Record<Edition, number>> = { foil: 50 };
export const EDITION_MULT: Partial<Record<Edition, number>> = { holographic: 10 };
export const EDITION_XMULT: Partial<Record<Edition, number>> = { polychrome: 1.5 };

export const FACE_RANKS: ReadonlySet<Rank> = new Set<Rank>([11, 12, 13]);
export const FIBONACCI_RANKS: ReadonlySet<Rank> = new Set<Rank>([14, 2, 3, 5, 8]);
export const EVEN_RANKS: ReadonlySet<Rank> = new Set<Rank>([2, 4, 6, 8, 10]);
export const ODD_RANKS: ReadonlySet<Rank> = new Set<Rank>([3, 5, 7, 9, 14]);

export type Suit = 'S' | 'H' | 'D' | 'C';
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14; // 11=J, 12=Q, 13=K, 14=A

export type Enhancement = 'none' | 'bonus' | 'mult' | 'wild' | 'glass' | 'steel' | 'stone' | 'gold' | 'lucky';
export type Edition = 'none' | 'foil' | 'holographic' | 'polychrome' | 'negative';
export type Seal = 'none' | 'red' | 'blue' | 'gold' | 'purple';

export interface Card {
  readonly id: string;
  readonly r: Rank | null; // null when the rank symbol was not recognised
  readonly s: Suit | null;
  readonly enhancement: Enhancement;
  readonly edition: Edition;
  readonly seal: Seal;
  readonly index: number; // position in the hand it was dealt into
}

export interface Joker {
  readonly id: string;
  readonly name: string;
  readonly edition: Edition;
  readonly sellValue?: number;
  readonly rarity?: string;
}

export type HandType =
  | 'High Card'
  | 'Pair'
  | 'Two Pair'
  | 'Three of a Kind'
  | 'Straight'
  | 'Flush'
  | 'Full House'
  | 'Four of a Kind'
  | 'Straight Flush'
  | 'Five of a Kind'
  | 'Flush House'
  | 'Flush Five';

export interface HandBase {
  chips: number;
  mult: number;
}

export interface ClassifiedHand {
  handType: HandType;
  scoringIndices: number[]; // ascending positions into the classified cards
}

export interface ScoreBreakdown {
  handType: HandType;
  handRank: number;
  baseChips: number;
  baseMult: number;
  cardChips: number;
  addChips: number;
  addMult: number;
  xMult: number; // diagnostic product of every x operation
  chips: number;
  mult: number;
  finalScore: number;
  scoringIndices: number[];
  playedIndices: number[];
}

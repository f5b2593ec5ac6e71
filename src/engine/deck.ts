import seedrandom from 'seedrandom';
import type { Card, Joker, Rank, Suit } from './types';
import { FACE_RANKS } from './tables';

export const SUITS: Suit[] = ['S', 'H', 'D', 'C'];
export const RANKS: Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];

export type CardExtras = Partial<Pick<Card, 'id' | 'enhancement' | 'edition' | 'seal' | 'index'>>;

export function createCard(r: Rank | null, s: Suit | null, extras: CardExtras = {}): Card {
  const index = extras.index ?? 0;
  return {
    id: extras.id ?? `${r ?? '?'}${s ?? '?'}-${index}`,
    r,
    s,
    enhancement: extras.enhancement ?? 'none',
    edition: extras.edition ?? 'none',
    seal: extras.seal ?? 'none',
    index
  };
}

export function createJoker(name: string, extras: Partial<Omit<Joker, 'name'>> = {}): Joker {
  return {
    id: extras.id ?? name,
    name,
    edition: extras.edition ?? 'none',
    sellValue: extras.sellValue,
    rarity: extras.rarity
  };
}

// Plain 52-card deck, positions follow deal order
export function makeDeck(): Card[] {
  const cards: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      cards.push(createCard(rank, suit, { id: `${rank}${suit}`, index: cards.length }));
    }
  }
  return cards;
}

export function shuffle(cards: Card[], seed?: string): Card[] {
  const rng = seed ? seedrandom(seed) : Math.random;
  const shuffled = [...cards];

  // Fisher-Yates shuffle
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }

  return shuffled;
}

// Deal `size` cards and re-number their positions 0..size-1
export function deal(cards: Card[], size: number): Card[] {
  return cards.slice(0, size).map((card, index) => ({ ...card, index }));
}

export function cardValue(card: Card): number {
  if (card.r === null) return 0;
  if (card.r <= 10) return card.r;
  if (card.r === 14) return 11; // Ace
  return 10; // J, Q, K
}

// Stone cards carry no rank for hand formation and joker conditions
export function rankOf(card: Card): Rank | null {
  return card.enhancement === 'stone' ? null : card.r;
}

export function rankNumber(card: Card): number {
  return rankOf(card) ?? 0;
}

export function isFace(card: Card): boolean {
  const rank = rankOf(card);
  return rank !== null && FACE_RANKS.has(rank);
}

// Wild cards count as every suit, Stone cards as none
export function hasSuit(card: Card, suit: Suit): boolean {
  if (card.enhancement === 'stone') return false;
  if (card.enhancement === 'wild') return true;
  return card.s === suit;
}

export function sortCards(cards: Card[]): Card[] {
  return [...cards].sort((a, b) => {
    if (rankNumber(a) !== rankNumber(b)) return rankNumber(a) - rankNumber(b);
    return SUITS.indexOf(a.s ?? 'S') - SUITS.indexOf(b.s ?? 'S');
  });
}

import type { Card, ClassifiedHand, HandType, Rank } from './types';
import { SUITS, hasSuit, rankNumber, rankOf } from './deck';
import { HAND_CONTAINS, HAND_TYPES } from './tables';

interface RankGroup {
  rank: Rank;
  indices: number[];
}

const CONTAINS_SETS = new Map<HandType, ReadonlySet<HandType>>(
  HAND_TYPES.map(type => [type, new Set(HAND_CONTAINS[type])])
);

const WHEEL: readonly number[] = [2, 3, 4, 5, 14];

// Groups by rank in order of first appearance, then by size (stable, so ties keep that order)
function rankGroups(cards: readonly Card[]): RankGroup[] {
  const byRank = new Map<Rank, number[]>();
  cards.forEach((card, i) => {
    const rank = rankOf(card);
    if (rank === null) return;
    const indices = byRank.get(rank) ?? [];
    indices.push(i);
    byRank.set(rank, indices);
  });

  return Array.from(byRank, ([rank, indices]) => ({ rank, indices }))
    .sort((a, b) => b.indices.length - a.indices.length);
}

export function isFlush(cards: readonly Card[]): boolean {
  if (cards.length < 5) return false;
  return SUITS.some(suit => cards.every(c => hasSuit(c, suit)));
}

export function isStraight(cards: readonly Card[]): boolean {
  if (cards.length < 5) return false;
  const ranks = new Set<number>();
  for (const card of cards) {
    const rank = rankOf(card);
    if (rank !== null) ranks.add(rank);
  }
  if (ranks.size !== 5) return false;

  const sorted = Array.from(ranks).sort((a, b) => a - b);
  if (sorted[4] - sorted[0] === 4) return true;

  // A-2-3-4-5 wheel
  return sorted.every((rank, i) => rank === WHEEL[i]);
}

function ascending(indices: number[]): number[] {
  return [...indices].sort((a, b) => a - b);
}

export function classify(cards: readonly Card[]): ClassifiedHand {
  if (cards.length === 0) {
    return { handType: 'High Card', scoringIndices: [] };
  }

  const all = cards.map((_, i) => i);
  const groups = rankGroups(cards);
  const top = groups[0]?.indices ?? [];
  const second = groups[1]?.indices ?? [];
  const flush = isFlush(cards);
  const straight = isStraight(cards);

  if (top.length >= 5) {
    return { handType: flush ? 'Flush Five' : 'Five of a Kind', scoringIndices: top.slice(0, 5) };
  }

  if (flush && straight) {
    return { handType: 'Straight Flush', scoringIndices: all };
  }

  if (top.length === 4) {
    const kicker = all.find(i => !top.includes(i));
    const scoring = kicker === undefined ? top : [...top, kicker];
    return { handType: 'Four of a Kind', scoringIndices: ascending(scoring) };
  }

  if (top.length === 3 && second.length >= 2) {
    const scoring = ascending([...top, ...second.slice(0, 2)]);
    return { handType: flush ? 'Flush House' : 'Full House', scoringIndices: scoring };
  }

  if (flush) {
    return { handType: 'Flush', scoringIndices: all };
  }

  if (straight) {
    return { handType: 'Straight', scoringIndices: all };
  }

  if (top.length === 3) {
    return { handType: 'Three of a Kind', scoringIndices: top };
  }

  if (top.length === 2 && second.length === 2) {
    return { handType: 'Two Pair', scoringIndices: ascending([...top, ...second]).slice(0, 4) };
  }

  if (top.length === 2) {
    return { handType: 'Pair', scoringIndices: top };
  }

  // High Card: first card holding the highest rank
  let best = 0;
  for (let i = 1; i < cards.length; i++) {
    if (rankNumber(cards[i]) > rankNumber(cards[best])) best = i;
  }
  return { handType: 'High Card', scoringIndices: [best] };
}

export function handContains(handType: HandType): ReadonlySet<HandType> {
  return CONTAINS_SETS.get(handType) ?? new Set<HandType>([handType]);
}

export function contains(handType: HandType, sub: HandType): boolean {
  return handContains(handType).has(sub);
}

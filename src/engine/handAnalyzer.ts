import type { Card, Joker, ScoreBreakdown } from './types';
import type { EngineConfig } from './config';
import { DEFAULT_CONFIG } from './config';
import { HandLevel } from './handLevels';
import { score } from './scoring';

export interface SearchOptions {
  topN?: number;
  maxPlaySize?: number;
  held?: readonly Card[]; // held but never offered for play
  config?: EngineConfig;
}

// Index combinations of size k from 0..n-1 in lexicographic order
export function combinations(n: number, k: number): number[][] {
  const result: number[][] = [];
  if (k <= 0 || k > n) return result;

  const combo = Array.from({ length: k }, (_, i) => i);
  for (;;) {
    result.push([...combo]);
    let i = k - 1;
    while (i >= 0 && combo[i] === n - k + i) i--;
    if (i < 0) return result;
    combo[i]++;
    for (let j = i + 1; j < k; j++) combo[j] = combo[j - 1] + 1;
  }
}

export class HandAnalyzer {
  private hand: Card[];
  private alwaysHeld: Card[];

  constructor(
    hand: readonly Card[],
    private readonly jokers: readonly Joker[],
    private readonly handLevels: HandLevel = new HandLevel(),
    private readonly config: EngineConfig = DEFAULT_CONFIG,
    extraHeld: readonly Card[] = []
  ) {
    const limit = config.maxHandCards;
    if (hand.length > limit) {
      console.warn(`Hand of ${hand.length} cards exceeds search bound ${limit}; cards past it stay held`);
    }
    this.hand = hand.slice(0, limit);
    this.alwaysHeld = [...hand.slice(limit), ...extraHeld];
  }

  // Every playable subset, largest first, lexicographic within a size
  getAllOptions(maxPlaySize = this.config.maxPlaySize): ScoreBreakdown[] {
    const options: ScoreBreakdown[] = [];
    const n = this.hand.length;

    for (let size = Math.min(maxPlaySize, n); size >= 1; size--) {
      for (const combo of combinations(n, size)) {
        options.push(this.evaluatePlay(combo));
      }
    }

    return options;
  }

  getBest(topN = this.config.topN, maxPlaySize = this.config.maxPlaySize): ScoreBreakdown[] {
    if (topN <= 0) return [];
    // Array.prototype.sort is stable, so ties keep enumeration order
    return this.getAllOptions(maxPlaySize)
      .sort((a, b) => b.finalScore - a.finalScore)
      .slice(0, topN);
  }

  private evaluatePlay(indices: number[]): ScoreBreakdown {
    const chosen = new Set(indices);
    const played = indices.map(i => this.hand[i]);
    const held = [...this.hand.filter((_, i) => !chosen.has(i)), ...this.alwaysHeld];

    const breakdown = score(played, held, this.jokers, this.handLevels, this.config);
    return {
      ...breakdown,
      scoringIndices: breakdown.scoringIndices.map(i => indices[i]),
      playedIndices: [...indices]
    };
  }
}

export function bestHands(
  hand: readonly Card[],
  jokers: readonly Joker[],
  handLevels: HandLevel = new HandLevel(),
  options: SearchOptions = {}
): ScoreBreakdown[] {
  const config = options.config ?? DEFAULT_CONFIG;
  const analyzer = new HandAnalyzer(hand, jokers, handLevels, config, options.held);
  return analyzer.getBest(options.topN ?? config.topN, options.maxPlaySize ?? config.maxPlaySize);
}

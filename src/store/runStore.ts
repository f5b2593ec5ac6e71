import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { Card, HandType, Joker, ScoreBreakdown } from '../engine/types';
import type { EngineConfig, EngineConfigInput } from '../engine/config';
import type { GameSnapshot } from '../engine/snapshot';
import type { SearchOptions } from '../engine/handAnalyzer';
import { resolveConfig } from '../engine/config';
import { HandLevel } from '../engine/handLevels';
import { bestHands } from '../engine/handAnalyzer';

export interface CacheStats {
  hits: number;
  misses: number;
}

export type RunSearchOptions = Omit<SearchOptions, 'config'>;

export interface RunStore {
  // Run state threaded across decision cycles
  config: EngineConfig;
  handLevels: HandLevel;
  jokers: Joker[];
  runs: number;

  // Memoised search results for the current jokers and levels
  cache: Map<string, ScoreBreakdown[]>;
  stats: CacheStats;

  // Actions
  newRun: () => void;
  applySnapshot: (snapshot: GameSnapshot) => void;
  levelUp: (handType: HandType, by?: number) => void;
  setJokers: (jokers: Joker[]) => void;
  bestHands: (hand: readonly Card[], options?: RunSearchOptions) => ScoreBreakdown[];
  clearCache: () => void;
}

export type RunStoreApi = StoreApi<RunStore>;

function cardKey(card: Card): string {
  return `${card.id}:${card.r ?? '?'}${card.s ?? '?'}:${card.enhancement}:${card.edition}:${card.seal}`;
}

function jokerKey(joker: Joker): string {
  return `${joker.name}:${joker.edition}:${joker.sellValue ?? ''}`;
}

const emptyStats = (): CacheStats => ({ hits: 0, misses: 0 });

// Oldest search results are evicted past this many entries
export const MAX_CACHED_SEARCHES = 64;

// Callers own what they get back, so the cache never hands out its own objects
function copyResults(results: readonly ScoreBreakdown[]): ScoreBreakdown[] {
  return results.map(b => ({
    ...b,
    scoringIndices: [...b.scoringIndices],
    playedIndices: [...b.playedIndices]
  }));
}

function remember(
  cache: ReadonlyMap<string, ScoreBreakdown[]>,
  key: string,
  result: ScoreBreakdown[]
): Map<string, ScoreBreakdown[]> {
  const next = new Map(cache);
  next.delete(key);
  next.set(key, result);
  for (const oldest of next.keys()) {
    if (next.size <= MAX_CACHED_SEARCHES) break;
    next.delete(oldest);
  }
  return next;
}

export function createRunStore(overrides: EngineConfigInput = {}): RunStoreApi {
  const config = resolveConfig(overrides);

  const log = (message: string) => {
    if (config.verbose) console.log(message);
  };

  return createStore<RunStore>((set, get) => ({
    config,
    handLevels: new HandLevel(),
    jokers: [],
    runs: 0,
    cache: new Map(),
    stats: emptyStats(),

    newRun: () => {
      const runs = get().runs + 1;
      set({ handLevels: new HandLevel(), jokers: [], runs, cache: new Map(), stats: emptyStats() });
      log(`🃏 Run ${runs} started`);
    },

    applySnapshot: (snapshot) => {
      set({ handLevels: snapshot.handLevels, jokers: [...snapshot.jokers], cache: new Map() });
      log(`Snapshot applied: ${snapshot.hand.length} cards in hand, ${snapshot.jokers.length} jokers`);
    },

    levelUp: (handType, by = 1) => {
      const handLevels = get().handLevels.levelUp(handType, by);
      set({ handLevels, cache: new Map() });
      log(`🪐 ${handType} now level ${handLevels.level(handType)}`);
    },

    setJokers: (jokers) => {
      set({ jokers: [...jokers], cache: new Map() });
    },

    bestHands: (hand, options = {}) => {
      const { handLevels, jokers, cache, stats } = get();
      const topN = options.topN ?? config.topN;
      const maxPlaySize = options.maxPlaySize ?? config.maxPlaySize;
      const held = options.held ?? [];
      const key = [
        hand.map(cardKey).join(','),
        held.map(cardKey).join(','),
        jokers.map(jokerKey).join(','),
        handLevels.key(),
        topN,
        maxPlaySize
      ].join('#');

      const cached = cache.get(key);
      if (cached) {
        // Refresh recency
        set({ cache: remember(cache, key, cached), stats: { ...stats, hits: stats.hits + 1 } });
        return copyResults(cached);
      }

      const result = bestHands(hand, jokers, handLevels, { topN, maxPlaySize, held, config });
      set(state => ({
        cache: remember(state.cache, key, copyResults(result)),
        stats: { ...state.stats, misses: state.stats.misses + 1 }
      }));
      return result;
    },

    clearCache: () => {
      set({ cache: new Map() });
    }
  }));
}

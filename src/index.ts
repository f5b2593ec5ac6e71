export type {
  Card,
  ClassifiedHand,
  Edition,
  Enhancement,
  HandBase,
  HandType,
  Joker,
  Rank,
  ScoreBreakdown,
  Seal,
  Suit
} from './engine/types';
export type { Approximations, EngineConfig, EngineConfigInput } from './engine/config';
export type { LevelTable, OverrideTable } from './engine/handLevels';
export type { CardTrigger, HandContext, JokerEffect, JokerTrigger } from './engine/jokers';
export type { SearchOptions } from './engine/handAnalyzer';
export type { GameSnapshot, RawGameSnapshot, SnapshotOptions } from './engine/snapshot';
export type { CacheStats, RunSearchOptions, RunStore, RunStoreApi } from './store/runStore';

export { classify, contains, handContains } from './engine/evaluation';
export { score, scoreClassified } from './engine/scoring';
export { bestHands, combinations, HandAnalyzer } from './engine/handAnalyzer';
export { HandLevel } from './engine/handLevels';
export { ScoreAccumulator } from './engine/accumulator';
export { implementedJokers, isImplemented, jokerEffect } from './engine/jokers';
export { cardValue, createCard, createJoker, makeDeck, shuffle, deal, sortCards } from './engine/deck';
export { ConfigError, DEFAULT_CONFIG, EngineConfigSchema, resolveConfig } from './engine/config';
export { GameSnapshotSchema, SnapshotError, parseSnapshot } from './engine/snapshot';
export { HAND_BASE, HAND_CONTAINS, HAND_TYPES, PLANET_BONUS } from './engine/tables';
export { MAX_CACHED_SEARCHES, createRunStore } from './store/runStore';

import { describe, test, expect, vi, afterEach } from 'vitest';
import { MAX_CACHED_SEARCHES, createRunStore } from './runStore';
import { ConfigError } from '../engine/config';
import { createCard, createJoker } from '../engine/deck';
import { parseSnapshot } from '../engine/snapshot';
import type { Card } from '../engine/types';

const kings = (): Card[] => [createCard(13, 'H', { index: 0 }), createCard(13, 'S', { index: 1 })];

afterEach(() => {
  vi.restoreAllMocks();
});

describe('runStore', () => {
  test('repeated searches are served from the cache', () => {
    const store = createRunStore();
    const first = store.getState().bestHands(kings());
    const second = store.getState().bestHands(kings());
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(store.getState().stats).toEqual({ hits: 1, misses: 1 });
    expect(first[0].finalScore).toBe(60);
  });

  test('changing a returned result leaves later calls untouched', () => {
    const store = createRunStore();
    const first = store.getState().bestHands(kings());
    first[0].finalScore = 0;
    first[0].playedIndices.push(9);
    first.reverse();

    const again = store.getState().bestHands(kings());
    expect(again.map(r => r.finalScore)).toEqual([60, 15, 15]);
    expect(again[0].playedIndices).toEqual([0, 1]);

    again[1].scoringIndices.length = 0;
    expect(store.getState().bestHands(kings())[1].scoringIndices).toEqual([0]);
  });

  test('cache keeps only the most recent searches', () => {
    const store = createRunStore();
    const hands = Array.from({ length: MAX_CACHED_SEARCHES + 6 }, (_, i) => [
      createCard(13, 'H', { id: `hand-${i}` })
    ]);
    for (const hand of hands) store.getState().bestHands(hand);
    expect(store.getState().cache.size).toBe(MAX_CACHED_SEARCHES);

    // the first hands were evicted, the last one is still cached
    store.getState().bestHands(hands[0]);
    store.getState().bestHands(hands[hands.length - 1]);
    expect(store.getState().stats).toEqual({ hits: 1, misses: MAX_CACHED_SEARCHES + 7 });
  });

  test('different search options miss', () => {
    const store = createRunStore();
    store.getState().bestHands(kings());
    const top = store.getState().bestHands(kings(), { topN: 1 });
    expect(top).toHaveLength(1);
    expect(store.getState().stats).toEqual({ hits: 0, misses: 2 });
    expect(store.getState().cache.size).toBe(2);
  });

  test('levelUp invalidates cached results', () => {
    const store = createRunStore();
    store.getState().bestHands(kings());
    store.getState().levelUp('Pair');
    expect(store.getState().cache.size).toBe(0);
    // (25 + 20) x 3
    expect(store.getState().bestHands(kings())[0].finalScore).toBe(135);
    expect(store.getState().handLevels.level('Pair')).toBe(2);
  });

  test('setJokers changes the result', () => {
    const store = createRunStore();
    store.getState().bestHands(kings());
    store.getState().setJokers([createJoker('Joker')]);
    expect(store.getState().bestHands(kings())[0].finalScore).toBe(180);
  });

  test('newRun resets run state', () => {
    const store = createRunStore();
    store.getState().setJokers([createJoker('Joker')]);
    store.getState().levelUp('Flush', 2);
    store.getState().bestHands(kings());
    store.getState().newRun();

    const state = store.getState();
    expect(state.runs).toBe(1);
    expect(state.jokers).toEqual([]);
    expect(state.handLevels.level('Flush')).toBe(1);
    expect(state.stats).toEqual({ hits: 0, misses: 0 });
    expect(state.cache.size).toBe(0);
  });

  test('applySnapshot installs jokers and levels', () => {
    const store = createRunStore();
    const snapshot = parseSnapshot({
      hand: [{ value: 'K', suit: 'H' }, { value: 'K', suit: 'S' }],
      jokers: [{ name: 'The Duo' }],
      hand_levels: { Pair: { level: 2, chips: 25, mult: 3 } }
    });
    store.getState().applySnapshot(snapshot);
    // (25 + 20) x 3 x 2
    expect(store.getState().bestHands(snapshot.hand)[0].finalScore).toBe(270);
  });

  test('clearCache keeps the counters', () => {
    const store = createRunStore();
    store.getState().bestHands(kings());
    store.getState().clearCache();
    expect(store.getState().cache.size).toBe(0);
    expect(store.getState().stats.misses).toBe(1);
  });

  test('logs run changes when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const store = createRunStore({ verbose: true });
    store.getState().newRun();
    store.getState().levelUp('Pair');
    expect(log).toHaveBeenNthCalledWith(1, '🃏 Run 1 started');
    expect(log).toHaveBeenNthCalledWith(2, '🪐 Pair now level 2');
  });

  test('rejects invalid config', () => {
    expect(() => createRunStore({ topN: -1 })).toThrow(ConfigError);
  });
});

import { z } from 'zod';
import type { Card, Edition, Enhancement, HandType, Joker, Rank, Seal, Suit } from './types';
import type { LevelTable, OverrideTable } from './handLevels';
import { HandLevel } from './handLevels';
import { createCard, createJoker } from './deck';
import { HAND_TYPES } from './tables';

const IdSchema = z.union([z.string(), z.number()]).transform(String);
const SymbolSchema = z.union([z.string(), z.number()]).transform(String);

export const RawCardSchema = z.object({
  value: SymbolSchema.optional(),
  rank: SymbolSchema.optional(),
  suit: z.string().default(''),
  enhancement: z.string().nullish(),
  edition: z.string().nullish(),
  seal: z.string().nullish(),
  id: IdSchema.optional()
});

export const RawJokerSchema = z.object({
  name: z.string(),
  id: IdSchema.optional(),
  edition: z.string().nullish(),
  rarity: SymbolSchema.optional(),
  sell_value: z.number().optional(),
  sellValue: z.number().optional()
});

export const RawHandLevelSchema = z.object({
  level: z.number().int().default(1),
  chips: z.number().default(0),
  mult: z.number().default(0),
  played: z.number().int().optional()
});

export const GameSnapshotSchema = z.object({
  hand: z.array(RawCardSchema).default([]),
  held: z.array(RawCardSchema).default([]),
  jokers: z.array(RawJokerSchema).default([]),
  hand_levels: z.record(z.string(), RawHandLevelSchema).default({})
});

export type RawCard = z.infer<typeof RawCardSchema>;
export type RawJoker = z.infer<typeof RawJokerSchema>;
export type RawGameSnapshot = z.input<typeof GameSnapshotSchema>;

export interface GameSnapshot {
  hand: Card[];
  held: Card[];
  jokers: Joker[];
  handLevels: HandLevel;
}

export interface SnapshotOptions {
  verbose?: boolean;
}

export class SnapshotError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[]) {
    super(message);
    this.name = 'SnapshotError';
    this.issues = issues;
  }
}

const RANK_SYMBOLS = new Map<string, Rank>([
  ['2', 2], ['3', 3], ['4', 4], ['5', 5], ['6', 6], ['7', 7], ['8', 8], ['9', 9],
  ['10', 10], ['T', 10],
  ['Jack', 11], ['J', 11],
  ['Queen', 12], ['Q', 12],
  ['King', 13], ['K', 13],
  ['Ace', 14], ['A', 14]
]);

const SUIT_SYMBOLS = new Map<string, Suit>([
  ['Spades', 'S'], ['S', 'S'],
  ['Hearts', 'H'], ['H', 'H'],
  ['Diamonds', 'D'], ['D', 'D'],
  ['Clubs', 'C'], ['C', 'C']
]);

const ENHANCEMENTS = new Map<string, Enhancement>([
  ['bonus', 'bonus'], ['mult', 'mult'], ['wild', 'wild'], ['glass', 'glass'],
  ['steel', 'steel'], ['stone', 'stone'], ['gold', 'gold'], ['lucky', 'lucky']
]);

const EDITIONS = new Map<string, Edition>([
  ['foil', 'foil'], ['holo', 'holographic'], ['holographic', 'holographic'],
  ['polychrome', 'polychrome'], ['negative', 'negative']
]);

const SEALS = new Map<string, Seal>([
  ['red', 'red'], ['blue', 'blue'], ['gold', 'gold'], ['purple', 'purple']
]);

// "", "Base" and "Default Base" all mean no modifier
const NONE_SYMBOLS = new Set(['', 'base', 'default base', 'none']);

function lookup<T>(
  table: ReadonlyMap<string, T>,
  symbol: string | null | undefined,
  suffix: RegExp,
  fallback: T,
  warn: (message: string) => void
): T {
  const key = (symbol ?? '').trim().toLowerCase().replace(suffix, '').trim();
  if (NONE_SYMBOLS.has(key)) return fallback;
  const found = table.get(key);
  if (found === undefined) warn(`Unrecognised symbol "${symbol}", treated as none`);
  return found ?? fallback;
}

function toCard(raw: RawCard, index: number, warn: (message: string) => void): Card {
  const rankSymbol = raw.value ?? raw.rank ?? '';
  const r = RANK_SYMBOLS.get(rankSymbol) ?? null;
  const s = SUIT_SYMBOLS.get(raw.suit) ?? null;
  if (r === null) warn(`Unrecognised rank "${rankSymbol}" at position ${index}`);
  if (s === null) warn(`Unrecognised suit "${raw.suit}" at position ${index}`);

  return createCard(r, s, {
    id: raw.id,
    index,
    enhancement: lookup(ENHANCEMENTS, raw.enhancement, / card$/, 'none', warn),
    edition: lookup(EDITIONS, raw.edition, /^e_/, 'none', warn),
    seal: lookup(SEALS, raw.seal, / seal$/, 'none', warn)
  });
}

function toJoker(raw: RawJoker, warn: (message: string) => void): Joker {
  return createJoker(raw.name, {
    id: raw.id,
    edition: lookup(EDITIONS, raw.edition, /^e_/, 'none', warn),
    sellValue: raw.sell_value ?? raw.sellValue,
    rarity: raw.rarity
  });
}

function asHandType(name: string): HandType | undefined {
  return HAND_TYPES.find(type => type === name);
}

function toHandLevel(raw: Record<string, z.infer<typeof RawHandLevelSchema>>): HandLevel {
  const levels: LevelTable = {};
  const overrides: OverrideTable = {};
  for (const [name, entry] of Object.entries(raw)) {
    const type = asHandType(name);
    if (!type) continue;
    levels[type] = entry.level;
    overrides[type] = { chips: entry.chips, mult: entry.mult };
  }
  return new HandLevel(levels, overrides);
}

export function parseSnapshot(raw: unknown, options: SnapshotOptions = {}): GameSnapshot {
  const result = GameSnapshotSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new SnapshotError(`Malformed game snapshot: ${detail}`, result.error.issues);
  }

  const warn = (message: string) => {
    if (options.verbose) console.warn(message);
  };
  const data = result.data;
  return {
    hand: data.hand.map((card, i) => toCard(card, i, warn)),
    held: data.held.map((card, i) => toCard(card, i, warn)),
    jokers: data.jokers.map(joker => toJoker(joker, warn)),
    handLevels: toHandLevel(data.hand_levels)
  };
}

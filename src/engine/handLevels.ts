import type { HandBase, HandType } from './types';
import { HAND_BASE, HAND_TYPES, PLANET_BONUS } from './tables';

export type LevelTable = Partial<Record<HandType, number>>;
export type OverrideTable = Partial<Record<HandType, HandBase>>;

/**
 * Planet upgrade state per hand type. Values reported by the live game take
 * precedence over the level formula, except an all-zero report, which means
 * the game sent nothing for that hand.
 */
export class HandLevel {
  private readonly levels: ReadonlyMap<HandType, number>;
  private readonly overrides: ReadonlyMap<HandType, HandBase>;

  constructor(levels: LevelTable = {}, overrides: OverrideTable = {}) {
    const levelMap = new Map<HandType, number>();
    const overrideMap = new Map<HandType, HandBase>();
    for (const type of HAND_TYPES) {
      const level = levels[type];
      if (level !== undefined) levelMap.set(type, level);
      const override = overrides[type];
      if (override) overrideMap.set(type, { chips: override.chips, mult: override.mult });
    }
    this.levels = levelMap;
    this.overrides = overrideMap;
  }

  level(handType: HandType): number {
    return Math.max(1, this.levels.get(handType) ?? 1);
  }

  override(handType: HandType): HandBase | undefined {
    const reported = this.overrides.get(handType);
    if (!reported || (reported.chips <= 0 && reported.mult <= 0)) return undefined;
    return reported;
  }

  getBase(handType: HandType): HandBase {
    const reported = this.override(handType);
    if (reported) return { chips: reported.chips, mult: reported.mult };

    const base = HAND_BASE[handType];
    const bonus = PLANET_BONUS[handType];
    const extra = this.level(handType) - 1;
    return {
      chips: base.chips + bonus.chips * extra,
      mult: base.mult + bonus.mult * extra
    };
  }

  withLevel(handType: HandType, level: number): HandLevel {
    const overrides = this.overrideTable();
    // A level change makes the reported values stale
    delete overrides[handType];
    return new HandLevel({ ...this.levelTable(), [handType]: level }, overrides);
  }

  levelUp(handType: HandType, by = 1): HandLevel {
    return this.withLevel(handType, this.level(handType) + by);
  }

  levelTable(): LevelTable {
    const table: LevelTable = {};
    for (const [type, level] of this.levels) table[type] = level;
    return table;
  }

  overrideTable(): OverrideTable {
    const table: OverrideTable = {};
    for (const [type, reported] of this.overrides) table[type] = { ...reported };
    return table;
  }

  // Identifies the table's contents for result caching
  key(): string {
    return HAND_TYPES.map(type => {
      const { chips, mult } = this.getBase(type);
      return `${chips}x${mult}`;
    }).join('|');
  }
}

import type { Edition } from './types';
import { EDITION_CHIPS, EDITION_MULT, EDITION_XMULT } from './tables';

/**
 * Running chips and mult for one evaluation. Every operation lands on the
 * running values in call order; the tallies only record what happened.
 */
export class ScoreAccumulator {
  private runningChips: number;
  private runningMult: number;
  private tally = { cardChips: 0, addChips: 0, addMult: 0, xMult: 1 };

  constructor(baseChips: number, baseMult: number) {
    this.runningChips = baseChips;
    this.runningMult = baseMult;
  }

  get chips(): number {
    return this.runningChips;
  }

  get mult(): number {
    return this.runningMult;
  }

  get cardChips(): number {
    return this.tally.cardChips;
  }

  get addChips(): number {
    return this.tally.addChips;
  }

  get addMult(): number {
    return this.tally.addMult;
  }

  get xMult(): number {
    return this.tally.xMult;
  }

  get score(): number {
    return this.runningChips * this.runningMult;
  }

  // Rank (or stone) chips of a scoring card
  cardChip(amount: number): void {
    this.runningChips += amount;
    this.tally.cardChips += amount;
  }

  plusChips(amount: number): void {
    if (amount === 0) return;
    this.runningChips += amount;
    this.tally.addChips += amount;
  }

  plusMult(amount: number): void {
    if (amount === 0) return;
    this.runningMult += amount;
    this.tally.addMult += amount;
  }

  timesMult(factor: number): void {
    if (factor === 1) return;
    this.runningMult *= factor;
    this.tally.xMult *= factor;
  }

  edition(edition: Edition): void {
    this.plusChips(EDITION_CHIPS[edition] ?? 0);
    this.plusMult(EDITION_MULT[edition] ?? 0);
    this.timesMult(EDITION_XMULT[edition] ?? 1);
  }
}

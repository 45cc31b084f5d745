/**
 * Cycle boundaries and the increment freeze window that precedes each of them.
 * Pure: every answer depends only on the two lengths and the `now` passed in.
 */
export class CycleClock {
  readonly cycleLength: number;
  readonly freezeWindow: number;

  constructor(cycleLength: number, freezeWindow: number) {
    if (!Number.isInteger(cycleLength) || cycleLength <= 0) {
      throw new Error(`CycleClock: invalid cycle length ${cycleLength}`);
    }
    if (!Number.isInteger(freezeWindow) || freezeWindow < 0 || freezeWindow >= cycleLength) {
      throw new Error(`CycleClock: freeze window ${freezeWindow} must be in [0, ${cycleLength})`);
    }
    this.cycleLength = cycleLength;
    this.freezeWindow = freezeWindow;
  }

  cycleEnd(now: number): number {
    return Math.ceil(now / this.cycleLength) * this.cycleLength;
  }

  inFreezeWindow(now: number): boolean {
    return this.cycleEnd(now) - now <= this.freezeWindow;
  }
}

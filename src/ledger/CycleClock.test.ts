import { describe, expect, it } from 'vitest';
import { CycleClock } from './CycleClock';

describe('CycleClock', () => {
  const cycles = new CycleClock(3600, 600);

  it('rounds up to the next cycle boundary', () => {
    expect(cycles.cycleEnd(1_700_000_000)).toBe(1_700_002_800);
    expect(cycles.cycleEnd(7201)).toBe(10_800);
  });

  it('keeps a boundary in the cycle it closes', () => {
    expect(cycles.cycleEnd(7200)).toBe(7200);
  });

  it('freezes the last freezeWindow seconds of a cycle, boundary included', () => {
    expect(cycles.inFreezeWindow(6599)).toBe(false);
    expect(cycles.inFreezeWindow(6600)).toBe(true);
    expect(cycles.inFreezeWindow(7200)).toBe(true);
    expect(cycles.inFreezeWindow(7201)).toBe(false);
  });

  it('only freezes the boundary itself with an empty window', () => {
    const noFreeze = new CycleClock(3600, 0);
    expect(noFreeze.inFreezeWindow(7199)).toBe(false);
    expect(noFreeze.inFreezeWindow(7200)).toBe(true);
  });

  it('rejects invalid lengths', () => {
    expect(() => new CycleClock(0, 0)).toThrow('CycleClock: invalid cycle length 0');
    expect(() => new CycleClock(3600, 3600)).toThrow('CycleClock: freeze window 3600 must be in [0, 3600)');
    expect(() => new CycleClock(3600, -1)).toThrow('CycleClock: freeze window -1 must be in [0, 3600)');
  });
});

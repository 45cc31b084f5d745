import { beforeEach, describe, expect, it } from 'vitest';
import { ArithmeticFault, LedgerErrorCode } from '../model/Errors';
import { LedgerEvent } from '../model/LedgerEvents';
import { ManualClock } from './Clock';
import { GaugeSystem } from './GaugeSystem';
import {
  ALICE,
  BOB,
  FIRST_CYCLE_END,
  GAUGE_1,
  GAUGE_2,
  GAUGE_3,
  GAUGE_4,
  GOVERNOR,
  START,
  catchError,
  createTestSystem,
  fund
} from './TestFixtures';

describe('WeightLedger', () => {
  let system: GaugeSystem;
  let clock: ManualClock;
  let events: LedgerEvent[];

  beforeEach(() => {
    ({ system, clock } = createTestSystem());
    system.registry.addGauge(GOVERNOR, 1, GAUGE_1);
    system.registry.addGauge(GOVERNOR, 1, GAUGE_2);
    system.registry.addGauge(GOVERNOR, 2, GAUGE_3);
    fund(system, ALICE, 100n);
    events = [];
    system.store.subscribe((committed) => events.push(...committed));
  });

  describe('incrementWeight', () => {
    it('allocates weight and moves every live aggregate', () => {
      expect(system.weights.incrementWeight(ALICE, GAUGE_1, 40n)).toBe(40n);
      system.weights.incrementWeight(ALICE, GAUGE_3, 10n);

      expect(system.weights.getUserGaugeWeight(ALICE, GAUGE_1)).toBe(40n);
      expect(system.weights.getUserWeight(ALICE)).toBe(50n);
      expect(system.weights.freeWeight(ALICE)).toBe(50n);
      expect(system.weights.userGauges(ALICE)).toEqual([GAUGE_1, GAUGE_3]);
      expect(system.weights.getGaugeWeight(GAUGE_1)).toBe(40n);
      expect(system.weights.getTypeWeight(1)).toBe(40n);
      expect(system.weights.getTypeWeight(2)).toBe(10n);
      expect(system.weights.totalWeight()).toBe(50n);
      expect(events[0]).toEqual({
        name: 'IncrementGaugeWeight',
        user: ALICE,
        gauge: GAUGE_1,
        weight: 40n,
        cycleEnd: FIRST_CYCLE_END,
        when: START
      });
    });

    it('rejects unknown and deprecated gauges', () => {
      expect(catchError(() => system.weights.incrementWeight(ALICE, GAUGE_4, 1n))).toMatchObject({
        code: LedgerErrorCode.InvalidGauge
      });
      system.registry.removeGauge(GOVERNOR, GAUGE_1);
      expect(catchError(() => system.weights.incrementWeight(ALICE, GAUGE_1, 1n))).toMatchObject({
        code: LedgerErrorCode.InvalidGauge
      });
    });

    it('is frozen at the end of a cycle, even for a zero amount', () => {
      system.weights.incrementWeight(ALICE, GAUGE_1, 40n);
      clock.set(FIRST_CYCLE_END - 600);

      expect(catchError(() => system.weights.incrementWeight(ALICE, GAUGE_1, 10n))).toMatchObject({
        code: LedgerErrorCode.FreezePeriod
      });
      expect(catchError(() => system.weights.incrementWeight(ALICE, GAUGE_1, 0n))).toMatchObject({
        code: LedgerErrorCode.FreezePeriod
      });
      // decrements stay open
      expect(system.weights.decrementWeight(ALICE, GAUGE_1, 10n)).toBe(30n);

      clock.set(FIRST_CYCLE_END + 1);
      expect(system.weights.incrementWeight(ALICE, GAUGE_1, 10n)).toBe(40n);
    });

    it('returns without change on a zero amount', () => {
      expect(system.weights.incrementWeight(ALICE, GAUGE_1, 0n)).toBe(0n);
      expect(system.weights.userGauges(ALICE)).toEqual([]);
      expect(events).toEqual([]);
    });

    it('caps allocations to the balance', () => {
      system.weights.incrementWeight(ALICE, GAUGE_1, 60n);
      expect(catchError(() => system.weights.incrementWeight(ALICE, GAUGE_2, 50n))).toMatchObject({
        code: LedgerErrorCode.Overweight
      });
      expect(system.weights.getUserWeight(ALICE)).toBe(60n);
    });

    it('caps the number of gauges unless the user is exempt', () => {
      system.registry.addGauge(GOVERNOR, 1, GAUGE_4);
      system.weights.incrementWeights(ALICE, [GAUGE_1, GAUGE_2, GAUGE_3], [1n, 1n, 1n]);

      expect(catchError(() => system.weights.incrementWeight(ALICE, GAUGE_4, 1n))).toMatchObject({
        code: LedgerErrorCode.ExceedMaxGauges
      });
      // adding to a gauge already voted for is not a new gauge
      expect(system.weights.incrementWeight(ALICE, GAUGE_1, 1n)).toBe(4n);

      system.weights.setExempt(GOVERNOR, ALICE, true);
      expect(system.weights.isExempt(ALICE)).toBe(true);
      expect(system.weights.incrementWeight(ALICE, GAUGE_4, 1n)).toBe(5n);
      expect(system.weights.userGauges(ALICE)).toHaveLength(4);
    });

    it('rejects negative amounts as arithmetic faults', () => {
      expect(() => system.weights.incrementWeight(ALICE, GAUGE_1, -1n)).toThrow(ArithmeticFault);
    });
  });

  describe('incrementWeights', () => {
    it('is all or nothing', () => {
      expect(
        catchError(() => system.weights.incrementWeights(ALICE, [GAUGE_1, GAUGE_4], [10n, 10n]))
      ).toMatchObject({ code: LedgerErrorCode.InvalidGauge });

      expect(system.weights.getUserGaugeWeight(ALICE, GAUGE_1)).toBe(0n);
      expect(system.weights.getUserWeight(ALICE)).toBe(0n);
      expect(system.weights.userGauges(ALICE)).toEqual([]);
      expect(system.weights.totalWeight()).toBe(0n);
      expect(events).toEqual([]);
    });

    it('requires as many amounts as gauges', () => {
      expect(catchError(() => system.weights.incrementWeights(ALICE, [GAUGE_1], [1n, 2n]))).toMatchObject({
        code: LedgerErrorCode.SizeMismatch
      });
      expect(catchError(() => system.weights.decrementWeights(ALICE, [GAUGE_1, GAUGE_2], [1n]))).toMatchObject({
        code: LedgerErrorCode.SizeMismatch
      });
    });

    it('returns the total weight of the user', () => {
      expect(system.weights.incrementWeights(ALICE, [GAUGE_1, GAUGE_2], [30n, 20n])).toBe(50n);
      expect(system.weights.decrementWeights(ALICE, [GAUGE_1, GAUGE_2], [30n, 5n])).toBe(15n);
      expect(system.weights.userGauges(ALICE)).toEqual([GAUGE_2]);
    });
  });

  describe('decrementWeight', () => {
    it('removes weight and drops the gauge from the user list at zero', () => {
      system.weights.incrementWeight(ALICE, GAUGE_1, 40n);
      expect(system.weights.decrementWeight(ALICE, GAUGE_1, 15n)).toBe(25n);
      expect(system.weights.userGauges(ALICE)).toEqual([GAUGE_1]);
      expect(system.weights.decrementWeight(ALICE, GAUGE_1, 25n)).toBe(0n);
      expect(system.weights.userGauges(ALICE)).toEqual([]);
      expect(system.weights.totalWeight()).toBe(0n);
      expect(events.filter((_) => _.name == 'DecrementGaugeWeight')).toHaveLength(2);
    });

    it('faults on removing more than allocated', () => {
      system.weights.incrementWeight(ALICE, GAUGE_1, 40n);
      expect(() => system.weights.decrementWeight(ALICE, GAUGE_1, 41n)).toThrow(ArithmeticFault);
      expect(system.weights.getUserGaugeWeight(ALICE, GAUGE_1)).toBe(40n);
    });
  });

  describe('stored weights', () => {
    it('only expose the weights of completed cycles', () => {
      system.weights.incrementWeights(ALICE, [GAUGE_1, GAUGE_2], [1n, 1n]);

      expect(system.weights.calculateAllocation(GAUGE_1, 100n)).toBe(50n);
      expect(system.weights.getStoredGaugeWeight(GAUGE_1)).toBe(0n);
      expect(system.weights.calculateStoredAllocation(GAUGE_1, 100n)).toBe(0n);

      clock.advance(3600);
      expect(system.weights.currentCycle()).toBe(FIRST_CYCLE_END + 3600);
      expect(system.weights.getStoredGaugeWeight(GAUGE_1)).toBe(1n);
      expect(system.weights.storedTotalWeight()).toBe(2n);
      expect(system.weights.getStoredTypeWeight(1)).toBe(2n);
      expect(system.weights.calculateStoredAllocation(GAUGE_1, 100n)).toBe(50n);

      system.weights.incrementWeight(ALICE, GAUGE_1, 2n);
      expect(system.weights.calculateAllocation(GAUGE_1, 100n)).toBe(75n);
      expect(system.weights.calculateStoredAllocation(GAUGE_1, 100n)).toBe(50n);
      expect(system.weights.getPastGaugeWeight(GAUGE_1, FIRST_CYCLE_END)).toBe(1n);
      expect(system.weights.getPastGaugeWeight(GAUGE_1, FIRST_CYCLE_END + 3600)).toBe(3n);
      expect(system.weights.getPastTotalWeight(FIRST_CYCLE_END)).toBe(2n);
    });

    it('rounds allocations down', () => {
      system.weights.incrementWeights(ALICE, [GAUGE_1, GAUGE_2, GAUGE_3], [1n, 1n, 1n]);
      expect(system.weights.calculateAllocation(GAUGE_1, 100n)).toBe(33n);
    });

    it('split evenly between two gauges of equal weight', () => {
      const { system: twoGauges, clock: twoGaugesClock } = createTestSystem({ maxGauges: 2 });
      twoGauges.registry.addGauge(GOVERNOR, 1, GAUGE_1);
      twoGauges.registry.addGauge(GOVERNOR, 1, GAUGE_2);
      fund(twoGauges, ALICE, 100n);

      expect(twoGauges.weights.incrementWeight(ALICE, GAUGE_1, 1n)).toBe(1n);
      expect(twoGauges.weights.incrementWeight(ALICE, GAUGE_2, 1n)).toBe(2n);
      twoGaugesClock.advance(3600);

      expect(twoGauges.weights.calculateStoredAllocation(GAUGE_1, 100n)).toBe(50n);
      expect(twoGauges.weights.calculateStoredAllocation(GAUGE_2, 100n)).toBe(50n);
    });

    it('allocate nothing without weight', () => {
      expect(system.weights.calculateAllocation(GAUGE_1, 100n)).toBe(0n);
      expect(system.weights.calculateStoredAllocation(GAUGE_1, 100n)).toBe(0n);
    });
  });

  describe('gauge deprecation', () => {
    beforeEach(() => {
      system.weights.incrementWeights(ALICE, [GAUGE_1, GAUGE_2], [30n, 20n]);
      system.registry.removeGauge(GOVERNOR, GAUGE_1);
    });

    it('takes the gauge weight out of the type and total aggregates', () => {
      expect(system.weights.totalWeight()).toBe(20n);
      expect(system.weights.getTypeWeight(1)).toBe(20n);
      expect(system.weights.getGaugeWeight(GAUGE_1)).toBe(30n);
      expect(system.weights.getStoredGaugeWeight(GAUGE_1)).toBe(0n);
      expect(system.weights.calculateAllocation(GAUGE_1, 100n)).toBe(0n);
      expect(system.weights.calculateAllocation(GAUGE_2, 100n)).toBe(100n);
      // users keep their allocation
      expect(system.weights.getUserWeight(ALICE)).toBe(50n);
    });

    it('lets users withdraw from the deprecated gauge', () => {
      expect(system.weights.decrementWeight(ALICE, GAUGE_1, 10n)).toBe(40n);
      expect(system.weights.getGaugeWeight(GAUGE_1)).toBe(20n);
      expect(system.weights.totalWeight()).toBe(20n);
    });

    it('restores the remaining weight when the gauge is added again', () => {
      system.weights.decrementWeight(ALICE, GAUGE_1, 10n);
      system.registry.addGauge(GOVERNOR, 1, GAUGE_1);

      expect(system.weights.totalWeight()).toBe(40n);
      expect(system.weights.getTypeWeight(1)).toBe(40n);
      expect(system.weights.calculateAllocation(GAUGE_1, 100n)).toBe(50n);
    });
  });

  describe('balance decreases', () => {
    it('free whole allocations in entry order, deprecated gauges included', () => {
      system.weights.incrementWeights(ALICE, [GAUGE_1, GAUGE_2], [50n, 30n]);
      system.registry.removeGauge(GOVERNOR, GAUGE_1);

      system.token.burn(ALICE, 40n);

      expect(system.token.balanceOf(ALICE)).toBe(60n);
      expect(system.weights.getUserGaugeWeight(ALICE, GAUGE_1)).toBe(0n);
      expect(system.weights.getUserGaugeWeight(ALICE, GAUGE_2)).toBe(30n);
      expect(system.weights.getUserWeight(ALICE)).toBe(30n);
      expect(system.weights.userGauges(ALICE)).toEqual([GAUGE_2]);
      expect(system.weights.getGaugeWeight(GAUGE_1)).toBe(0n);
      expect(system.weights.totalWeight()).toBe(30n);
    });

    it('free a deprecated gauge entered first before live ones', () => {
      fund(system, BOB, 3n);
      system.weights.incrementWeights(BOB, [GAUGE_1, GAUGE_2, GAUGE_3], [1n, 1n, 1n]);
      system.registry.removeGauge(GOVERNOR, GAUGE_1);
      expect(system.weights.totalWeight()).toBe(2n);

      system.token.burn(BOB, 2n);

      expect(system.token.balanceOf(BOB)).toBe(1n);
      expect(system.weights.getGaugeWeight(GAUGE_1)).toBe(0n);
      expect(system.weights.getGaugeWeight(GAUGE_2)).toBe(0n);
      expect(system.weights.getGaugeWeight(GAUGE_3)).toBe(1n);
      expect(system.weights.userGauges(BOB)).toEqual([GAUGE_3]);
      expect(system.weights.getUserWeight(BOB)).toBe(1n);
      expect(system.weights.totalWeight()).toBe(1n);
    });

    it('stop once the remaining weight fits the balance', () => {
      system.weights.incrementWeights(ALICE, [GAUGE_1, GAUGE_2, GAUGE_3], [20n, 30n, 40n]);

      system.token.transfer(ALICE, BOB, 50n);

      expect(system.weights.userGauges(ALICE)).toEqual([GAUGE_3]);
      expect(system.weights.getUserWeight(ALICE)).toBe(40n);
      expect(system.weights.freeWeight(ALICE)).toBe(10n);
    });

    it('leave allocations alone when the free weight covers the decrease', () => {
      system.weights.incrementWeight(ALICE, GAUGE_1, 40n);
      system.token.transfer(ALICE, BOB, 60n);
      expect(system.weights.getUserWeight(ALICE)).toBe(40n);
    });

    it('can be driven directly', () => {
      system.weights.incrementWeights(ALICE, [GAUGE_1, GAUGE_2], [50n, 30n]);
      system.weights.decrementUntilFree(ALICE, 30n);
      expect(system.weights.userGauges(ALICE)).toEqual([GAUGE_2]);
    });
  });

  describe('debt ceiling', () => {
    beforeEach(() => {
      ({ system, clock } = createTestSystem(
        {},
        { debtCeiling: { debtCeilingCheck: (gauge) => gauge != GAUGE_1 } }
      ));
      system.registry.addGauge(GOVERNOR, 1, GAUGE_1);
      system.registry.addGauge(GOVERNOR, 1, GAUGE_2);
      fund(system, ALICE, 100n);
      system.weights.incrementWeights(ALICE, [GAUGE_1, GAUGE_2], [50n, 50n]);
    });

    it('blocks decrements the issuance side refuses', () => {
      expect(catchError(() => system.weights.decrementWeight(ALICE, GAUGE_1, 10n))).toMatchObject({
        code: LedgerErrorCode.DebtCeilingUsed
      });
      expect(system.weights.decrementWeight(ALICE, GAUGE_2, 10n)).toBe(90n);
    });

    it('blocks a burn that would free the gauge', () => {
      expect(catchError(() => system.token.burn(ALICE, 10n))).toMatchObject({
        code: LedgerErrorCode.DebtCeilingUsed
      });
      expect(system.token.balanceOf(ALICE)).toBe(100n);
      expect(system.weights.getUserWeight(ALICE)).toBe(100n);
    });

    it('no longer applies once the gauge is deprecated', () => {
      system.registry.removeGauge(GOVERNOR, GAUGE_1);
      expect(system.weights.decrementWeight(ALICE, GAUGE_1, 10n)).toBe(90n);
    });
  });

  describe('administration', () => {
    it('sets the max gauges with the parameters role', () => {
      expect(catchError(() => system.weights.setMaxGauges(ALICE, 5))).toMatchObject({
        code: LedgerErrorCode.Unauthorized
      });
      system.weights.setMaxGauges(GOVERNOR, 5);
      expect(system.weights.maxGauges()).toBe(5);
      expect(events).toEqual([{ name: 'MaxGaugesUpdate', oldMaxGauges: 3, newMaxGauges: 5 }]);
    });

    it('refuses to exempt accounts the policy rejects', () => {
      ({ system } = createTestSystem({}, { exemptionPolicy: (account) => account != BOB }));
      expect(catchError(() => system.weights.setExempt(GOVERNOR, BOB, true))).toMatchObject({
        code: LedgerErrorCode.NotExemptTarget
      });
      // removing an exemption is always allowed
      system.weights.setExempt(GOVERNOR, BOB, false);
      expect(system.weights.isExempt(BOB)).toBe(false);
    });
  });
});

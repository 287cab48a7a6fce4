import { applyAttempt, computeSuccessRate, patternHealth, EMPTY_STATS } from './health';

describe('Pattern health', () => {
  describe('computeSuccessRate', () => {
    it('should be zero before any attempt', () => {
      expect(computeSuccessRate(0, 0)).toBe(0);
    });

    it('should divide successes by attempts', () => {
      expect(computeSuccessRate(4, 3)).toBe(0.75);
    });
  });

  describe('applyAttempt', () => {
    it('should count a success', () => {
      expect(applyAttempt(EMPTY_STATS, true)).toEqual({
        totalAttempts: 1,
        successfulAttempts: 1,
        successRate: 1,
      });
    });

    it('should count a failure', () => {
      const stats = applyAttempt({ totalAttempts: 1, successfulAttempts: 1, successRate: 1 }, false);

      expect(stats).toEqual({ totalAttempts: 2, successfulAttempts: 1, successRate: 0.5 });
    });

    it('should not modify the input', () => {
      const stats = { totalAttempts: 3, successfulAttempts: 2, successRate: 2 / 3 };

      applyAttempt(stats, true);

      expect(stats).toEqual({ totalAttempts: 3, successfulAttempts: 2, successRate: 2 / 3 });
    });

    it('should give the same counters for any order of outcomes', () => {
      const outcomes = [true, false, true, true, false, true, true];
      const orders = [outcomes, [...outcomes].reverse(), [...outcomes].sort(), [...outcomes].sort().reverse()];

      for (const order of orders) {
        const stats = order.reduce(applyAttempt, EMPTY_STATS);

        expect(stats.totalAttempts).toBe(7);
        expect(stats.successfulAttempts).toBe(5);
        expect(stats.successRate).toBeCloseTo(0.714, 3);
      }
    });
  });

  describe('patternHealth', () => {
    it('should be unproven without attempts', () => {
      expect(patternHealth(EMPTY_STATS)).toBe('UNPROVEN');
    });

    it.each([
      [10, 10, 'HEALTHY'],
      [10, 8, 'HEALTHY'],
      [10, 7, 'WARNING'],
      [10, 6, 'WARNING'],
      [10, 5, 'FAILING'],
      [3, 0, 'FAILING'],
    ])('%i attempts with %i successes should be %s', (total, successful, expected) => {
      const stats = { totalAttempts: total, successfulAttempts: successful, successRate: successful / total };

      expect(patternHealth(stats)).toBe(expected);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { buildGroupStat, estimateRate } from '../rate.js';
import { criticalValue } from '../normal.js';

describe('Rate Estimator', () => {
  it('should use the two-sided normal critical value', () => {
    expect(criticalValue(0.95)).toBeCloseTo(1.959964, 4);
  });

  it('should return zeros for an empty group', () => {
    expect(estimateRate(0, 0)).toEqual({ rate: 0, ci_lower: 0, ci_upper: 0 });
  });

  it('should compute the Wilson interval for 20 of 100', () => {
    const estimate = estimateRate(20, 100);

    expect(estimate.rate).toBe(0.2);
    expect(estimate.ci_lower).toBeCloseTo(0.1334, 3);
    expect(estimate.ci_upper).toBeCloseTo(0.2888, 3);
  });

  it('should keep the interval inside [0, 1] around the rate', () => {
    for (const n of [1, 2, 5, 10, 37, 200]) {
      for (let k = 0; k <= n; k++) {
        const { rate, ci_lower, ci_upper } = estimateRate(k, n);
        expect(rate).toBe(k / n);
        expect(ci_lower).toBeGreaterThanOrEqual(0);
        expect(ci_lower).toBeLessThanOrEqual(rate);
        expect(ci_upper).toBeGreaterThanOrEqual(rate);
        expect(ci_upper).toBeLessThanOrEqual(1);
      }
    }
  });

  it('should pin the bound at the edge for 0 or n conversions', () => {
    const none = estimateRate(0, 50);
    expect(none.ci_lower).toBe(0);
    expect(none.ci_upper).toBeGreaterThan(0);

    const all = estimateRate(50, 50);
    expect(all.ci_upper).toBe(1);
    expect(all.ci_lower).toBeLessThan(1);
  });

  it('should narrow as n grows for a fixed rate', () => {
    const widths = [
      [3, 10],
      [30, 100],
      [300, 1000],
    ].map(([k, n]) => {
      const { ci_lower, ci_upper } = estimateRate(k, n);
      return ci_upper - ci_lower;
    });

    expect(widths[1]).toBeLessThan(widths[0]);
    expect(widths[2]).toBeLessThan(widths[1]);
  });

  it('should widen with the confidence level', () => {
    const at95 = estimateRate(20, 100, 0.95);
    const at99 = estimateRate(20, 100, 0.99);

    expect(at99.ci_lower).toBeLessThan(at95.ci_lower);
    expect(at99.ci_upper).toBeGreaterThan(at95.ci_upper);
  });

  it('should reject impossible counts and confidence levels', () => {
    expect(() => estimateRate(5, 3)).toThrow('Conversions must be between 0 and trials');
    expect(() => estimateRate(-1, 3)).toThrow('Conversions must be between 0 and trials');
    expect(() => estimateRate(1.5, 3)).toThrow('Conversions and trials must be integers');
    expect(() => estimateRate(1, 3, 1)).toThrow('Confidence level must be strictly between 0 and 1');
  });

  it('should carry counts into a group stat', () => {
    const stat = buildGroupStat(30, 100);

    expect(stat.sessions).toBe(100);
    expect(stat.conversions).toBe(30);
    expect(stat.rate).toBe(0.3);
    expect(stat.ci_lower).toBeLessThan(0.3);
    expect(stat.ci_upper).toBeGreaterThan(0.3);
  });
});

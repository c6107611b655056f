import { DiagnosticCollector } from '../core/diagnostics.js';
import { clampShowRatio, resolveTotal } from './total.js';

describe('resolveTotal', () => {
  it('should use the normalized sum by default', () => {
    expect(resolveTotal([3, 0, 2], [3, -1, 2])).toBe(5);
  });

  it('should divide by showRatio', () => {
    expect(resolveTotal([50, 50], [50, 50], { showRatio: 0.5 })).toBe(200);
  });

  it('should prefer showRatio over total', () => {
    expect(resolveTotal([50, 50], [50, 50], { showRatio: 0.5, total: 1000 })).toBe(200);
  });

  it('should clamp showRatio into range and warn', () => {
    const collector = new DiagnosticCollector();

    expect(resolveTotal([4], [4], { showRatio: 2 }, collector)).toBe(4);
    expect(collector.diagnostics[0]).toEqual({
      severity: 'warning',
      code: 'PIE-RATIO-CLAMPED',
      message: 'showRatio 2 is outside [0.0001, 1]; using 1.',
    });
  });

  it('should give up on a total that overflows and warn', () => {
    const collector = new DiagnosticCollector();

    expect(resolveTotal([1e308, 1e308], [1e308, 1e308], {}, collector)).toBe(0);
    expect(collector.diagnostics.map(d => d.code)).toEqual(['PIE-TOTAL-NON-FINITE']);
  });

  it('should clamp a zero showRatio to the minimum', () => {
    expect(resolveTotal([1], [1], { showRatio: 0 })).toBeCloseTo(10000);
  });

  it('should decrease as showRatio grows toward 1', () => {
    const ratios = [0.1, 0.25, 0.5, 0.75, 1];
    const totals = ratios.map(showRatio => resolveTotal([2, 3], [2, 3], { showRatio }));
    for (let i = 1; i < totals.length; i++) {
      expect(totals[i]).toBeLessThan(totals[i - 1]);
    }
  });

  it('should scale an explicit total', () => {
    expect(resolveTotal([3, 1], [3, 1], { total: 40 })).toBe(40);
  });

  it('should scale an explicit total from raw to normalized units', () => {
    // normalized sum 15, raw sum 10 -> (15 / 10) * 30
    expect(resolveTotal([10, 0, 5], [10, -5, 5], { total: 30 })).toBe(45);
  });

  it('should never go below the normalized sum', () => {
    expect(resolveTotal([3, 1], [3, 1], { total: 2 })).toBe(4);
  });

  it('should ignore a total when the raw series sums to zero', () => {
    const collector = new DiagnosticCollector();

    expect(resolveTotal([5, 0], [5, -5], { total: 100 }, collector)).toBe(5);
    expect(collector.diagnostics.map(d => d.code)).toEqual(['PIE-TOTAL-IGNORED']);
  });

  it('should return 0 and warn when nothing is positive', () => {
    const collector = new DiagnosticCollector();

    expect(resolveTotal([0, 0], [0, -3], {}, collector)).toBe(0);
    expect(collector.diagnostics.map(d => d.code)).toEqual(['PIE-TOTAL-ZERO']);
  });
});

describe('clampShowRatio', () => {
  it('should keep values in [0.0001, 1]', () => {
    expect(clampShowRatio(-1)).toBe(0.0001);
    expect(clampShowRatio(0.3)).toBe(0.3);
    expect(clampShowRatio(1.5)).toBe(1);
  });
});

import { describe, it, expect } from 'vitest';
import { paramSweep, formatSweepResults } from '../src/optimization/param-sweep.js';
import type { PriceBar } from '../src/types/index.js';

const DAY = 24 * 3600 * 1000;

function makeBars(n: number): PriceBar[] {
  return Array.from({ length: n }, (_, i) => {
    const close = 100 + 8 * Math.sin(i / 4);
    return { timestamp: i * DAY, high: close * 1.01, low: close * 0.99, close };
  });
}

const LEVELS = [
  { buyPct: 0.03, sellPct: 0.02, allocation: 100 },
  { buyPct: 0.04, sellPct: 0.03, allocation: 200 },
];

describe('paramSweep', () => {
  it('runs every combination and ranks by total return', () => {
    const results = paramSweep(makeBars(120), [
      { name: 'sellPctScale', min: 0.5, max: 1.5, step: 0.5 },
      { name: 'reanchorThresholdPct', min: 0.02, max: 0.03, step: 0.01 },
    ], { levels: LEVELS, triggerMode: 'HIGH_LOW' });

    expect(results).toHaveLength(6);
    for (let i = 1; i < results.length; i++) {
      expect(results[i - 1]!.report.metrics.totalReturn)
        .toBeGreaterThanOrEqual(results[i]!.report.metrics.totalReturn);
    }
    const scales = results.map((r) => r.params.sellPctScale).sort();
    expect(scales).toEqual([0.5, 0.5, 1, 1, 1.5, 1.5]);
  });

  it('scales level percentages', () => {
    const [result] = paramSweep(makeBars(20), [
      { name: 'buyPctScale', min: 2, max: 2, step: 1 },
    ], { levels: LEVELS, triggerMode: 'HIGH_LOW' });

    expect(result!.report.config.levels.map((l) => l.buyPct)).toEqual([0.06, 0.08]);
    expect(result!.params).toEqual({ buyPctScale: 2 });
  });

  it('formats the top results', () => {
    const results = paramSweep(makeBars(40), [
      { name: 'sellPctScale', min: 1, max: 2, step: 1 },
    ], { levels: LEVELS, triggerMode: 'HIGH_LOW' });
    const text = formatSweepResults(results, 1);
    expect(text).toContain('Total combinations: 2');
    expect(text.match(/^#\d/gm)).toHaveLength(1);
  });
});

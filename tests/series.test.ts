import { describe, it, expect } from 'vitest';
import { prepareSeries, validateBar } from '../src/data/series.js';
import { PriceSeriesError } from '../src/errors.js';

describe('prepareSeries', () => {
  it('passes a strictly increasing series through', () => {
    const bars = [{ timestamp: 1, close: 10 }, { timestamp: 2, close: 11 }];
    expect(prepareSeries(bars, { triggerMode: 'CLOSE' })).toEqual(bars);
  });

  it('rejects duplicate timestamps with the offending index', () => {
    const bars = [{ timestamp: 1, close: 10 }, { timestamp: 2, close: 11 }, { timestamp: 2, close: 12 }];
    try {
      prepareSeries(bars, { triggerMode: 'CLOSE' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PriceSeriesError);
      expect(err).toHaveProperty('index', 2);
      expect(err).toHaveProperty('message', 'Bar 2: duplicate timestamp 2');
    }
  });

  it('sorts and keeps the first of duplicate bars when normalizing', () => {
    const bars = [
      { timestamp: 2, close: 20 },
      { timestamp: 1, close: 10 },
      { timestamp: 1, close: 11 },
    ];
    expect(prepareSeries(bars, { triggerMode: 'CLOSE', normalize: true })).toEqual([
      { timestamp: 1, close: 10 },
      { timestamp: 2, close: 20 },
    ]);
  });

  it('still rejects bad prices when normalizing', () => {
    expect(() => prepareSeries([{ timestamp: 1, close: 0 }], { triggerMode: 'CLOSE', normalize: true }))
      .toThrow('close must be a positive number');
  });
});

describe('validateBar', () => {
  it('checks high/low only in HIGH_LOW mode', () => {
    expect(() => validateBar({ timestamp: 1, close: 10 }, 0, 'CLOSE')).not.toThrow();
    expect(() => validateBar({ timestamp: 1, close: 10 }, 0, 'HIGH_LOW')).toThrow(PriceSeriesError);
    expect(() => validateBar({ timestamp: 1, close: 10, high: 9, low: 11 }, 4, 'HIGH_LOW'))
      .toThrow('Bar 4: high (9) < low (11)');
  });
});

import { describe, it, expect } from 'vitest';
import { analyzePerformance, calcDrawdown, calcProfitFactor } from '../src/report/metrics.js';
import type { EquitySample, TradeRecord } from '../src/types/index.js';

const DAY = 24 * 3600 * 1000;
const YEAR = 365.25 * DAY;
const T0 = Date.UTC(2024, 0, 1);

function curve(values: number[], stepMs: number = DAY): EquitySample[] {
  return values.map((v, i) => ({
    timestamp: T0 + i * stepMs,
    portfolioValue: v,
    price: v,
    openPositions: 0,
    pendingOrders: 0,
    cash: v,
  }));
}

function sell(level: number, profit: number, timestamp: number = T0): TradeRecord {
  return {
    side: 'SELL',
    timestamp,
    level,
    price: 100 + profit,
    size: 1,
    proceeds: 100 + profit,
    entryPrice: 100,
    profit,
    reason: 'TARGET',
  };
}

const BUY: TradeRecord = { side: 'BUY', timestamp: T0, level: 0, price: 100, size: 1, cost: 100 };

describe('drawdown', () => {
  it('reports -20% for 100 → 80 and keeps it open at 95', () => {
    const dd = calcDrawdown(curve([100, 90, 80, 95]));
    expect(dd.maxDrawdown).toBeCloseTo(-0.2, 12);
    expect(dd.drawdownOpen).toBe(true);
    // 2~4일차 수중, 끝 포함
    expect(dd.longestDrawdownDays).toBe(3);
  });

  it('measures the longest closed drawdown', () => {
    const dd = calcDrawdown(curve([100, 90, 100, 95, 96, 101]));
    expect(dd.maxDrawdown).toBeCloseTo(-0.1, 12);
    expect(dd.longestDrawdownDays).toBe(2);
    expect(dd.drawdownOpen).toBe(false);
  });

  it('is zero for an empty or non-decreasing curve', () => {
    expect(calcDrawdown([])).toEqual({ maxDrawdown: 0, longestDrawdownDays: 0, drawdownOpen: false });
    expect(calcDrawdown(curve([100, 100, 101]))).toEqual({
      maxDrawdown: 0,
      longestDrawdownDays: 0,
      drawdownOpen: false,
    });
  });

  it('counts calendar days for intraday bars', () => {
    const hour = 3600 * 1000;
    // 수중 구간: 1일 00:00 ~ 2일 00:00 → 달력상 2일
    const dd = calcDrawdown(curve([100, ...Array.from({ length: 25 }, () => 99)], hour).map((s, i) => ({
      ...s,
      timestamp: T0 - hour + i * hour,
    })));
    expect(dd.longestDrawdownDays).toBe(2);
    expect(dd.drawdownOpen).toBe(true);
  });
});

describe('analyzePerformance', () => {
  it('computes total and compound annual return', () => {
    const report = analyzePerformance(curve([100, 121], 2 * YEAR), [], { initialCapital: 100 });
    expect(report.totalReturn).toBeCloseTo(0.21, 12);
    expect(report.annualizedReturn).toBeCloseTo(0.1, 10);
    expect(report.finalValue).toBe(121);
  });

  it('compounds spans shorter than a year', () => {
    const report = analyzePerformance(curve([100, 110], YEAR / 2), [], { initialCapital: 100 });
    expect(report.annualizedReturn).toBeCloseTo(0.21, 10);
  });

  it('falls back to total return for a single sample', () => {
    const report = analyzePerformance(curve([110]), [], { initialCapital: 100 });
    expect(report.totalReturn).toBeCloseTo(0.1, 12);
    expect(report.annualizedReturn).toBe(report.totalReturn);
    expect(report.sharpeRatio).toBe(0);
    expect(report.maxDrawdown).toBe(0);
  });

  it('returns degenerate values for an empty curve and no trades', () => {
    const report = analyzePerformance([], [], { initialCapital: 1000 });
    expect(report.finalValue).toBe(1000);
    expect(report.totalReturn).toBe(0);
    expect(report.annualizedReturn).toBe(0);
    expect(report.sharpeRatio).toBe(0);
    expect(report.profitFactor).toBeNull();
    expect(report.winRate).toBe(0);
    expect(report.closedTrades).toBe(0);
  });

  it('annualizes the Sharpe ratio of per-bar returns', () => {
    const samples = curve([100, 110, 99, 108.9]);
    // 수익률 +10%, -10%, +10% → 평균 1/30, 표본분산 1/75
    const expected = (1 / 30) / Math.sqrt(1 / 75) * Math.sqrt(365);
    const report = analyzePerformance(samples, [], { initialCapital: 100 });
    expect(report.sharpeRatio).toBeCloseTo(expected, 6);

    const withRf = analyzePerformance(samples, [], {
      initialCapital: 100,
      riskFreeRate: 0.0365,
      periodsPerYear: 365,
    });
    expect(withRf.sharpeRatio).toBeCloseTo((1 / 30 - 0.0001) / Math.sqrt(1 / 75) * Math.sqrt(365), 6);
  });

  it('returns zero Sharpe for a flat curve', () => {
    const report = analyzePerformance(curve([100, 100, 100, 100]), [], { initialCapital: 100 });
    expect(report.sharpeRatio).toBe(0);
  });

  it('derives trade statistics from sell records only', () => {
    const trades = [BUY, sell(0, 30), BUY, sell(1, -10), BUY, sell(0, 20)];
    const report = analyzePerformance(curve([1000, 1040]), trades, { initialCapital: 1000 });

    expect(report.buyCount).toBe(3);
    expect(report.closedTrades).toBe(3);
    expect(report.winCount).toBe(2);
    expect(report.lossCount).toBe(1);
    expect(report.winRate).toBeCloseTo(2 / 3, 12);
    expect(report.grossProfit).toBe(50);
    expect(report.grossLoss).toBe(10);
    expect(report.profitFactor).toBe(5);
    expect(report.realizedPnl).toBe(40);
    expect(report.avgWin).toBe(25);
    expect(report.avgLoss).toBe(10);
    expect(report.expectancy).toBeCloseTo(40 / 3, 12);
    expect(report.maxConsecutiveLosses).toBe(1);
  });

  it('reports an infinite profit factor when nothing lost', () => {
    const report = analyzePerformance(curve([1000]), [BUY, sell(0, 30)], { initialCapital: 1000 });
    expect(report.profitFactor).toBe(Infinity);
    expect(report.winRate).toBe(1);
  });

  it('keeps the no-trade sentinel when only buys happened', () => {
    const report = analyzePerformance(curve([1000, 990]), [BUY], { initialCapital: 1000 });
    expect(report.profitFactor).toBeNull();
    expect(report.winRate).toBe(0);
    expect(report.buyCount).toBe(1);
  });
});

describe('calcProfitFactor', () => {
  it('separates the sentinels', () => {
    expect(calcProfitFactor(0, 0, 0)).toBeNull();
    expect(calcProfitFactor(2, 0, 0)).toBe(0);
    expect(calcProfitFactor(1, 12, 0)).toBe(Infinity);
    expect(calcProfitFactor(3, 12, 4)).toBe(3);
  });
});

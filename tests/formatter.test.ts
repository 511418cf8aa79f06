import { describe, it, expect } from 'vitest';
import { formatMoney, formatPct, formatProfitFactor, formatReport, formatTrades } from '../src/report/formatter.js';
import { BacktestEngine } from '../src/engine/backtest-engine.js';

const LEVELS = [{ buyPct: 0.04, sellPct: 0.03, allocation: 1000 }];

function row(key: string, value: string): string {
  return `  ${key.padEnd(22)} ${value}`;
}

describe('formatter', () => {
  it('renders profit factor sentinels', () => {
    expect(formatProfitFactor(null)).toBe('N/A');
    expect(formatProfitFactor(Infinity)).toBe('INF');
    expect(formatProfitFactor(2.5)).toBe('2.50');
  });

  it('formats money and ratios', () => {
    expect(formatMoney(1_250_000)).toBe('1.25M');
    expect(formatMoney(-1_500)).toBe('-1.5K');
    expect(formatMoney(30)).toBe('30.00');
    expect(formatPct(-0.2)).toBe('-20.00%');
  });

  it('prints a report for a run without trades', () => {
    const bars = [0, 1, 2].map((i) => ({ timestamp: Date.UTC(2024, 0, 1 + i), close: 700 + i }));
    const report = new BacktestEngine({ levels: LEVELS, triggerMode: 'CLOSE' }).run(bars);
    const lines = formatReport(report).split('\n');

    expect(lines).toContain(row('Profit Factor', 'N/A'));
    expect(lines).toContain(row('Total Return', '0.00%'));
    expect(lines).toContain(row('Longest Drawdown', '0d'));
    expect(lines).toContain(row('Pending Orders', '1'));
    expect(formatTrades(report)).toBe('No trades.');
  });

  it('lists fills with profit on sells', () => {
    const bars = [700, 672, 700].map((close, i) => ({ timestamp: Date.UTC(2024, 0, 1 + i), close }));
    const report = new BacktestEngine({ levels: LEVELS, triggerMode: 'CLOSE' }).run(bars);
    const lines = formatTrades(report).split('\n');

    expect(lines).toHaveLength(4);
    expect(lines[2]).toContain('2024-01-02 00:00 BUY     0       672.00');
    expect(lines[3]).toContain('2024-01-03 00:00 SELL    0       692.16');
    expect(lines[3]!.endsWith('30.00')).toBe(true);
    expect(formatReport(report).split('\n')).toContain(row('Profit Factor', 'INF'));
  });
});

import type { BacktestReport } from '../types/index.js';
import { summarizeByLevel, type LevelSummary } from './trade-log.js';

/**
 * 콘솔 테이블 출력 (외부 의존성 없음)
 */
export function formatReport(report: BacktestReport): string {
  const m = report.metrics;
  const lines: string[] = [];

  lines.push('');
  lines.push('═══════════════════════════════════════════');
  lines.push('          LADDER BACKTEST REPORT');
  lines.push('═══════════════════════════════════════════');
  lines.push('');

  lines.push(formatSection('Performance', [
    ['Total Return', formatPct(m.totalReturn)],
    ['Annualized Return', formatPct(m.annualizedReturn)],
    ['Max Drawdown', formatPct(m.maxDrawdown)],
    ['Longest Drawdown', `${m.longestDrawdownDays}d${m.drawdownOpen ? ' (open)' : ''}`],
    ['Sharpe Ratio', m.sharpeRatio.toFixed(2)],
    ['Profit Factor', formatProfitFactor(m.profitFactor)],
  ]));

  lines.push(formatSection('Trades', [
    ['Buys', String(m.buyCount)],
    ['Closed Trades', String(m.closedTrades)],
    ['Win Rate', `${(m.winRate * 100).toFixed(1)}%`],
    ['Wins / Losses', `${m.winCount} / ${m.lossCount}`],
    ['Avg Win', formatMoney(m.avgWin)],
    ['Avg Loss', formatMoney(m.avgLoss)],
    ['Expectancy', formatMoney(m.expectancy)],
    ['Max Consec. Losses', String(m.maxConsecutiveLosses)],
  ]));

  lines.push(formatSection('Capital', [
    ['Start Value', formatMoney(m.initialValue)],
    ['End Value', formatMoney(m.finalValue)],
    ['Cash', formatMoney(report.finalCash)],
    ['Realized PnL', formatMoney(m.realizedPnl)],
    ['Open Positions', String(report.openPositions.length)],
    ['Pending Orders', String(report.pendingOrders.length)],
  ]));

  const levels = summarizeByLevel(report.trades);
  if (levels.length > 0) {
    lines.push('── Levels ───────────────────────────────');
    lines.push(formatLevelTable(levels));
  }

  lines.push('');
  return lines.join('\n');
}

export function formatProfitFactor(pf: number | null): string {
  if (pf === null) return 'N/A';
  if (pf === Infinity) return 'INF';
  return pf.toFixed(2);
}

export function formatPct(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

function formatSection(title: string, rows: [string, string][]): string {
  const lines: string[] = [];
  lines.push(`── ${title} ${'─'.repeat(38 - title.length)}`);
  for (const [key, value] of rows) {
    lines.push(`  ${key.padEnd(22)} ${value}`);
  }
  lines.push('');
  return lines.join('\n');
}

export function formatMoney(value: number): string {
  const sign = value >= 0 ? '' : '-';
  const abs = Math.abs(value);
  if (abs >= 1_000_000) {
    return `${sign}${(abs / 1_000_000).toFixed(2)}M`;
  }
  if (abs >= 1_000) {
    return `${sign}${(abs / 1_000).toFixed(1)}K`;
  }
  return `${sign}${abs.toFixed(2)}`;
}

function formatLevelTable(levels: LevelSummary[]): string {
  const lines: string[] = [];
  lines.push('  Level  Buys  Sells  Invested     Realized');
  lines.push('  ───── ───── ────── ──────────── ────────────');

  for (const l of levels) {
    const level = String(l.level).padStart(5);
    const buys = String(l.buys).padStart(5);
    const sells = String(l.sells).padStart(6);
    const invested = formatMoney(l.invested).padStart(12);
    const pnl = formatMoney(l.realizedPnl).padStart(12);
    lines.push(`  ${level} ${buys} ${sells} ${invested} ${pnl}`);
  }

  return lines.join('\n');
}

/**
 * 체결 목록 출력
 */
export function formatTrades(report: BacktestReport): string {
  if (report.trades.length === 0) return 'No trades.';

  const lines: string[] = [];
  lines.push('  #    Date              Side  Lvl        Price         Size       Amount       Profit');
  lines.push('  ──── ──────────────── ──── ──── ──────────── ──────────── ──────────── ────────────');

  for (let i = 0; i < report.trades.length; i++) {
    const t = report.trades[i]!;
    const num = String(i + 1).padStart(4);
    const date = formatDate(t.timestamp);
    const side = t.side.padEnd(4);
    const lvl = String(t.level).padStart(4);
    const price = t.price.toFixed(2).padStart(12);
    const size = t.size.toFixed(6).padStart(12);
    const amount = (t.side === 'BUY' ? t.cost : t.proceeds).toFixed(2).padStart(12);
    const profit = (t.side === 'SELL' ? t.profit.toFixed(2) : '').padStart(12);
    lines.push(`  ${num} ${date} ${side} ${lvl} ${price} ${size} ${amount} ${profit}`);
  }

  return lines.join('\n');
}

function formatDate(ms: number): string {
  const d = new Date(ms);
  return d.toISOString().slice(0, 16).replace('T', ' ');
}

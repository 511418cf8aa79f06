import type { EquitySample, PerformanceReport, SellRecord, TradeRecord } from '../types/index.js';

const MS_PER_DAY = 24 * 3600 * 1000;
const MS_PER_YEAR = 365.25 * MS_PER_DAY;

export interface AnalyzerOptions {
  readonly initialCapital: number;
  /** 연 무위험 수익률 (봉 단위로 안분해서 차감) */
  readonly riskFreeRate?: number;
  /** 일봉 365 */
  readonly periodsPerYear?: number;
}

export interface DrawdownStats {
  readonly maxDrawdown: number;         // 0 이하 비율
  readonly longestDrawdownDays: number;
  readonly drawdownOpen: boolean;
}

/**
 * 에쿼티 커브 + 거래 로그 → 성과 지표. 순수 함수
 */
export function analyzePerformance(
  equityCurve: readonly EquitySample[],
  trades: readonly TradeRecord[],
  options: AnalyzerOptions,
): PerformanceReport {
  const initialValue = options.initialCapital;
  const last = equityCurve[equityCurve.length - 1];
  const finalValue = last?.portfolioValue ?? initialValue;
  const totalReturn = initialValue > 0 ? (finalValue - initialValue) / initialValue : 0;

  const sells = trades.filter((t): t is SellRecord => t.side === 'SELL');
  const wins = sells.filter((t) => t.profit > 0);
  const losses = sells.filter((t) => t.profit < 0);
  const grossProfit = wins.reduce((s, t) => s + t.profit, 0);
  const grossLoss = Math.abs(losses.reduce((s, t) => s + t.profit, 0));
  const realizedPnl = sells.reduce((s, t) => s + t.profit, 0);

  return {
    initialValue,
    finalValue,
    totalReturn,
    annualizedReturn: calcAnnualizedReturn(equityCurve, initialValue, finalValue, totalReturn),
    ...calcDrawdown(equityCurve),
    sharpeRatio: calcSharpe(
      equityCurve,
      options.riskFreeRate ?? 0,
      options.periodsPerYear ?? 365,
    ),
    profitFactor: calcProfitFactor(sells.length, grossProfit, grossLoss),
    winRate: sells.length > 0 ? wins.length / sells.length : 0,
    buyCount: trades.length - sells.length,
    closedTrades: sells.length,
    winCount: wins.length,
    lossCount: losses.length,
    grossProfit,
    grossLoss,
    realizedPnl,
    avgWin: wins.length > 0 ? grossProfit / wins.length : 0,
    avgLoss: losses.length > 0 ? grossLoss / losses.length : 0,
    expectancy: sells.length > 0 ? realizedPnl / sells.length : 0,
    maxConsecutiveLosses: calcMaxConsecutiveLosses(sells),
  };
}

/**
 * 기간이 0보다 길면 CAGR (365.25일 기준), 0이면 단순 수익률
 */
export function calcAnnualizedReturn(
  curve: readonly EquitySample[],
  initialValue: number,
  finalValue: number,
  totalReturn: number,
): number {
  const first = curve[0];
  const last = curve[curve.length - 1];
  if (!first || !last || initialValue <= 0) return totalReturn;
  const years = (last.timestamp - first.timestamp) / MS_PER_YEAR;
  if (years <= 0) return totalReturn;
  return Math.pow(finalValue / initialValue, 1 / years) - 1;
}

function utcDay(ms: number): number {
  return Math.floor(ms / MS_PER_DAY);
}

/**
 * 최대 낙폭 + 최장 수중 기간 (UTC 달력일, 끝 포함)
 * 수중 = 직전까지의 최고치보다 엄격히 낮은 상태
 */
export function calcDrawdown(curve: readonly EquitySample[]): DrawdownStats {
  let peak = Number.NEGATIVE_INFINITY;
  let maxDd = 0;
  let longest = 0;
  let runStart: number | null = null;
  let runEnd = 0;

  for (const point of curve) {
    const value = point.portfolioValue;
    if (value >= peak) {
      peak = value;
      if (runStart !== null) {
        longest = Math.max(longest, utcDay(runEnd) - utcDay(runStart) + 1);
        runStart = null;
      }
      continue;
    }

    if (peak > 0) {
      const dd = (value - peak) / peak;
      if (dd < maxDd) maxDd = dd;
    }
    if (runStart === null) runStart = point.timestamp;
    runEnd = point.timestamp;
  }

  const drawdownOpen = runStart !== null;
  if (runStart !== null) {
    longest = Math.max(longest, utcDay(runEnd) - utcDay(runStart) + 1);
  }

  return { maxDrawdown: maxDd, longestDrawdownDays: longest, drawdownOpen };
}

/**
 * 봉 단위 수익률의 평균/표준편차 × √periodsPerYear
 */
export function calcSharpe(
  curve: readonly EquitySample[],
  riskFreeRate: number,
  periodsPerYear: number,
): number {
  const rfPerBar = riskFreeRate / periodsPerYear;
  const returns: number[] = [];
  for (let i = 1; i < curve.length; i++) {
    const prev = curve[i - 1]!.portfolioValue;
    if (prev <= 0) continue;
    returns.push(curve[i]!.portfolioValue / prev - 1 - rfPerBar);
  }
  if (returns.length < 2) return 0;

  const mean = returns.reduce((s, r) => s + r, 0) / returns.length;
  const variance = returns.reduce((s, r) => s + (r - mean) ** 2, 0) / (returns.length - 1);
  const std = Math.sqrt(variance);
  if (std === 0) return 0;
  return (mean / std) * Math.sqrt(periodsPerYear);
}

/**
 * 청산 0건 → null, 손실 0건 → Infinity
 */
export function calcProfitFactor(
  closedTrades: number,
  grossProfit: number,
  grossLoss: number,
): number | null {
  if (closedTrades === 0) return null;
  if (grossLoss === 0) return grossProfit > 0 ? Infinity : 0;
  return grossProfit / grossLoss;
}

function calcMaxConsecutiveLosses(sells: readonly SellRecord[]): number {
  let max = 0;
  let current = 0;
  for (const t of sells) {
    if (t.profit < 0) {
      current++;
      if (current > max) max = current;
    } else {
      current = 0;
    }
  }
  return max;
}

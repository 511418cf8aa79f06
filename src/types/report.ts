import type { LadderConfig, PendingOrder, Position } from './ladder.js';
import type { EquitySample, TradeRecord } from './trade.js';

export interface PerformanceReport {
  readonly initialValue: number;
  readonly finalValue: number;
  readonly totalReturn: number;        // 비율 (0.1 = 10%)
  readonly annualizedReturn: number;
  readonly maxDrawdown: number;        // 비율, 0 이하
  readonly longestDrawdownDays: number;
  readonly drawdownOpen: boolean;
  readonly sharpeRatio: number;
  /** 청산 0건이면 null, 손실 없이 이익만 있으면 Infinity */
  readonly profitFactor: number | null;
  readonly winRate: number;            // 0~1
  readonly buyCount: number;
  readonly closedTrades: number;
  readonly winCount: number;
  readonly lossCount: number;
  readonly grossProfit: number;
  readonly grossLoss: number;          // 양수
  readonly realizedPnl: number;
  readonly avgWin: number;
  readonly avgLoss: number;
  readonly expectancy: number;
  readonly maxConsecutiveLosses: number;
}

export interface LadderRunResult {
  readonly initialCash: number;
  readonly finalCash: number;
  readonly watermark: number;
  readonly equityCurve: readonly EquitySample[];
  readonly trades: readonly TradeRecord[];
  readonly openPositions: readonly Position[];
  readonly pendingOrders: readonly PendingOrder[];
}

export interface BacktestReport extends LadderRunResult {
  readonly config: LadderConfig;
  readonly metrics: PerformanceReport;
}

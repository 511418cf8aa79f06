import type { TradeRecord } from '../types/index.js';

export interface LevelSummary {
  readonly level: number;
  readonly buys: number;
  readonly sells: number;
  readonly invested: number;
  readonly realizedPnl: number;
}

/**
 * 거래 로그를 처음 현금부터 순서대로 재생 → 최종 현금
 * 엔진과 같은 순서로 더하고 빼므로 결과가 정확히 일치해야 함
 */
export function replayCash(initialCash: number, trades: readonly TradeRecord[]): number {
  let cash = initialCash;
  for (const t of trades) {
    if (t.side === 'BUY') {
      cash -= t.cost;
    } else {
      cash += t.proceeds;
    }
  }
  return cash;
}

/**
 * 레벨별 매수/매도 횟수와 실현 손익
 */
export function summarizeByLevel(trades: readonly TradeRecord[]): LevelSummary[] {
  const map = new Map<number, LevelSummary>();

  for (const t of trades) {
    const existing = map.get(t.level) ?? { level: t.level, buys: 0, sells: 0, invested: 0, realizedPnl: 0 };
    map.set(t.level, t.side === 'BUY'
      ? { ...existing, buys: existing.buys + 1, invested: existing.invested + t.cost }
      : { ...existing, sells: existing.sells + 1, realizedPnl: existing.realizedPnl + t.profit });
  }

  return Array.from(map.values()).sort((a, b) => a.level - b.level);
}

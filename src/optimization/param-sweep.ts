import type { BacktestReport, PriceBar } from '../types/index.js';
import { BacktestEngine, type BacktestConfig } from '../engine/backtest-engine.js';
import { createLadderConfig } from '../strategy/ladder.js';
import { formatProfitFactor } from '../report/formatter.js';

export type SweepParam = 'reanchorThresholdPct' | 'buyPctScale' | 'sellPctScale';

export interface ParamRange {
  readonly name: SweepParam;
  readonly min: number;
  readonly max: number;
  readonly step: number;
}

export type SweepParams = Partial<Record<SweepParam, number>>;

export interface SweepResult {
  readonly params: SweepParams;
  readonly report: BacktestReport;
}

/**
 * 파라미터 그리드 탐색
 * buyPctScale / sellPctScale 은 기준 래더의 모든 레벨 비율에 곱함
 */
export function paramSweep(
  bars: readonly PriceBar[],
  ranges: readonly ParamRange[],
  baseConfig?: BacktestConfig,
): SweepResult[] {
  const base = createLadderConfig(baseConfig);
  const combos = generateCombinations(ranges);
  const results: SweepResult[] = [];

  for (const params of combos) {
    const buyScale = params.buyPctScale ?? 1;
    const sellScale = params.sellPctScale ?? 1;
    const engine = new BacktestEngine({
      ...baseConfig,
      ...base,
      reanchorThresholdPct: params.reanchorThresholdPct ?? base.reanchorThresholdPct,
      levels: base.levels.map((l) => ({
        ...l,
        buyPct: l.buyPct * buyScale,
        sellPct: l.sellPct * sellScale,
        ...(l.nextBuyPct !== undefined ? { nextBuyPct: l.nextBuyPct * buyScale } : {}),
      })),
    });
    results.push({ params, report: engine.run(bars) });
  }

  // 수익률 내림차순, 같으면 낙폭이 얕은 쪽 우선
  results.sort((a, b) =>
    b.report.metrics.totalReturn - a.report.metrics.totalReturn
    || b.report.metrics.maxDrawdown - a.report.metrics.maxDrawdown);

  return results;
}

function generateCombinations(ranges: readonly ParamRange[]): SweepParams[] {
  if (ranges.length === 0) return [{}];

  const first = ranges[0]!;
  if (first.step <= 0) {
    throw new Error(`Sweep step for ${first.name} must be positive`);
  }
  const rest = ranges.slice(1);
  const restCombos = generateCombinations(rest);
  const result: SweepParams[] = [];

  // 부동소수점 누적 오차 방지: 인덱스 기반
  const count = Math.floor((first.max - first.min) / first.step + 1e-9) + 1;
  for (let i = 0; i < count; i++) {
    const val = Math.round((first.min + i * first.step) * 1e8) / 1e8;
    for (const combo of restCombos) {
      const params: SweepParams = { ...combo };
      params[first.name] = val;
      result.push(params);
    }
  }

  return result;
}

export function formatSweepResults(results: readonly SweepResult[], top: number = 10): string {
  const lines: string[] = [];
  lines.push('');
  lines.push('═══════════════════════════════════════════════════════');
  lines.push('          PARAMETER SWEEP RESULTS');
  lines.push(`          Total combinations: ${results.length}`);
  lines.push('═══════════════════════════════════════════════════════');
  lines.push('');

  const show = results.slice(0, top);
  for (let i = 0; i < show.length; i++) {
    const r = show[i]!;
    const m = r.report.metrics;
    const paramStr = Object.entries(r.params)
      .map(([k, v]) => `${k}=${v}`)
      .join(', ');
    lines.push(`#${i + 1}  ${paramStr}`);
    lines.push(`    Return: ${(m.totalReturn * 100).toFixed(2)}%  |  PF: ${formatProfitFactor(m.profitFactor)}  |  MDD: ${(m.maxDrawdown * 100).toFixed(2)}%  |  Closed: ${m.closedTrades}  |  Sharpe: ${m.sharpeRatio.toFixed(2)}`);
    lines.push('');
  }

  return lines.join('\n');
}

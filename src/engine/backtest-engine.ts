import type { BacktestReport, LadderConfig, PriceBar } from '../types/index.js';
import { config as appConfig } from '../config.js';
import { createLadderConfig, type LadderConfigInput } from '../strategy/ladder.js';
import { analyzePerformance } from '../report/metrics.js';
import { LadderConfigError } from '../errors.js';
import { EventBus } from './event-bus.js';
import { LadderEngine } from './ladder-engine.js';

export interface BacktestConfig extends LadderConfigInput {
  readonly riskFreeRate?: number;
  readonly periodsPerYear?: number;
}

/**
 * 시계열 → LadderEngine → 성과 분석 연결
 */
export class BacktestEngine {
  readonly config: LadderConfig;
  private readonly riskFreeRate: number;
  private readonly periodsPerYear: number;
  private bus: EventBus;

  constructor(config?: BacktestConfig) {
    this.config = createLadderConfig(config);
    this.riskFreeRate = config?.riskFreeRate ?? appConfig.metrics.riskFreeRate;
    this.periodsPerYear = config?.periodsPerYear ?? appConfig.metrics.periodsPerYear;
    if (!Number.isFinite(this.periodsPerYear) || this.periodsPerYear <= 0) {
      throw new LadderConfigError([`periodsPerYear: must be positive (got ${this.periodsPerYear})`]);
    }
    if (!Number.isFinite(this.riskFreeRate)) {
      throw new LadderConfigError([`riskFreeRate: must be a finite number (got ${this.riskFreeRate})`]);
    }
    this.bus = new EventBus();
  }

  run(bars: readonly PriceBar[]): BacktestReport {
    this.bus.clearLog();
    const engine = new LadderEngine(this.config, this.bus);
    const result = engine.run(bars);

    const metrics = analyzePerformance(result.equityCurve, result.trades, {
      initialCapital: result.initialCash,
      riskFreeRate: this.riskFreeRate,
      periodsPerYear: this.periodsPerYear,
    });

    return { ...result, config: this.config, metrics };
  }

  getEventLog() {
    return this.bus.getLog();
  }
}

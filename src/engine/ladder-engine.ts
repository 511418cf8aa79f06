import type {
  BuyRecord,
  EquitySample,
  LadderConfig,
  LadderRunResult,
  Level,
  PendingOrder,
  Position,
  PriceBar,
  QuoteReason,
  SellRecord,
  TradeRecord,
  ExitReason,
} from '../types/index.js';
import { createLadderConfig, pullbackToNext, seedQuotes, type LadderConfigInput } from '../strategy/ladder.js';
import { prepareSeries, validateBar } from '../data/series.js';
import { PriceSeriesError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { EventBus } from './event-bus.js';
import { FillModel } from './fill-model.js';
import { PositionManager } from './position-manager.js';

const log = createChildLogger('ladder-engine');

/**
 * 레벨 래더 상태 머신
 *
 * 봉 하나마다: 고점 갱신 → 매도 → 매수 → 평가 순서로 한 번씩만 처리.
 * 매수/매도 모두 호가 그대로 체결하고 평가는 종가 기준.
 * 어느 봉 경계에서 멈춰도 현금/포지션/거래 로그는 서로 일치함.
 */
export class LadderEngine {
  readonly config: LadderConfig;
  private readonly bus: EventBus;
  private readonly fillModel: FillModel;
  private readonly posMgr: PositionManager;

  private _cash: number;
  private _watermark: number = 0;
  private pending: Map<number, PendingOrder> = new Map();
  private tradeLog: TradeRecord[] = [];
  private samples: EquitySample[] = [];
  private lastTimestamp: number | null = null;
  private barIndex: number = 0;

  constructor(config?: LadderConfigInput, bus?: EventBus) {
    this.config = createLadderConfig(config);
    this.bus = bus ?? new EventBus();
    this.fillModel = new FillModel(this.config.triggerMode);
    this.posMgr = new PositionManager();
    this._cash = this.config.initialCash;
  }

  // ─── 조회 ───────────────────────────────────────────────────────────────

  get cash(): number {
    return this._cash;
  }

  get watermark(): number {
    return this._watermark;
  }

  get barCount(): number {
    return this.barIndex;
  }

  get started(): boolean {
    return this.lastTimestamp !== null;
  }

  get positions(): readonly Position[] {
    return this.posMgr.snapshot();
  }

  /** 레벨 오름차순 */
  get pendingOrders(): readonly PendingOrder[] {
    return Array.from(this.pending.values()).sort((a, b) => a.level - b.level);
  }

  get trades(): readonly TradeRecord[] {
    return [...this.tradeLog];
  }

  get equityCurve(): readonly EquitySample[] {
    return [...this.samples];
  }

  get eventBus(): EventBus {
    return this.bus;
  }

  pendingAt(level: number): PendingOrder | undefined {
    return this.pending.get(level);
  }

  // ─── 실행 ───────────────────────────────────────────────────────────────

  /**
   * 전체 시계열 실행. 시작 전에 시계열을 검증(또는 normalizeSeries 설정 시 정규화)
   */
  run(bars: readonly PriceBar[]): LadderRunResult {
    if (this.started) {
      throw new Error('LadderEngine.run() requires a fresh engine; call reset() first');
    }
    const series = prepareSeries(bars, {
      triggerMode: this.config.triggerMode,
      normalize: this.config.normalizeSeries,
    });

    for (const bar of series) {
      this.step(bar);
    }

    const last = series[series.length - 1];
    if (this.config.closeOpenPositionsAtEnd && last !== undefined) {
      this.liquidate(last);
    }

    const result = this.result();
    log.info({
      bars: series.length,
      trades: result.trades.length,
      openPositions: result.openPositions.length,
      finalCash: result.finalCash,
    }, 'Ladder run complete');
    return result;
  }

  /**
   * 봉 하나 처리. 첫 호출에서 P0 = close 로 래더 초기화
   */
  step(bar: PriceBar): EquitySample {
    validateBar(bar, this.barIndex, this.config.triggerMode);
    if (this.lastTimestamp !== null && bar.timestamp <= this.lastTimestamp) {
      throw new PriceSeriesError(
        `timestamp ${bar.timestamp} is not after previous ${this.lastTimestamp}`,
        this.barIndex,
      );
    }
    if (this.lastTimestamp === null) {
      this.initialize(bar);
    }
    this.lastTimestamp = bar.timestamp;

    this.updateWatermark(bar);
    this.processSells(bar);
    this.processBuys(bar);
    const sample = this.record(bar);

    this.barIndex++;
    return sample;
  }

  result(): LadderRunResult {
    return {
      initialCash: this.config.initialCash,
      finalCash: this._cash,
      watermark: this._watermark,
      equityCurve: this.equityCurve,
      trades: this.trades,
      openPositions: this.positions,
      pendingOrders: this.pendingOrders,
    };
  }

  reset(): void {
    this.posMgr.reset();
    this.bus.clearLog();
    this.pending.clear();
    this.tradeLog = [];
    this.samples = [];
    this._cash = this.config.initialCash;
    this._watermark = 0;
    this.lastTimestamp = null;
    this.barIndex = 0;
  }

  // ─── 단계별 처리 ────────────────────────────────────────────────────────

  private initialize(bar: PriceBar): void {
    const p0 = bar.close;
    this._watermark = p0;
    const quotes = seedQuotes(this.config.levels, p0, this.config.seeding);
    quotes.forEach((price, level) => {
      this.placeOrder(level, price, bar.timestamp, 'SEED');
    });
    log.debug({ p0, seeding: this.config.seeding, quotes }, 'Ladder seeded');
  }

  /** 1. 고점이 기준 이상 갱신되면 레벨 0 대기 주문을 새 기준으로 재호가 */
  private updateWatermark(bar: PriceBar): void {
    const { upper, close } = this.fillModel.triggers(bar);
    if (upper <= this._watermark * (1 + this.config.reanchorThresholdPct)) return;

    const previous = this._watermark;
    this._watermark = upper;
    this.bus.emit({ type: 'WATERMARK_RAISED', timestamp: bar.timestamp, previous, watermark: upper });

    const level0 = this.levelAt(0);
    if (this.pending.has(0)) {
      const anchor = this.config.reanchorSource === 'WATERMARK' ? this._watermark : close;
      this.placeOrder(0, anchor * (1 - level0.buyPct), bar.timestamp, 'REANCHOR');
    }
  }

  /** 2. 목표가 도달 포지션 매도 (매수보다 먼저) */
  private processSells(bar: PriceBar): void {
    const { close } = this.fillModel.triggers(bar);
    for (const position of this.posMgr.snapshot()) {
      const price = this.fillModel.trySell(position, bar);
      if (price === null) continue;

      this.sell(position, price, bar.timestamp, 'TARGET');
      const level = this.levelAt(position.level);
      this.placeOrder(level.index, close * (1 - level.buyPct), bar.timestamp, 'REQUOTE_AFTER_SELL');
    }
  }

  /**
   * 3. 대기 주문 체결. 매도 처리 후 스냅샷 기준 1회 통과
   * 이번 봉에 새로 낸 다음 레벨 호가는 다음 봉부터 판정
   */
  private processBuys(bar: PriceBar): void {
    const orders = this.pendingOrders;
    for (const order of orders) {
      if (this.pending.get(order.level) !== order) continue; // 이번 봉에 교체됨

      const price = this.fillModel.tryBuy(order, bar);
      if (price === null) continue;

      const level = this.levelAt(order.level);
      if (this._cash < level.allocation) {
        this.bus.emit({
          type: 'ORDER_DEFERRED',
          timestamp: bar.timestamp,
          order,
          cash: this._cash,
          required: level.allocation,
        });
        log.debug({ level: level.index, cash: this._cash, need: level.allocation }, 'Fill deferred: insufficient cash');
        continue;
      }

      this.buy(level, order, price, bar.timestamp);

      const pullback = pullbackToNext(this.config.levels, level.index);
      if (pullback !== null) {
        this.placeOrder(level.index + 1, price * (1 - pullback), bar.timestamp, 'NEXT_LEVEL');
      }
    }
  }

  /** 4. 평가: 현금 + Σ 수량 × 종가 */
  private record(bar: PriceBar): EquitySample {
    const sample: EquitySample = {
      timestamp: bar.timestamp,
      portfolioValue: this._cash + this.posMgr.marketValue(bar.close),
      price: bar.close,
      openPositions: this.posMgr.count,
      pendingOrders: this.pending.size,
      cash: this._cash,
    };
    this.samples.push(sample);
    this.bus.emit({ type: 'BAR', timestamp: bar.timestamp, sample });
    return sample;
  }

  /** 데이터 종료 시 잔여 포지션을 마지막 종가로 청산 (평가 샘플은 그대로) */
  private liquidate(bar: PriceBar): void {
    for (const position of this.posMgr.snapshot()) {
      this.sell(position, bar.close, bar.timestamp, 'END_OF_DATA');
    }
  }

  // ─── 체결 ───────────────────────────────────────────────────────────────

  private buy(level: Level, order: PendingOrder, price: number, timestamp: number): void {
    this.pending.delete(order.level);
    const position = this.posMgr.open(level, price, timestamp);
    this._cash -= level.allocation;

    const fill: BuyRecord = {
      side: 'BUY',
      timestamp,
      level: level.index,
      price,
      size: position.size,
      cost: level.allocation,
    };
    this.tradeLog.push(fill);
    this.bus.emit({ type: 'ORDER_FILLED', timestamp, fill, position });
    log.debug({ level: level.index, price, size: position.size, cash: this._cash }, 'Buy filled');
  }

  private sell(position: Position, price: number, timestamp: number, reason: ExitReason): void {
    this.posMgr.close(position.id);
    const proceeds = position.size * price;
    this._cash += proceeds;

    const fill: SellRecord = {
      side: 'SELL',
      timestamp,
      level: position.level,
      price,
      size: position.size,
      proceeds,
      entryPrice: position.entryPrice,
      profit: proceeds - position.size * position.entryPrice,
      reason,
    };
    this.tradeLog.push(fill);
    this.bus.emit({ type: 'POSITION_CLOSED', timestamp, position, fill });
    log.debug({ level: position.level, price, profit: fill.profit, reason }, 'Position closed');
  }

  private placeOrder(level: number, price: number, timestamp: number, reason: QuoteReason): void {
    const order: PendingOrder = { level, price, placedAt: timestamp, reason };
    const replaced = this.pending.get(level) ?? null;
    this.pending.set(level, order);
    this.bus.emit({ type: 'ORDER_PLACED', timestamp, order, replaced });
  }

  private levelAt(index: number): Level {
    const level = this.config.levels[index];
    if (!level) {
      throw new Error(`Level ${index} is outside the ladder (0..${this.config.levels.length - 1})`);
    }
    return level;
  }
}

import type { PendingOrder, Position, PriceBar, TriggerMode } from '../types/index.js';

export interface TriggerPrices {
  readonly upper: number;   // 매도/고점 판정가
  readonly lower: number;   // 매수 판정가
  readonly close: number;   // 평가가
}

/**
 * 지정가 체결 시뮬레이션
 * CLOSE:    종가만으로 판정
 * HIGH_LOW: 매도는 고가, 매수는 저가로 판정 (봉 내부 경로는 보지 않음)
 * 체결가는 항상 호가 그대로 (슬리피지/수수료 없음)
 */
export class FillModel {
  private readonly mode: TriggerMode;

  constructor(mode: TriggerMode) {
    this.mode = mode;
  }

  /** 봉은 series 검증을 통과했다고 가정 (HIGH_LOW면 high/low 존재) */
  triggers(bar: PriceBar): TriggerPrices {
    if (this.mode === 'CLOSE') {
      return { upper: bar.close, lower: bar.close, close: bar.close };
    }
    return {
      upper: bar.high ?? bar.close,
      lower: bar.low ?? bar.close,
      close: bar.close,
    };
  }

  /** 매수 지정가: 판정가가 호가 이하 (경계 포함) */
  tryBuy(order: PendingOrder, bar: PriceBar): number | null {
    return this.triggers(bar).lower <= order.price ? order.price : null;
  }

  /** 매도 목표가: 판정가가 목표가 이상 (경계 포함) */
  trySell(position: Position, bar: PriceBar): number | null {
    return this.triggers(bar).upper >= position.sellTarget ? position.sellTarget : null;
  }
}

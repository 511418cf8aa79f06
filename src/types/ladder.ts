export type TriggerMode = 'CLOSE' | 'HIGH_LOW';
export type SeedingMode = 'INDEPENDENT' | 'CASCADE';
export type ReanchorSource = 'WATERMARK' | 'BAR_CLOSE';

export interface Level {
  readonly index: number;
  readonly buyPct: number;        // 기준가 대비 하락률 (0.04 = 4%)
  readonly sellPct: number;       // 체결가 대비 상승률
  readonly allocation: number;    // 체결 시 투입 금액
  readonly nextBuyPct?: number;   // 다음 레벨 호가용 하락률 (없으면 다음 레벨 buyPct)
}

export interface LadderConfig {
  readonly levels: readonly Level[];
  readonly initialCash: number;
  readonly triggerMode: TriggerMode;
  readonly seeding: SeedingMode;
  readonly reanchorThresholdPct: number;
  readonly reanchorSource: ReanchorSource;
  readonly normalizeSeries: boolean;
  readonly closeOpenPositionsAtEnd: boolean;
}

export type QuoteReason = 'SEED' | 'REANCHOR' | 'REQUOTE_AFTER_SELL' | 'NEXT_LEVEL';

export interface PendingOrder {
  readonly level: number;
  readonly price: number;
  readonly placedAt: number;      // Unix ms
  readonly reason: QuoteReason;
}

export interface Position {
  readonly id: string;
  readonly level: number;
  readonly entryPrice: number;
  readonly size: number;
  readonly sellTarget: number;
  readonly allocation: number;
  readonly openedAt: number;      // Unix ms
}

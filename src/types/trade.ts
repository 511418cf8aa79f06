export type ExitReason = 'TARGET' | 'END_OF_DATA';

export interface BuyRecord {
  readonly side: 'BUY';
  readonly timestamp: number;
  readonly level: number;
  readonly price: number;
  readonly size: number;
  readonly cost: number;
}

export interface SellRecord {
  readonly side: 'SELL';
  readonly timestamp: number;
  readonly level: number;
  readonly price: number;
  readonly size: number;
  readonly proceeds: number;
  readonly entryPrice: number;
  readonly profit: number;
  readonly reason: ExitReason;
}

export type TradeRecord = BuyRecord | SellRecord;

export interface EquitySample {
  readonly timestamp: number;
  readonly portfolioValue: number;
  readonly price: number;
  readonly openPositions: number;
  readonly pendingOrders: number;
  readonly cash: number;
}

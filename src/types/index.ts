export type { PriceBar } from './candle.js';
export type {
  TriggerMode,
  SeedingMode,
  ReanchorSource,
  Level,
  LadderConfig,
  QuoteReason,
  PendingOrder,
  Position,
} from './ladder.js';
export type {
  ExitReason,
  BuyRecord,
  SellRecord,
  TradeRecord,
  EquitySample,
} from './trade.js';
export type {
  EventType,
  BaseEvent,
  BarEvent,
  OrderPlacedEvent,
  OrderFilledEvent,
  OrderDeferredEvent,
  PositionClosedEvent,
  WatermarkRaisedEvent,
  LadderEvent,
} from './event.js';
export type {
  PerformanceReport,
  LadderRunResult,
  BacktestReport,
} from './report.js';

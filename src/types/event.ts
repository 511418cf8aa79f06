import type { PendingOrder, Position } from './ladder.js';
import type { BuyRecord, EquitySample, SellRecord } from './trade.js';

export type EventType =
  | 'BAR'
  | 'ORDER_PLACED'
  | 'ORDER_FILLED'
  | 'ORDER_DEFERRED'
  | 'POSITION_CLOSED'
  | 'WATERMARK_RAISED';

export interface BaseEvent {
  readonly type: EventType;
  readonly timestamp: number;
}

export interface BarEvent extends BaseEvent {
  readonly type: 'BAR';
  readonly sample: EquitySample;
}

export interface OrderPlacedEvent extends BaseEvent {
  readonly type: 'ORDER_PLACED';
  readonly order: PendingOrder;
  readonly replaced: PendingOrder | null;
}

export interface OrderFilledEvent extends BaseEvent {
  readonly type: 'ORDER_FILLED';
  readonly fill: BuyRecord;
  readonly position: Position;
}

export interface OrderDeferredEvent extends BaseEvent {
  readonly type: 'ORDER_DEFERRED';
  readonly order: PendingOrder;
  readonly cash: number;
  readonly required: number;
}

export interface PositionClosedEvent extends BaseEvent {
  readonly type: 'POSITION_CLOSED';
  readonly position: Position;
  readonly fill: SellRecord;
}

export interface WatermarkRaisedEvent extends BaseEvent {
  readonly type: 'WATERMARK_RAISED';
  readonly previous: number;
  readonly watermark: number;
}

export type LadderEvent =
  | BarEvent
  | OrderPlacedEvent
  | OrderFilledEvent
  | OrderDeferredEvent
  | PositionClosedEvent
  | WatermarkRaisedEvent;

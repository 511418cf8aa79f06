import type { LadderEvent, EventType } from '../types/index.js';

type EventOf<T extends EventType> = Extract<LadderEvent, { type: T }>;
type EventHandler<T extends EventType> = (event: EventOf<T>) => void;

function isEventOf<T extends EventType>(event: LadderEvent, type: T): event is EventOf<T> {
  return event.type === type;
}

/**
 * 타입드 이벤트 버스. 이벤트 로그 보관으로 리플레이 가능
 */
export class EventBus {
  private handlers: Map<EventType, ((event: LadderEvent) => void)[]> = new Map();
  private log: LadderEvent[] = [];

  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const list = this.handlers.get(type) ?? [];
    list.push((event) => {
      if (isEventOf(event, type)) handler(event);
    });
    this.handlers.set(type, list);
  }

  emit(event: LadderEvent): void {
    this.log.push(event);
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const h of handlers) {
        h(event);
      }
    }
  }

  getLog(): readonly LadderEvent[] {
    return this.log;
  }

  clearLog(): void {
    this.log = [];
  }

  reset(): void {
    this.handlers.clear();
    this.log = [];
  }
}

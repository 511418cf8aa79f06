import { describe, it, expect } from 'vitest';
import { EventBus } from '../src/engine/event-bus.js';
import { LadderEngine } from '../src/engine/ladder-engine.js';

describe('EventBus', () => {
  it('delivers typed events to subscribers and keeps the log', () => {
    const bus = new EventBus();
    const placed: number[] = [];
    const closedProfits: number[] = [];
    bus.on('ORDER_PLACED', (e) => placed.push(e.order.level));
    bus.on('POSITION_CLOSED', (e) => closedProfits.push(e.fill.profit));

    const engine = new LadderEngine({
      levels: [
        { buyPct: 0.04, sellPct: 0.03, allocation: 1000 },
        { buyPct: 0.05, sellPct: 0.03, allocation: 1000 },
      ],
      triggerMode: 'CLOSE',
    }, bus);

    engine.step({ timestamp: 1, close: 100 });
    engine.step({ timestamp: 2, close: 95.5 });
    engine.step({ timestamp: 3, close: 99.5 });

    // 시드 0,1 → 레벨 0 체결 후 1 재호가 → 매도 후 0 재호가
    expect(placed).toEqual([0, 1, 1, 0]);
    expect(closedProfits).toHaveLength(1);
    expect(closedProfits[0]).toBeCloseTo(30, 8);
    expect(bus.getLog().map((e) => e.type)).toEqual([
      'ORDER_PLACED',
      'ORDER_PLACED',
      'BAR',
      'ORDER_FILLED',
      'ORDER_PLACED',
      'BAR',
      'POSITION_CLOSED',
      'ORDER_PLACED',
      'BAR',
    ]);
  });

  it('reset drops handlers and log', () => {
    const bus = new EventBus();
    let calls = 0;
    bus.on('BAR', () => calls++);
    bus.reset();
    new LadderEngine({ levels: [{ buyPct: 0.04, sellPct: 0.03, allocation: 10 }], triggerMode: 'CLOSE' }, bus)
      .step({ timestamp: 1, close: 100 });
    expect(calls).toBe(0);
    expect(bus.getLog()).toHaveLength(1 + 1);
  });
});

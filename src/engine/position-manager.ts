import type { Level, Position } from '../types/index.js';

/**
 * 레벨별 보유 포지션 관리. 한 레벨에 여러 포지션 가능 (매도 전 재호가 체결 시)
 * 포지션은 생성 후 변경하지 않음
 */
export class PositionManager {
  private positions: Map<string, Position> = new Map();
  private idCounter: number = 0;

  get count(): number {
    return this.positions.size;
  }

  /** 체결 순서대로 복사본 반환 (순회 중 변경 안전) */
  snapshot(): Position[] {
    return Array.from(this.positions.values());
  }

  open(level: Level, entryPrice: number, timestamp: number): Position {
    const position: Position = {
      id: `pos-${this.idCounter++}`,
      level: level.index,
      entryPrice,
      size: level.allocation / entryPrice,
      sellTarget: entryPrice * (1 + level.sellPct),
      allocation: level.allocation,
      openedAt: timestamp,
    };
    this.positions.set(position.id, position);
    return position;
  }

  close(id: string): Position {
    const position = this.positions.get(id);
    if (!position) {
      throw new Error(`No open position ${id}`);
    }
    this.positions.delete(id);
    return position;
  }

  /** 평가액: Σ 수량 × 가격 */
  marketValue(price: number): number {
    let value = 0;
    for (const p of this.positions.values()) {
      value += p.size * price;
    }
    return value;
  }

  reset(): void {
    this.positions.clear();
    this.idCounter = 0;
  }
}

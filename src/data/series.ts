import { PriceSeriesError } from '../errors.js';
import type { PriceBar, TriggerMode } from '../types/index.js';

export interface SeriesOptions {
  readonly triggerMode: TriggerMode;
  /** true면 정렬 + 중복 제거 (첫 봉 유지), false면 즉시 거부 */
  readonly normalize?: boolean;
}

function isPositivePrice(v: number | undefined): v is number {
  return v !== undefined && Number.isFinite(v) && v > 0;
}

/**
 * 단일 봉 필드 검증. 시간 순서는 prepareSeries/엔진 step에서 확인
 */
export function validateBar(bar: PriceBar, index: number, mode: TriggerMode): void {
  if (!Number.isFinite(bar.timestamp)) {
    throw new PriceSeriesError(`invalid timestamp (${bar.timestamp})`, index);
  }
  if (!isPositivePrice(bar.close)) {
    throw new PriceSeriesError(`close must be a positive number (${bar.close})`, index);
  }
  if (mode === 'HIGH_LOW') {
    if (!isPositivePrice(bar.high) || !isPositivePrice(bar.low)) {
      throw new PriceSeriesError('high and low are required in HIGH_LOW mode', index);
    }
    if (bar.high < bar.low) {
      throw new PriceSeriesError(`high (${bar.high}) < low (${bar.low})`, index);
    }
  }
}

/**
 * 시뮬레이션 전 시계열 검증. 타임스탬프는 엄격히 증가해야 함
 */
export function prepareSeries(bars: readonly PriceBar[], options: SeriesOptions): PriceBar[] {
  bars.forEach((bar, i) => validateBar(bar, i, options.triggerMode));

  if (options.normalize) {
    // Array.prototype.sort 는 안정 정렬 → 같은 시각이면 먼저 온 봉이 앞
    const sorted = [...bars].sort((a, b) => a.timestamp - b.timestamp);
    return sorted.filter((bar, i) => i === 0 || bar.timestamp !== sorted[i - 1]?.timestamp);
  }

  for (let i = 1; i < bars.length; i++) {
    const prev = bars[i - 1]!;
    const cur = bars[i]!;
    if (cur.timestamp === prev.timestamp) {
      throw new PriceSeriesError(`duplicate timestamp ${cur.timestamp}`, i);
    }
    if (cur.timestamp < prev.timestamp) {
      throw new PriceSeriesError(
        `timestamp ${cur.timestamp} is earlier than previous ${prev.timestamp}`,
        i,
      );
    }
  }
  return [...bars];
}

/**
 * 엔진 입력 봉. CLOSE 모드는 close만 필요, HIGH_LOW 모드는 high/low 필수
 */
export interface PriceBar {
  readonly timestamp: number;   // Unix ms
  readonly close: number;
  readonly open?: number;
  readonly high?: number;
  readonly low?: number;
  readonly volume?: number;
}

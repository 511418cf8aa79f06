/**
 * 래더 설정 오류. 생성 시점에 즉시 발생
 */
export class LadderConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid ladder config: ${issues.join('; ')}`);
    this.name = 'LadderConfigError';
    this.issues = issues;
  }
}

/**
 * 가격 시계열 오류 (정렬/중복/결측). 시뮬레이션 시작 전에 발생
 */
export class PriceSeriesError extends Error {
  readonly index: number;

  constructor(message: string, index: number) {
    super(`Bar ${index}: ${message}`);
    this.name = 'PriceSeriesError';
    this.index = index;
  }
}

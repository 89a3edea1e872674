/**
 * 시간 소스
 * `now()`는 부작용 없이 단조 증가하는 ms 값을 반환해야 한다.
 */
export interface Clock {
  now(): number;
}

/**
 * 틱 카운터 기반 결정적 시계
 * 라운드 컨트롤러가 매 틱 `advance()`를 호출한다.
 * 60Hz처럼 1000/tickRate가 정수가 아니어도 `now(t + n) - now(t)`는 틱 수만으로 정해진다.
 */
export class TickClock implements Clock {
  private ticks = 0;

  constructor(private readonly tickRate: number) {}

  advance(): void {
    this.ticks += 1;
  }

  /** 정수 ms. 정수 ms 기간을 더한 마감 시각과 정확히 비교된다. */
  now(): number {
    return Math.round((this.ticks * 1000) / this.tickRate);
  }
}

/** 테스트용 수동 시계 */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }

  now(): number {
    return this.current;
  }
}

/** 실제 경과 시간 (process 기준 단조 시계) */
export class SystemClock implements Clock {
  private readonly origin = performance.now();

  now(): number {
    return performance.now() - this.origin;
  }
}

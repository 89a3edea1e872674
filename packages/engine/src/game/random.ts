/** [0, 1) 범위 난수 소스 */
export interface RandomSource {
  next(): number;
}

/**
 * mulberry32 기반 시드 난수
 * 같은 시드면 같은 수열을 만든다.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let x = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  }
}

export class MathRandom implements RandomSource {
  next(): number {
    return Math.random();
  }
}

/**
 * 균등 분포로 하나 선택
 * @returns 빈 배열이면 undefined
 */
export function pick<T>(source: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(items.length - 1, Math.floor(source.next() * items.length));
  return items[index];
}

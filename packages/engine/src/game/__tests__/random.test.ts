import { describe, it, expect } from 'vitest';
import { ManualClock, SystemClock, TickClock } from '../clock.js';
import { InputQueue } from '../InputQueue.js';
import { SeededRandom, pick } from '../random.js';
import { ScriptedRandom } from './fixtures.js';
import { InvalidDirectionError } from '@maze-chase/shared';

describe('SeededRandom', () => {
  it('같은 시드는 같은 수열', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const seqA = Array.from({ length: 5 }, () => a.next());
    const seqB = Array.from({ length: 5 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('[0, 1) 범위', () => {
    const random = new SeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('pick', () => {
  it('난수 값에 따라 균등 구간 선택', () => {
    const items = ['a', 'b', 'c', 'd'] as const;
    expect(pick(new ScriptedRandom([0]), items)).toBe('a');
    expect(pick(new ScriptedRandom([0.26]), items)).toBe('b');
    expect(pick(new ScriptedRandom([0.999]), items)).toBe('d');
  });

  it('빈 배열은 undefined', () => {
    expect(pick(new ScriptedRandom([0.5]), [])).toBeUndefined();
  });
});

describe('clocks', () => {
  it('TickClock은 틱당 1000/tickRate ms', () => {
    const clock = new TickClock(50);
    expect(clock.now()).toBe(0);
    clock.advance();
    clock.advance();
    expect(clock.now()).toBe(40);
    expect(clock.now()).toBe(40);
  });

  it('60Hz에서 360틱은 어느 시점에서 시작해도 정확히 6000ms', () => {
    const clock = new TickClock(60);
    const times: number[] = [clock.now()];
    for (let i = 0; i < 2400; i++) {
      clock.advance();
      times.push(clock.now());
    }

    expect(times[125]).toBe(2083);
    for (let start = 0; start + 360 < times.length; start++) {
      const elapsed = (times[start + 360] ?? 0) - (times[start] ?? 0);
      expect(elapsed).toBe(6000);
      expect(Number.isInteger(times[start])).toBe(true);
    }
  });

  it('SystemClock은 0부터 단조 증가', () => {
    const clock = new SystemClock();
    const first = clock.now();
    const second = clock.now();
    expect(first).toBeGreaterThanOrEqual(0);
    expect(second).toBeGreaterThanOrEqual(first);
  });

  it('ManualClock', () => {
    const clock = new ManualClock(100);
    clock.advance(50);
    expect(clock.now()).toBe(150);
    clock.set(10);
    expect(clock.now()).toBe(10);
  });
});

describe('InputQueue', () => {
  it('마지막 입력만 남고 take는 비운다', () => {
    const queue = new InputQueue();
    queue.push('up');
    queue.push('right');
    expect(queue.take()).toBe('right');
    expect(queue.take()).toBeNull();
  });

  it('잘못된 방향은 버퍼를 바꾸지 않는다', () => {
    const queue = new InputQueue();
    queue.push('down');
    expect(() => queue.push('diagonal')).toThrow(InvalidDirectionError);
    expect(() => queue.push(null)).toThrow('Invalid direction: null');
    expect(queue.peek()).toBe('down');
  });

  it('stop도 유효한 의도', () => {
    const queue = new InputQueue();
    expect(queue.push('stop')).toBe('stop');
  });
});

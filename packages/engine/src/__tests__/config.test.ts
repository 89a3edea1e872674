import { describe, it, expect } from 'vitest';
import { InvalidConfigError } from '@maze-chase/shared';
import { loadEnv } from '../config.js';

describe('loadEnv', () => {
  it('기본값', () => {
    expect(loadEnv({})).toEqual({ LOG_LEVEL: 'info' });
  });

  it('숫자 변환', () => {
    expect(loadEnv({ LOG_LEVEL: 'debug', TICK_RATE: '30', SEED: '7', STARTING_LIVES: '5' })).toEqual({
      LOG_LEVEL: 'debug',
      TICK_RATE: 30,
      SEED: 7,
      STARTING_LIVES: 5,
    });
  });

  it('잘못된 값은 InvalidConfigError', () => {
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow(InvalidConfigError);
    expect(() => loadEnv({ TICK_RATE: 'fast' })).toThrow(InvalidConfigError);
  });
});

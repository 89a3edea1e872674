import { z } from 'zod';
import {
  ADVERSARY_EAT_SCORE,
  ADVERSARY_SPEED,
  CENTER_TOLERANCE,
  COLLISION_DISTANCE_RATIO,
  PELLET_SCORE,
  PLAYER_SPEED,
  POWER_DURATION_MS,
  POWER_PELLET_SCORE,
  RESPAWN_DELAY_MS,
  STARTING_LIVES,
  TICK_RATE,
  TILE_SIZE,
} from './constants.js';
import { InvalidConfigError } from './errors.js';

/** 방향 입력 스키마 (5종) */
export const DirectionSchema = z.enum(['up', 'down', 'left', 'right', 'stop'], {
  errorMap: () => ({ message: 'direction must be one of up, down, left, right, stop' }),
});

/**
 * 게임 설정 스키마
 * 누락된 필드는 기본 상수로 채워진다.
 */
export const GameConfigSchema = z
  .object({
    tileSize: z.number().int().positive().default(TILE_SIZE),
    tickRate: z.number().int().positive().max(240).default(TICK_RATE),
    playerSpeed: z.number().positive().default(PLAYER_SPEED),
    adversarySpeed: z.number().positive().default(ADVERSARY_SPEED),
    powerDurationMs: z.number().int().nonnegative().default(POWER_DURATION_MS),
    respawnDelayMs: z.number().int().nonnegative().default(RESPAWN_DELAY_MS),
    pelletScore: z.number().int().nonnegative().default(PELLET_SCORE),
    powerPelletScore: z.number().int().nonnegative().default(POWER_PELLET_SCORE),
    adversaryEatScore: z.number().int().nonnegative().default(ADVERSARY_EAT_SCORE),
    startingLives: z.number().int().positive().default(STARTING_LIVES),
    centerTolerance: z.number().positive().default(CENTER_TOLERANCE),
    collisionDistance: z.number().positive().optional(),
  })
  .transform((config) => ({
    ...config,
    collisionDistance: config.collisionDistance ?? config.tileSize * COLLISION_DISTANCE_RATIO,
  }))
  .refine((config) => config.collisionDistance < config.tileSize, {
    message: 'collisionDistance must be smaller than one tile',
    path: ['collisionDistance'],
  })
  .refine((config) => config.centerTolerance < config.tileSize / 2, {
    message: 'centerTolerance must be smaller than half a tile',
    path: ['centerTolerance'],
  })
  .refine((config) => Math.max(config.playerSpeed, config.adversarySpeed) <= config.tileSize / 2, {
    message: 'speeds must not exceed half a tile per tick',
    path: ['playerSpeed'],
  });

export type GameConfigInput = z.input<typeof GameConfigSchema>;
export type GameConfig = z.output<typeof GameConfigSchema>;

/**
 * 부분 설정을 검증하고 기본값을 채운다.
 * @throws InvalidConfigError 검증 실패 시
 */
export function resolveGameConfig(input: GameConfigInput = {}): GameConfig {
  const parsed = GameConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidConfigError('Invalid game config', issues);
  }
  return parsed.data;
}

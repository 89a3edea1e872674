import { z } from 'zod';
import { InvalidConfigError } from '@maze-chase/shared';

/** 환경 변수 스키마 */
const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TICK_RATE: z.coerce.number().int().positive().optional(),
  SEED: z.coerce.number().int().optional(),
  STARTING_LIVES: z.coerce.number().int().positive().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * 환경 변수 로드 및 검증
 * @throws InvalidConfigError 형식이 맞지 않는 값이 있을 때
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidConfigError('Invalid environment variables', issues);
  }
  return parsed.data;
}

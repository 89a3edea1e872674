import pino from 'pino';
import type { Logger } from 'pino';
import { loadEnv } from './config.js';

/**
 * 모듈별 pino 로거
 * stdout은 터미널 렌더러가 쓰므로 로그는 stderr(fd 2)로 보낸다.
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: loadEnv().LOG_LEVEL }, pino.destination(2));
}

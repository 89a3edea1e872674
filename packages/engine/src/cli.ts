#!/usr/bin/env node
/**
 * 터미널에서 로컬 게임 실행
 * 방향키/WASD 이동, 게임 오버 후 R 재시작, Q/Esc 종료
 */
import { emitKeypressEvents } from 'node:readline';
import { loadEnv } from './config.js';
import { GameLoopManager } from './game/GameLoopManager.js';
import { SystemClock } from './game/clock.js';
import { SeededRandom } from './game/random.js';
import { isQuitKey, keyToDirection } from './input/keymap.js';
import { createLogger } from './logger.js';
import { TerminalRenderer } from './render/TerminalRenderer.js';

const SESSION_ID = 'local';

const logger = createLogger('cli');

interface Keypress {
  readonly name?: string;
  readonly ctrl?: boolean;
}

function main(): void {
  const env = loadEnv();
  const manager = new GameLoopManager();

  const controller = manager.createSession({
    sessionId: SESSION_ID,
    renderer: new TerminalRenderer(process.stdout),
    // 타이머 지연이 있어도 파워 모드와 부활은 실제 경과 시간 기준
    clock: new SystemClock(),
    ...(env.SEED !== undefined ? { random: new SeededRandom(env.SEED) } : {}),
    config: {
      ...(env.TICK_RATE !== undefined ? { tickRate: env.TICK_RATE } : {}),
      ...(env.STARTING_LIVES !== undefined ? { startingLives: env.STARTING_LIVES } : {}),
    },
  });

  const quit = (code: number): void => {
    manager.shutdown();
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
    process.stdin.pause();
    process.exitCode = code;
  };

  emitKeypressEvents(process.stdin);
  if (process.stdin.isTTY) process.stdin.setRawMode(true);

  process.stdin.on('keypress', (_text: string | undefined, key: Keypress | undefined) => {
    const name = key?.name;
    if (isQuitKey(name, key?.ctrl ?? false)) {
      quit(0);
      return;
    }
    if (name === 'r' && controller.getState().gameOver) {
      manager.restartSession(SESSION_ID);
      return;
    }
    const direction = keyToDirection(name);
    if (direction !== null) {
      manager.handleInput(SESSION_ID, direction);
    }
  });

  manager.setOnGameOver((sessionId, snapshot) => {
    logger.debug({ sessionId, score: snapshot.score, win: snapshot.win }, 'Game finished');
  });
  manager.startSession(SESSION_ID);
}

try {
  main();
} catch (error) {
  logger.error({ err: error }, 'Failed to start game');
  process.exitCode = 1;
}

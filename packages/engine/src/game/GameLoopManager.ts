/**
 * 게임 루프 매니저
 * 세션별 RoundController를 고정 틱 레이트로 실행하고 스냅샷을 렌더러로 전달한다.
 */
import type { RenderSnapshot } from '@maze-chase/shared';
import { SessionNotFoundError } from '@maze-chase/shared';
import { createLogger } from '../logger.js';
import type { Renderer } from '../render/Renderer.js';
import { RoundController } from './RoundController.js';
import type { RoundControllerOptions } from './RoundController.js';

const logger = createLogger('game-loop-manager');

/** 세션 생성 설정 */
export interface SessionConfig extends RoundControllerOptions {
  readonly sessionId: string;
  readonly renderer?: Renderer;
}

/** 게임 오버 콜백 */
export type GameOverCallback = (sessionId: string, snapshot: RenderSnapshot) => void;

interface Session {
  readonly controller: RoundController;
  readonly renderer: Renderer | null;
  timer: ReturnType<typeof setInterval> | null;
  /** 게임 오버 콜백 발송 여부 (재시작 시 초기화) */
  gameOverNotified: boolean;
}

export class GameLoopManager {
  private readonly sessions: Map<string, Session> = new Map();
  private onGameOver: GameOverCallback | null = null;

  /** 세션 생성 (시작하지 않음). 같은 ID가 있으면 교체한다. */
  createSession(config: SessionConfig): RoundController {
    const { sessionId, renderer, ...options } = config;
    if (this.sessions.has(sessionId)) {
      logger.warn({ sessionId }, 'Replacing existing session');
      this.removeSession(sessionId);
    }

    const controller = new RoundController(options);
    this.sessions.set(sessionId, {
      controller,
      renderer: renderer ?? null,
      timer: null,
      gameOverNotified: false,
    });
    logger.info({ sessionId, tickRate: controller.config.tickRate }, 'Session created');
    return controller;
  }

  /** 고정 틱 루프 시작. 첫 프레임을 즉시 렌더링한다. */
  startSession(sessionId: string): void {
    const session = this.requireSession(sessionId);
    if (session.timer !== null) return;

    session.renderer?.render(session.controller.snapshot());
    const intervalMs = 1000 / session.controller.config.tickRate;
    session.timer = setInterval(() => {
      this.step(sessionId, session);
    }, intervalMs);
    logger.info({ sessionId, intervalMs }, 'Session started');
  }

  stopSession(sessionId: string): void {
    const session = this.requireSession(sessionId);
    if (session.timer === null) return;
    clearInterval(session.timer);
    session.timer = null;
    logger.info({ sessionId }, 'Session stopped');
  }

  removeSession(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    if (session.timer !== null) clearInterval(session.timer);
    this.sessions.delete(sessionId);
    logger.info({ sessionId }, 'Session removed');
  }

  /**
   * 입력 전달
   * @throws SessionNotFoundError 세션 없음
   * @throws InvalidDirectionError 허용되지 않은 방향
   */
  handleInput(sessionId: string, direction: unknown): void {
    this.requireSession(sessionId).controller.handleInput(direction);
  }

  /** 세션 전체 재시작 (루프 상태는 유지) */
  restartSession(sessionId: string): void {
    const session = this.requireSession(sessionId);
    session.controller.restartGame();
    session.gameOverNotified = false;
    session.renderer?.render(session.controller.snapshot());
  }

  getSessionState(sessionId: string): RenderSnapshot | null {
    return this.sessions.get(sessionId)?.controller.snapshot() ?? null;
  }

  getActiveSessions(): string[] {
    return Array.from(this.sessions.entries())
      .filter(([, session]) => session.timer !== null)
      .map(([id]) => id);
  }

  getOnGameOver(): GameOverCallback | null {
    return this.onGameOver;
  }

  setOnGameOver(callback: GameOverCallback | null): void {
    this.onGameOver = callback;
  }

  /** 모든 세션 정리 */
  shutdown(): void {
    for (const sessionId of Array.from(this.sessions.keys())) {
      this.removeSession(sessionId);
    }
    logger.info('GameLoopManager shutdown');
  }

  private step(sessionId: string, session: Session): void {
    const snapshot = session.controller.tick();
    session.renderer?.render(snapshot);

    if (snapshot.gameOver && !session.gameOverNotified) {
      session.gameOverNotified = true;
      logger.info({ sessionId, score: snapshot.score, win: snapshot.win }, 'Session reached game over');
      this.onGameOver?.(sessionId, snapshot);
    }
  }

  private requireSession(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }
}

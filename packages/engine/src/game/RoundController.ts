import type { GameConfig, GameConfigInput, MazeDefinition, RenderSnapshot } from '@maze-chase/shared';
import {
  ACTOR_RADIUS_RATIO,
  CLASSIC_MAZE,
  DEAD_COLOR,
  FRIGHTENED_COLOR,
  PLAYER_COLOR,
  resolveGameConfig,
} from '@maze-chase/shared';
import { createLogger } from '../logger.js';
import { Adversary } from './Adversary.js';
import type { ActorGeometry } from './Actor.js';
import { TickClock } from './clock.js';
import type { Clock } from './clock.js';
import { InputQueue } from './InputQueue.js';
import { Maze } from './Maze.js';
import { distance } from './motion.js';
import { Player } from './Player.js';
import { MathRandom } from './random.js';
import type { RandomSource } from './random.js';

const logger = createLogger('round-controller');

/** 라운드 컨트롤러 생성 옵션 */
export interface RoundControllerOptions {
  readonly definition?: MazeDefinition;
  readonly config?: GameConfigInput;
  /** 적 방향 선택용 난수 (기본 Math.random) */
  readonly random?: RandomSource;
  /** 기본은 틱마다 1000/tickRate ms 진행하는 TickClock */
  readonly clock?: Clock;
}

/** 게임 세션 상태 (컨트롤러 단독 소유) */
export interface GameSession {
  tick: number;
  score: number;
  lives: number;
  /** 파워 모드 만료 시각 (ms). 비활성이면 null */
  powerExpiresAt: number | null;
  win: boolean;
  gameOver: boolean;
}

/**
 * 라운드 컨트롤러
 *
 * 틱 순서:
 * 1. 입력 적용 → 플레이어 이동
 * 2. 적 이동 (죽은 적은 부활 시각 확인만)
 * 3. 파워 모드 만료 확인
 * 4. 플레이어 셀의 펠릿 소비
 * 5. 플레이어-적 충돌 처리
 * 6. 승리 판정 (같은 틱에 마지막 목숨을 잃었어도 남은 펠릿이 없으면 승리)
 */
export class RoundController {
  readonly config: GameConfig;
  readonly input = new InputQueue();

  private readonly definition: MazeDefinition;
  private readonly random: RandomSource;
  private readonly clock: Clock;
  private readonly geometry: ActorGeometry;

  private maze: Maze;
  private player: Player;
  private adversaries: Adversary[];
  private session: GameSession;

  constructor(options: RoundControllerOptions = {}) {
    this.config = resolveGameConfig(options.config);
    this.definition = options.definition ?? CLASSIC_MAZE;
    this.random = options.random ?? new MathRandom();
    this.clock = options.clock ?? new TickClock(this.config.tickRate);
    this.geometry = {
      tileSize: this.config.tileSize,
      centerTolerance: this.config.centerTolerance,
      radius: this.config.tileSize * ACTOR_RADIUS_RATIO,
    };

    this.maze = this.createMaze();
    this.player = this.createPlayer();
    this.adversaries = this.createAdversaries();
    this.session = this.createSession();
  }

  /**
   * 입력 의도 기록 (다음 틱에 적용)
   * @throws InvalidDirectionError 허용되지 않은 방향
   */
  handleInput(raw: unknown): void {
    this.input.push(raw);
  }

  /** 한 틱 진행. 게임 오버 상태에서는 아무것도 바꾸지 않는다. */
  tick(): RenderSnapshot {
    if (this.session.gameOver) return this.snapshot();

    this.session.tick += 1;
    if (this.clock instanceof TickClock) this.clock.advance();
    const now = this.clock.now();

    const intent = this.input.take();
    if (intent !== null) this.player.handleInput(intent);
    this.player.update();

    for (const adversary of this.adversaries) {
      adversary.update(now);
    }

    this.updatePowerMode(now);
    this.resolveConsumption(now);
    this.resolveCollisions(now);
    this.checkWin();

    return this.snapshot();
  }

  /** 전체 재시작: 점수, 목숨, 펠릿, 액터 위치 초기화 */
  restartGame(): void {
    this.maze = this.createMaze();
    this.player = this.createPlayer();
    this.adversaries = this.createAdversaries();
    this.session = this.createSession();
    this.input.clear();
    logger.info({ lives: this.session.lives }, 'Game restarted');
  }

  getState(): Readonly<GameSession> {
    return { ...this.session };
  }

  getMaze(): Maze {
    return this.maze;
  }

  getPlayer(): Player {
    return this.player;
  }

  getAdversaries(): readonly Adversary[] {
    return this.adversaries;
  }

  isPowerActive(): boolean {
    return this.session.powerExpiresAt !== null && this.clock.now() < this.session.powerExpiresAt;
  }

  powerRemainingMs(): number {
    if (this.session.powerExpiresAt === null) return 0;
    return Math.max(0, this.session.powerExpiresAt - this.clock.now());
  }

  /** 렌더러용 읽기 전용 스냅샷 */
  snapshot(): RenderSnapshot {
    const playerPos = this.player.position;
    return {
      tick: this.session.tick,
      width: this.maze.width,
      height: this.maze.height,
      tileSize: this.config.tileSize,
      walls: this.maze.wallGrid(),
      pellets: this.maze.pelletCells(),
      powerPellets: this.maze.powerPelletCells(),
      player: {
        x: playerPos.x,
        y: playerPos.y,
        radius: this.player.radius,
        color: PLAYER_COLOR,
        direction: this.player.direction,
      },
      adversaries: this.adversaries.map((adversary) => {
        const mode = adversary.mode;
        const color = mode === 'dead' ? DEAD_COLOR : mode === 'frightened' ? FRIGHTENED_COLOR : adversary.color;
        return {
          id: adversary.id,
          x: adversary.position.x,
          y: adversary.position.y,
          radius: adversary.radius,
          color,
          direction: adversary.direction,
          mode,
          respawnCell: adversary.respawnCell,
        };
      }),
      score: this.session.score,
      lives: this.session.lives,
      powerActive: this.isPowerActive(),
      powerRemainingMs: this.powerRemainingMs(),
      win: this.session.win,
      gameOver: this.session.gameOver,
    };
  }

  /** 만료 시 모든 적의 frightened를 같은 틱에 해제 */
  private updatePowerMode(now: number): void {
    const expiresAt = this.session.powerExpiresAt;
    if (expiresAt === null || now < expiresAt) return;

    this.session.powerExpiresAt = null;
    for (const adversary of this.adversaries) {
      adversary.calm();
    }
    logger.debug({ tick: this.session.tick }, 'Power mode ended');
  }

  private resolveConsumption(now: number): void {
    const result = this.maze.consume(this.player.currentCell());
    if (result.kind === 'none') return;

    this.session.score += result.points;
    if (result.kind === 'power') {
      this.session.powerExpiresAt = now + this.config.powerDurationMs;
      for (const adversary of this.adversaries) {
        adversary.frighten();
      }
      logger.debug({ tick: this.session.tick, expiresAt: this.session.powerExpiresAt }, 'Power mode started');
    }
  }

  private resolveCollisions(now: number): void {
    const playerPos = this.player.position;

    for (const adversary of this.adversaries) {
      if (!adversary.isAlive) continue;
      if (distance(playerPos, adversary.position) >= this.config.collisionDistance) continue;

      if (adversary.kill(now)) {
        this.session.score += this.config.adversaryEatScore;
        logger.debug({ tick: this.session.tick, adversary: adversary.id }, 'Adversary eaten');
        continue;
      }

      this.session.lives = Math.max(0, this.session.lives - 1);
      logger.info({ tick: this.session.tick, adversary: adversary.id, lives: this.session.lives }, 'Life lost');

      if (this.session.lives === 0) {
        this.session.gameOver = true;
        logger.info({ tick: this.session.tick, score: this.session.score }, 'Game over');
      } else {
        this.resetRound();
      }
      return;
    }
  }

  private checkWin(): void {
    if (this.maze.remainingCount() > 0) return;
    this.session.win = true;
    this.session.gameOver = true;
    logger.info({ tick: this.session.tick, score: this.session.score }, 'All pellets cleared');
  }

  /** 라운드 리셋: 위치만 초기화, 점수/펠릿 유지, 대기 중인 부활 취소 */
  private resetRound(): void {
    this.player.reset();
    for (const adversary of this.adversaries) {
      adversary.reset();
    }
    this.session.powerExpiresAt = null;
    this.input.clear();
    logger.debug({ tick: this.session.tick }, 'Round reset');
  }

  private createMaze(): Maze {
    return new Maze(this.definition, {
      pelletScore: this.config.pelletScore,
      powerPelletScore: this.config.powerPelletScore,
    });
  }

  private createPlayer(): Player {
    return new Player(this.maze, this.definition.playerSpawn, this.config.playerSpeed, this.geometry);
  }

  private createAdversaries(): Adversary[] {
    return this.definition.adversaries.map(
      (spawn) =>
        new Adversary(this.maze, spawn, {
          speed: this.config.adversarySpeed,
          respawnDelayMs: this.config.respawnDelayMs,
          geometry: this.geometry,
          random: this.random,
        }),
    );
  }

  private createSession(): GameSession {
    return {
      tick: 0,
      score: 0,
      lives: this.config.startingLives,
      powerExpiresAt: null,
      win: false,
      gameOver: false,
    };
  }
}

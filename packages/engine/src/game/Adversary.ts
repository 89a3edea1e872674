import type { AdversaryMode, AdversarySpawn, Cell, Direction } from '@maze-chase/shared';
import { MOVE_DIRECTIONS } from '@maze-chase/shared';
import { Actor } from './Actor.js';
import type { ActorGeometry } from './Actor.js';
import type { Maze } from './Maze.js';
import { opposite, sameCell, stepCell } from './motion.js';
import { pick } from './random.js';
import type { RandomSource } from './random.js';

/** 적 생성 옵션 */
export interface AdversaryOptions {
  readonly speed: number;
  readonly respawnDelayMs: number;
  readonly geometry: ActorGeometry;
  readonly random: RandomSource;
}

/**
 * 적 에이전트
 *
 * 상태 전이: normal ⇄ frightened → dead → normal
 * 이동은 무작위 보행이다. 셀 중앙마다 열린 방향 중 역방향을 제외하고 균등 선택하며,
 * 막다른 길에서만 역방향을 허용한다. frightened 여부는 이동 정책에 영향을 주지 않는다.
 */
export class Adversary extends Actor {
  readonly id: string;
  readonly color: string;
  readonly respawnCell: Cell;

  private readonly random: RandomSource;
  private readonly respawnDelayMs: number;

  private alive = true;
  private frightened = false;
  /** 부활 시각 (ms). 대기 중이 아니면 null */
  private respawnAt: number | null = null;

  constructor(maze: Maze, spawn: AdversarySpawn, options: AdversaryOptions) {
    super(maze, spawn.cell, options.speed, options.geometry);
    this.id = spawn.id;
    this.color = spawn.color;
    this.respawnCell = spawn.cell;
    this.random = options.random;
    this.respawnDelayMs = options.respawnDelayMs;
    this.dir = this.randomDirection();
  }

  get isAlive(): boolean {
    return this.alive;
  }

  get isFrightened(): boolean {
    return this.frightened;
  }

  get respawnDeadline(): number | null {
    return this.respawnAt;
  }

  get mode(): AdversaryMode {
    if (!this.alive) return 'dead';
    return this.frightened ? 'frightened' : 'normal';
  }

  /** 파워 펠릿 소비 시 (살아 있는 적만) */
  frighten(): void {
    if (this.alive) this.frightened = true;
  }

  calm(): void {
    this.frightened = false;
  }

  /**
   * 플레이어에게 먹힘
   * @returns frightened 상태가 아니었으면 false (상태 변화 없음)
   */
  kill(now: number): boolean {
    if (!this.alive || !this.frightened) return false;
    this.alive = false;
    this.frightened = false;
    this.respawnAt = now + this.respawnDelayMs;
    return true;
  }

  /**
   * 틱 처리
   * 죽어 있으면 부활 시각만 확인하고 이동하지 않는다.
   */
  update(now: number): void {
    if (!this.alive) {
      if (this.respawnAt !== null && now >= this.respawnAt) {
        this.reset();
      }
      return;
    }
    this.advance();
  }

  /** 스폰 셀로 복귀, 방향 재추첨, 부활 대기 취소 */
  reset(): void {
    this.placeAt(this.respawnCell);
    this.dir = this.randomDirection();
    this.alive = true;
    this.frightened = false;
    this.respawnAt = null;
  }

  /** 현재 셀에서 선택 가능한 방향 (역방향은 유일한 출구일 때만) */
  availableDirections(): Direction[] {
    const cell = this.currentCell();
    const neighbors = this.maze.openNeighbors(cell);
    const open = MOVE_DIRECTIONS.filter((direction) =>
      neighbors.some((neighbor) => sameCell(neighbor, stepCell(cell, direction))),
    );
    if (open.length <= 1) return open;
    const reverse = opposite(this.dir);
    const forward = open.filter((direction) => direction !== reverse);
    return forward.length > 0 ? forward : open;
  }

  protected onCentered(): void {
    this.dir = pick(this.random, this.availableDirections()) ?? 'stop';
  }

  private randomDirection(): Direction {
    return pick(this.random, MOVE_DIRECTIONS) ?? 'stop';
  }
}

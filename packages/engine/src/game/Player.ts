import type { Cell, Direction } from '@maze-chase/shared';
import { Actor } from './Actor.js';
import type { ActorGeometry } from './Actor.js';
import type { Maze } from './Maze.js';

/**
 * 플레이어 에이전트
 *
 * 입력은 대기 방향으로 버퍼링되고, 셀 중앙에서 해당 방향이 열려 있을 때 확정된다.
 * 교차로에 도착하기 전에 미리 입력해 두는 것을 허용한다.
 */
export class Player extends Actor {
  private readonly spawn: Cell;
  private pending: Direction = 'stop';

  constructor(maze: Maze, spawn: Cell, speed: number, geometry: ActorGeometry) {
    super(maze, spawn, speed, geometry);
    this.spawn = spawn;
  }

  get pendingDirection(): Direction {
    return this.pending;
  }

  /** 대기 방향 설정 (즉시 이동에는 영향 없음) */
  handleInput(direction: Direction): void {
    this.pending = direction;
  }

  update(): void {
    this.advance();
  }

  /** 스폰 위치로 복귀, 정지 상태 */
  reset(): void {
    this.placeAt(this.spawn);
    this.dir = 'stop';
    this.pending = 'stop';
  }

  protected onCentered(): void {
    if (this.pending === this.dir) return;
    if (this.pending === 'stop' || this.canEnter(this.pending)) {
      this.dir = this.pending;
    }
  }
}

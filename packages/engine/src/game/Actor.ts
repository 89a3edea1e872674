import type { Cell, Direction, Position } from '@maze-chase/shared';
import { DIRECTION_VECTORS } from '@maze-chase/shared';
import type { Maze } from './Maze.js';
import { cellToWorld, distanceToNextCenter, isCentered, sameCell, stepCell, worldToCell } from './motion.js';

/** 한 번에 이동하는 최대 거리 (픽셀) */
const MAX_SUB_STEP = 1;

/** 남은 이동량이 이보다 작으면 무시 */
const STEP_EPSILON = 1e-9;

/** 액터 기하 설정 */
export interface ActorGeometry {
  readonly tileSize: number;
  readonly centerTolerance: number;
  readonly radius: number;
}

/**
 * 그리드 위를 연속 좌표로 움직이는 액터
 *
 * 방향 전환은 셀 중앙에서만 일어난다. 하위 클래스는 `onCentered()`에서
 * 방향을 결정하며, 이 훅은 셀 하나를 지날 때 최대 한 번 호출된다.
 */
export abstract class Actor {
  protected readonly maze: Maze;
  protected readonly geometry: ActorGeometry;

  speed: number;
  protected pos: Position;
  protected dir: Direction = 'stop';

  /** 마지막으로 방향을 결정한 셀. 막혀서 멈추면 비운다. */
  private decidedAt: Cell | null = null;

  constructor(maze: Maze, cell: Cell, speed: number, geometry: ActorGeometry) {
    this.maze = maze;
    this.geometry = geometry;
    this.speed = speed;
    this.pos = cellToWorld(cell, geometry.tileSize);
  }

  get position(): Position {
    return this.pos;
  }

  get direction(): Direction {
    return this.dir;
  }

  get radius(): number {
    return this.geometry.radius;
  }

  currentCell(): Cell {
    return worldToCell(this.pos, this.geometry.tileSize);
  }

  isCentered(): boolean {
    return isCentered(this.pos, this.geometry.centerTolerance, this.geometry.tileSize);
  }

  /** 현재 셀 기준 해당 방향 셀이 열려 있는지 */
  canEnter(direction: Direction): boolean {
    if (direction === 'stop') return false;
    return !this.maze.isWall(stepCell(this.currentCell(), direction));
  }

  /** 셀 중앙으로 즉시 이동 (스폰, 리셋용) */
  protected placeAt(cell: Cell): void {
    this.pos = cellToWorld(cell, this.geometry.tileSize);
    this.decidedAt = null;
  }

  /** 셀 중앙에 도달했을 때 방향 결정 */
  protected abstract onCentered(): void;

  /**
   * 벽 제약 이동
   *
   * `speed`만큼을 1픽셀 이하의 하위 스텝으로 나눠 이동한다. 하위 스텝은 셀 중앙을
   * 넘지 않도록 잘리므로 중앙 상태를 건너뛰지 않는다.
   * 각 스텝 전에 (a) 중앙이면 앞 셀이 벽인지, (b) 다음 픽셀 위치의 셀이 벽인지 확인한다.
   */
  protected advance(): void {
    let budget = this.speed;

    while (budget > STEP_EPSILON) {
      if (this.isCentered()) {
        const cell = this.currentCell();
        if (this.decidedAt === null || !sameCell(this.decidedAt, cell)) {
          this.pos = cellToWorld(cell, this.geometry.tileSize);
          this.onCentered();
          this.decidedAt = cell;
        }
        if (this.dir === 'stop' || !this.canEnter(this.dir)) {
          this.decidedAt = null;
          return;
        }
      }
      if (this.dir === 'stop') return;

      const toCenter = distanceToNextCenter(this.pos, this.dir, this.geometry.tileSize);
      const step = Math.min(MAX_SUB_STEP, budget, toCenter);
      const { dx, dy } = DIRECTION_VECTORS[this.dir];
      const next: Position = { x: this.pos.x + dx * step, y: this.pos.y + dy * step };
      const nextCell = worldToCell(next, this.geometry.tileSize);

      if (this.maze.isWall(nextCell)) {
        this.decidedAt = null;
        return;
      }

      // 중앙 도달 스텝은 부동소수 오차 없이 중앙에 맞춘다
      this.pos = step === toCenter ? cellToWorld(nextCell, this.geometry.tileSize) : next;
      budget -= step;
    }
  }
}

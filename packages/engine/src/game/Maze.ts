import type { Cell, ConsumeResult, MazeDefinition } from '@maze-chase/shared';
import { InvalidLayoutError, MOVE_DIRECTIONS, PELLET_SCORE, POWER_PELLET_SCORE } from '@maze-chase/shared';
import { cellKey, stepCell } from './motion.js';

/** 펠릿 점수 설정 */
export interface MazeScoring {
  readonly pelletScore: number;
  readonly powerPelletScore: number;
}

const DEFAULT_SCORING: MazeScoring = {
  pelletScore: PELLET_SCORE,
  powerPelletScore: POWER_PELLET_SCORE,
};

const NO_CONSUME: ConsumeResult = { kind: 'none', points: 0 };

/**
 * 미로 그리드 모델
 *
 * 벽 배치는 생성 후 변하지 않으며, 펠릿/파워 펠릿 집합만 소비에 따라 줄어든다.
 * 라운드 리셋으로는 펠릿이 복구되지 않는다. 게임 재시작 시 새 인스턴스를 만든다.
 */
export class Maze {
  readonly width: number;
  readonly height: number;

  private readonly walls: readonly (readonly boolean[])[];
  private readonly pellets = new Map<string, Cell>();
  private readonly powerPellets = new Map<string, Cell>();
  private readonly scoring: MazeScoring;

  constructor(definition: MazeDefinition, scoring: MazeScoring = DEFAULT_SCORING) {
    const { rows } = definition;
    const firstRow = rows[0];
    if (firstRow === undefined || firstRow.length === 0) {
      throw new InvalidLayoutError('Maze layout must have at least one non-empty row');
    }

    this.width = firstRow.length;
    this.height = rows.length;
    this.scoring = scoring;

    const walls: boolean[][] = [];
    rows.forEach((line, row) => {
      if (line.length !== this.width) {
        throw new InvalidLayoutError(
          `Row ${String(row)} has length ${String(line.length)}, expected ${String(this.width)}`,
        );
      }
      const wallRow: boolean[] = [];
      [...line].forEach((char, col) => {
        const cell: Cell = { col, row };
        switch (char) {
          case '#':
            wallRow.push(true);
            break;
          case '.':
            wallRow.push(false);
            this.pellets.set(cellKey(cell), cell);
            break;
          case 'o':
            wallRow.push(false);
            this.powerPellets.set(cellKey(cell), cell);
            break;
          case ' ':
            wallRow.push(false);
            break;
          default:
            throw new InvalidLayoutError(
              `Unknown layout character "${char}" at (${String(col)}, ${String(row)})`,
            );
        }
      });
      walls.push(wallRow);
    });
    this.walls = walls;

    const spawns: readonly { readonly name: string; readonly cell: Cell }[] = [
      { name: 'player', cell: definition.playerSpawn },
      ...definition.adversaries.map((spawn) => ({ name: spawn.id, cell: spawn.cell })),
    ];
    for (const spawn of spawns) {
      if (this.isWall(spawn.cell)) {
        throw new InvalidLayoutError(
          `Spawn "${spawn.name}" at (${String(spawn.cell.col)}, ${String(spawn.cell.row)}) is not an open cell`,
        );
      }
    }

    if (this.remainingCount() === 0) {
      throw new InvalidLayoutError('Maze layout has no pellets');
    }
  }

  /** 범위 체크 */
  inBounds(cell: Cell): boolean {
    return cell.row >= 0 && cell.row < this.height && cell.col >= 0 && cell.col < this.width;
  }

  /** 범위 밖은 벽으로 취급 (래핑 없음) */
  isWall(cell: Cell): boolean {
    if (!this.inBounds(cell)) return true;
    return this.walls[cell.row]?.[cell.col] ?? true;
  }

  hasPellet(cell: Cell): boolean {
    return this.pellets.has(cellKey(cell));
  }

  hasPowerPellet(cell: Cell): boolean {
    return this.powerPellets.has(cellKey(cell));
  }

  /**
   * 셀의 펠릿을 소비한다.
   * 이미 비어 있는 셀은 몇 번을 호출해도 0점을 반환한다.
   */
  consume(cell: Cell): ConsumeResult {
    const key = cellKey(cell);
    if (this.pellets.delete(key)) {
      return { kind: 'pellet', points: this.scoring.pelletScore };
    }
    if (this.powerPellets.delete(key)) {
      return { kind: 'power', points: this.scoring.powerPelletScore };
    }
    return NO_CONSUME;
  }

  /** 남은 펠릿 + 파워 펠릿 수 */
  remainingCount(): number {
    return this.pellets.size + this.powerPellets.size;
  }

  /** 벽이 아닌 상하좌우 이웃 셀 */
  openNeighbors(cell: Cell): Cell[] {
    return MOVE_DIRECTIONS.map((direction) => stepCell(cell, direction)).filter(
      (neighbor) => !this.isWall(neighbor),
    );
  }

  pelletCells(): Cell[] {
    return Array.from(this.pellets.values());
  }

  powerPelletCells(): Cell[] {
    return Array.from(this.powerPellets.values());
  }

  /** 벽 그리드 복사본 (행 우선) */
  wallGrid(): boolean[][] {
    return this.walls.map((row) => [...row]);
  }
}

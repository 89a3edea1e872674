import type { Cell, Direction, Position } from '@maze-chase/shared';
import { CENTER_TOLERANCE, DIRECTION_VECTORS, OPPOSITE_DIRECTIONS, TILE_SIZE } from '@maze-chase/shared';

/**
 * 셀 좌표 → 셀 중앙의 월드 좌표
 */
export function cellToWorld(cell: Cell, tileSize: number = TILE_SIZE): Position {
  return {
    x: cell.col * tileSize + tileSize / 2,
    y: cell.row * tileSize + tileSize / 2,
  };
}

/**
 * 월드 좌표 → 셀 좌표 (floor)
 */
export function worldToCell(pos: Position, tileSize: number = TILE_SIZE): Cell {
  return {
    col: Math.floor(pos.x / tileSize),
    row: Math.floor(pos.y / tileSize),
  };
}

/**
 * 좌표가 포함된 셀 중앙에서 얼마나 떨어져 있는지 (축별, 부호 포함)
 */
export function centerOffset(pos: Position, tileSize: number = TILE_SIZE): Position {
  const center = cellToWorld(worldToCell(pos, tileSize), tileSize);
  return { x: pos.x - center.x, y: pos.y - center.y };
}

/**
 * 두 축 모두 셀 중앙에서 허용 오차 이내인지
 */
export function isCentered(
  pos: Position,
  tolerance: number = CENTER_TOLERANCE,
  tileSize: number = TILE_SIZE,
): boolean {
  const offset = centerOffset(pos, tileSize);
  return Math.abs(offset.x) < tolerance && Math.abs(offset.y) < tolerance;
}

/** 해당 방향으로 한 칸 이동한 셀 */
export function stepCell(cell: Cell, direction: Direction): Cell {
  const { dx, dy } = DIRECTION_VECTORS[direction];
  return { col: cell.col + dx, row: cell.row + dy };
}

export function opposite(direction: Direction): Direction {
  return OPPOSITE_DIRECTIONS[direction];
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.col === b.col && a.row === b.row;
}

/** 셀을 Set/Map 키로 변환 */
export function cellKey(cell: Cell): string {
  return `${String(cell.col)},${String(cell.row)}`;
}

/**
 * 이동 방향을 따라 다음 셀 중앙까지의 거리
 * 이미 중앙에 있으면 한 타일 거리를 반환한다. stop이면 Infinity.
 */
export function distanceToNextCenter(
  pos: Position,
  direction: Direction,
  tileSize: number = TILE_SIZE,
): number {
  const { dx, dy } = DIRECTION_VECTORS[direction];
  if (dx === 0 && dy === 0) return Infinity;

  const offset = centerOffset(pos, tileSize);
  // 진행 방향 기준 오프셋 (양수면 중앙을 이미 지남)
  const along = dx !== 0 ? offset.x * dx : offset.y * dy;
  return along < 0 ? -along : tileSize - along;
}

/** 유클리드 거리 */
export function distance(a: Position, b: Position): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

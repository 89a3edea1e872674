import type { Direction, MazeDefinition, MoveDirection } from './types.js';

/** 타일 한 변 크기 (픽셀) */
export const TILE_SIZE = 64;

/** 기본 틱 레이트 (초당 틱 수) */
export const TICK_RATE = 60;

/** 플레이어 속도 (틱당 픽셀) */
export const PLAYER_SPEED = 3.0;

/** 적 속도 (틱당 픽셀) */
export const ADVERSARY_SPEED = 2.6;

/** 파워 모드 지속 시간 (ms) */
export const POWER_DURATION_MS = 6000;

/** 먹힌 적의 부활 대기 시간 (ms) */
export const RESPAWN_DELAY_MS = 1500;

export const PELLET_SCORE = 10;
export const POWER_PELLET_SCORE = 50;
export const ADVERSARY_EAT_SCORE = 200;

export const STARTING_LIVES = 3;

/** 셀 중앙 판정 허용 오차 (픽셀) */
export const CENTER_TOLERANCE = 0.5;

/** 액터 반지름 비율 (타일 대비) */
export const ACTOR_RADIUS_RATIO = 0.35;

/** 충돌 판정 거리 비율 (타일 대비) */
export const COLLISION_DISTANCE_RATIO = 0.6;

export const PLAYER_COLOR = '#ffd200';
export const FRIGHTENED_COLOR = '#0064ff';
export const DEAD_COLOR = '#ffffff';

/** 방향별 단위 벡터 */
export const DIRECTION_VECTORS: Readonly<Record<Direction, { readonly dx: number; readonly dy: number }>> = {
  up: { dx: 0, dy: -1 },
  down: { dx: 0, dy: 1 },
  left: { dx: -1, dy: 0 },
  right: { dx: 1, dy: 0 },
  stop: { dx: 0, dy: 0 },
};

/** 이웃 탐색 순서 */
export const MOVE_DIRECTIONS: readonly MoveDirection[] = ['up', 'down', 'left', 'right'];

/** 반대 방향 */
export const OPPOSITE_DIRECTIONS: Readonly<Record<Direction, Direction>> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
  stop: 'stop',
};

/** 기본 7x7 클래식 미로 */
export const CLASSIC_MAZE: MazeDefinition = {
  rows: [
    '#######',
    '#..o..#',
    '#.###.#',
    '#.....#',
    '#o###o#',
    '#.....#',
    '#######',
  ],
  playerSpawn: { col: 3, row: 3 },
  adversaries: [
    { id: 'pinky', cell: { col: 3, row: 1 }, color: '#ff69b4' },
    { id: 'inky', cell: { col: 3, row: 5 }, color: '#00ffff' },
  ],
};

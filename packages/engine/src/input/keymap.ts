import type { MoveDirection } from '@maze-chase/shared';

/** 방향키와 WASD */
const KEY_DIRECTIONS: Readonly<Record<string, MoveDirection>> = {
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
  w: 'up',
  s: 'down',
  a: 'left',
  d: 'right',
};

/** 터미널 키 이름 → 이동 방향 */
export function keyToDirection(name: string | undefined): MoveDirection | null {
  if (name === undefined) return null;
  return KEY_DIRECTIONS[name.toLowerCase()] ?? null;
}

/** 게임 종료 키 */
export function isQuitKey(name: string | undefined, ctrl = false): boolean {
  if (name === 'escape' || name === 'q') return true;
  return ctrl && name === 'c';
}

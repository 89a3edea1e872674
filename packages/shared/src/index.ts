/** Maze Chase 공유 모듈 진입점 */
export * from './types.js';
export * from './constants.js';
export * from './errors.js';
export * from './schemas.js';

export type {
  Direction,
  MoveDirection,
  Cell,
  Position,
  MazeDefinition,
  RenderSnapshot,
  AdversaryView,
  PlayerView,
} from './types.js';

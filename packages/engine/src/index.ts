/**
 * @maze-chase/engine
 * 그리드 미로 추격 게임의 이동/충돌/상태 전이 엔진
 *
 * @example
 * ```typescript
 * import { RoundController, SeededRandom } from '@maze-chase/engine';
 *
 * const game = new RoundController({ random: new SeededRandom(42) });
 * game.handleInput('left');
 * const snapshot = game.tick();
 * ```
 */

export { Maze } from './game/Maze.js';
export { Actor } from './game/Actor.js';
export { Player } from './game/Player.js';
export { Adversary } from './game/Adversary.js';
export { RoundController } from './game/RoundController.js';
export { GameLoopManager } from './game/GameLoopManager.js';
export { InputQueue } from './game/InputQueue.js';
export { TickClock, ManualClock, SystemClock } from './game/clock.js';
export { SeededRandom, MathRandom, pick } from './game/random.js';
export {
  cellToWorld,
  worldToCell,
  isCentered,
  centerOffset,
  stepCell,
  opposite,
  sameCell,
  cellKey,
  distanceToNextCenter,
  distance,
} from './game/motion.js';
export { TextRenderer, renderLines, hudLine, GLYPHS } from './render/TextRenderer.js';
export { TerminalRenderer, colorizeRow } from './render/TerminalRenderer.js';
export { keyToDirection, isQuitKey } from './input/keymap.js';
export { loadEnv } from './config.js';

export type { MazeScoring } from './game/Maze.js';
export type { ActorGeometry } from './game/Actor.js';
export type { AdversaryOptions } from './game/Adversary.js';
export type { RoundControllerOptions, GameSession } from './game/RoundController.js';
export type { SessionConfig, GameOverCallback } from './game/GameLoopManager.js';
export type { Clock } from './game/clock.js';
export type { RandomSource } from './game/random.js';
export type { Renderer } from './render/Renderer.js';
export type { Env } from './config.js';

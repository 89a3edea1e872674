import type { MazeDefinition } from '@maze-chase/shared';
import type { ActorGeometry } from '../Actor.js';
import type { RandomSource } from '../random.js';

/** 주어진 값을 순환 반환하는 난수 소스 */
export class ScriptedRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {}

  next(): number {
    const value = this.values[this.index % this.values.length] ?? 0;
    this.index += 1;
    return value;
  }
}

export const TEST_GEOMETRY: ActorGeometry = {
  tileSize: 64,
  centerTolerance: 0.5,
  radius: 22.4,
};

/** 테스트용 미로 정의 생성 */
export function createDefinition(
  rows: readonly string[],
  playerSpawn: { col: number; row: number },
  adversaries: MazeDefinition['adversaries'] = [],
): MazeDefinition {
  return { rows, playerSpawn, adversaries };
}

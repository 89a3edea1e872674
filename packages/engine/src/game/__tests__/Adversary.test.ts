import { describe, it, expect } from 'vitest';
import type { AdversarySpawn, MazeDefinition } from '@maze-chase/shared';
import { Adversary } from '../Adversary.js';
import { Maze } from '../Maze.js';
import type { RandomSource } from '../random.js';
import { createDefinition, ScriptedRandom, TEST_GEOMETRY } from './fixtures.js';

/** 십자 교차로 (2,2) */
const CROSS = createDefinition(['#####', '##.##', '#...#', '##.##', '#####'], { col: 2, row: 1 });

/** 막다른 통로 (1,1) ~ (3,1) */
const DEAD_END = createDefinition(['#####', '#...#', '#####'], { col: 3, row: 1 });

function createAdversary(
  definition: MazeDefinition,
  cell: { col: number; row: number },
  random: RandomSource,
): Adversary {
  const spawn: AdversarySpawn = { id: 'pinky', cell, color: '#ff69b4' };
  return new Adversary(new Maze(definition), spawn, {
    speed: 2.6,
    respawnDelayMs: 1500,
    geometry: TEST_GEOMETRY,
    random,
  });
}

describe('Adversary', () => {
  describe('방향 선택', () => {
    it('생성 시 무작위 방향', () => {
      // 0.5 → MOVE_DIRECTIONS[2] = left
      const adversary = createAdversary(CROSS, { col: 2, row: 2 }, new ScriptedRandom([0.5]));
      expect(adversary.direction).toBe('left');
      expect(adversary.mode).toBe('normal');
    });

    it('교차로에서 역방향 제외', () => {
      // 첫 값 0 → up, 역방향 down 제외
      const adversary = createAdversary(CROSS, { col: 2, row: 2 }, new ScriptedRandom([0]));
      expect(adversary.availableDirections()).toEqual(['up', 'left', 'right']);
    });

    it('후보 중 균등 선택', () => {
      // up으로 시작, [up, left, right] 중 0.5 → left
      const adversary = createAdversary(CROSS, { col: 2, row: 2 }, new ScriptedRandom([0, 0.5]));
      adversary.update(0);
      expect(adversary.direction).toBe('left');
      expect(adversary.position.x).toBeCloseTo(157.4, 9);
      expect(adversary.position.y).toBe(160);
    });

    it('막다른 길에서는 역방향 허용', () => {
      // 0.99 → right, (3,1)에서 열린 방향은 left뿐
      const adversary = createAdversary(DEAD_END, { col: 3, row: 1 }, new ScriptedRandom([0.99]));
      expect(adversary.direction).toBe('right');
      expect(adversary.availableDirections()).toEqual(['left']);
      adversary.update(0);
      expect(adversary.direction).toBe('left');
    });

    it('셀 사이에서는 방향을 바꾸지 않는다', () => {
      const adversary = createAdversary(CROSS, { col: 2, row: 2 }, new ScriptedRandom([0, 0.5, 0.99]));
      adversary.update(0);
      adversary.update(0);
      expect(adversary.direction).toBe('left');
      expect(adversary.position.x).toBeCloseTo(154.8, 9);
    });
  });

  describe('상태 전이', () => {
    it('frighten → kill → 부활', () => {
      const adversary = createAdversary(CROSS, { col: 2, row: 2 }, new ScriptedRandom([0]));
      adversary.frighten();
      expect(adversary.mode).toBe('frightened');

      expect(adversary.kill(1000)).toBe(true);
      expect(adversary.mode).toBe('dead');
      expect(adversary.isFrightened).toBe(false);
      expect(adversary.respawnDeadline).toBe(2500);
    });

    it('frightened가 아니면 kill 실패', () => {
      const adversary = createAdversary(CROSS, { col: 2, row: 2 }, new ScriptedRandom([0]));
      expect(adversary.kill(1000)).toBe(false);
      expect(adversary.mode).toBe('normal');
      expect(adversary.respawnDeadline).toBeNull();
    });

    it('죽은 적은 frighten되지 않고 움직이지 않는다', () => {
      const adversary = createAdversary(CROSS, { col: 2, row: 2 }, new ScriptedRandom([0]));
      adversary.frighten();
      adversary.kill(0);
      adversary.frighten();
      expect(adversary.mode).toBe('dead');

      adversary.update(1000);
      expect(adversary.position).toEqual({ x: 160, y: 160 });
      expect(adversary.mode).toBe('dead');
    });

    it('부활 시각에 스폰 셀에서 normal로 복귀', () => {
      const adversary = createAdversary(CROSS, { col: 2, row: 2 }, new ScriptedRandom([0, 0.5]));
      adversary.update(0);
      adversary.frighten();
      adversary.kill(100);

      adversary.update(1599);
      expect(adversary.mode).toBe('dead');

      adversary.update(1600);
      expect(adversary.mode).toBe('normal');
      expect(adversary.position).toEqual({ x: 160, y: 160 });
      expect(adversary.respawnDeadline).toBeNull();
    });

    it('reset은 대기 중인 부활을 취소한다', () => {
      const adversary = createAdversary(CROSS, { col: 2, row: 2 }, new ScriptedRandom([0]));
      adversary.frighten();
      adversary.kill(0);
      adversary.reset();
      expect(adversary.mode).toBe('normal');
      expect(adversary.respawnDeadline).toBeNull();

      // 지난 부활 시각이 와도 살아 있는 적에게는 아무 일도 없다
      adversary.update(5000);
      expect(adversary.mode).toBe('normal');
    });

    it('calm은 frightened만 해제', () => {
      const adversary = createAdversary(CROSS, { col: 2, row: 2 }, new ScriptedRandom([0]));
      adversary.frighten();
      adversary.calm();
      expect(adversary.mode).toBe('normal');
      expect(adversary.isAlive).toBe(true);
    });
  });
});

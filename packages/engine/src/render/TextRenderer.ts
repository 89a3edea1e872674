import type { RenderSnapshot } from '@maze-chase/shared';
import type { Renderer } from './Renderer.js';

/** 문자 팔레트 */
export const GLYPHS = {
  wall: '#',
  pellet: '.',
  powerPellet: 'o',
  floor: ' ',
  player: 'C',
  adversary: 'M',
  frightened: 'W',
  deadMarker: '"',
} as const;

/**
 * 스냅샷을 텍스트 줄로 변환
 *
 * 첫 줄은 HUD, 이어서 미로 행. 게임 오버 시 액터 대신 종료 배너를 붙인다.
 */
export function renderLines(snapshot: RenderSnapshot): string[] {
  const grid: string[][] = snapshot.walls.map((row) =>
    row.map((isWall) => (isWall ? GLYPHS.wall : GLYPHS.floor)),
  );

  const put = (col: number, row: number, glyph: string): void => {
    const line = grid[row];
    if (line === undefined || col < 0 || col >= line.length) return;
    line[col] = glyph;
  };

  for (const cell of snapshot.pellets) put(cell.col, cell.row, GLYPHS.pellet);
  for (const cell of snapshot.powerPellets) put(cell.col, cell.row, GLYPHS.powerPellet);

  if (!snapshot.gameOver) {
    const toCell = (value: number): number => Math.floor(value / snapshot.tileSize);
    for (const adversary of snapshot.adversaries) {
      if (adversary.mode === 'dead') {
        put(adversary.respawnCell.col, adversary.respawnCell.row, GLYPHS.deadMarker);
      } else {
        put(
          toCell(adversary.x),
          toCell(adversary.y),
          adversary.mode === 'frightened' ? GLYPHS.frightened : GLYPHS.adversary,
        );
      }
    }
    put(toCell(snapshot.player.x), toCell(snapshot.player.y), GLYPHS.player);
  }

  const lines = [hudLine(snapshot), ...grid.map((row) => row.join(''))];
  if (snapshot.gameOver) {
    lines.push(snapshot.win ? 'YOU WIN!' : 'GAME OVER');
    lines.push('Press R to Restart or Q to Quit');
  }
  return lines;
}

/** 점수/목숨/파워 남은 시간 */
export function hudLine(snapshot: RenderSnapshot): string {
  const parts = [`Score: ${String(snapshot.score)}`, `Lives: ${String(snapshot.lives)}`];
  if (snapshot.powerActive) {
    parts.push(`Power: ${String(Math.floor(snapshot.powerRemainingMs / 1000))}s`);
  }
  return parts.join('  ');
}

/** 마지막 프레임을 보관하는 렌더러 (헤드리스 실행, 테스트용) */
export class TextRenderer implements Renderer {
  private frames = 0;
  private last: string[] = [];

  render(snapshot: RenderSnapshot): void {
    this.last = renderLines(snapshot);
    this.frames += 1;
  }

  get frameCount(): number {
    return this.frames;
  }

  lastFrame(): string[] {
    return [...this.last];
  }
}

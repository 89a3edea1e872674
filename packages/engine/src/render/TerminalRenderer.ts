import type { RenderSnapshot } from '@maze-chase/shared';
import pc from 'picocolors';
import type { Renderer } from './Renderer.js';
import { GLYPHS, renderLines } from './TextRenderer.js';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

const COLORS: Readonly<Record<string, (text: string) => string>> = {
  [GLYPHS.wall]: pc.blue,
  [GLYPHS.pellet]: pc.white,
  [GLYPHS.powerPellet]: pc.red,
  [GLYPHS.player]: pc.yellow,
  [GLYPHS.adversary]: pc.magenta,
  [GLYPHS.frightened]: pc.cyan,
  [GLYPHS.deadMarker]: pc.gray,
};

/** 미로 행의 문자별 색상 적용 */
export function colorizeRow(row: string): string {
  return [...row].map((char) => COLORS[char]?.(char) ?? char).join('');
}

/** ANSI 터미널 렌더러 */
export class TerminalRenderer implements Renderer {
  constructor(private readonly output: NodeJS.WritableStream = process.stdout) {}

  render(snapshot: RenderSnapshot): void {
    const [hud = '', ...rest] = renderLines(snapshot);
    const maze = rest.slice(0, snapshot.height).map(colorizeRow);
    const banner = rest.slice(snapshot.height).map((line, index) =>
      index === 0 ? (snapshot.win ? pc.green(pc.bold(line)) : pc.red(pc.bold(line))) : line,
    );
    this.output.write(CLEAR_SCREEN + [pc.bold(hud), ...maze, ...banner].join('\n') + '\n');
  }
}

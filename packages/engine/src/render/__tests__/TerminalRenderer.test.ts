import { Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { RoundController } from '../../game/RoundController.js';
import { SeededRandom } from '../../game/random.js';
import { TerminalRenderer, colorizeRow } from '../TerminalRenderer.js';
import { renderLines } from '../TextRenderer.js';

const ANSI_PATTERN = /\x1b\[[0-9;]*[A-Za-z]/g;

function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

describe('TerminalRenderer', () => {
  it('화면을 지우고 텍스트 프레임을 쓴다', () => {
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(String(chunk));
        callback();
      },
    });

    const controller = new RoundController({ random: new SeededRandom(1) });
    new TerminalRenderer(output).render(controller.snapshot());

    const written = chunks.join('');
    expect(written.startsWith('\x1b[2J\x1b[H')).toBe(true);
    expect(stripAnsi(written)).toBe(renderLines(controller.snapshot()).join('\n') + '\n');
  });

  it('색상을 빼면 원래 행과 같다', () => {
    expect(stripAnsi(colorizeRow('#.oC"W M'))).toBe('#.oC"W M');
  });
});

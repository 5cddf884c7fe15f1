/**
 * Terminal renderer
 */

import stringWidth from 'string-width';
import type { Mutex } from './mutex.js';
import type { TerminalSession } from './terminal.js';
import type { View } from './types.js';

export type RenderTarget = Pick<TerminalSession, 'clearLines' | 'write' | 'columns'>;

/**
 * Rows above the last line of a frame: one per line break, plus the extra
 * rows soft-wrapped lines take when the output width is known.
 */
export function countRows(frame: string, columns?: number): number {
  if (!frame) return 0;

  const lines = frame.split('\n');
  let rows = lines.length - 1;

  if (columns && columns > 0) {
    for (const line of lines) {
      const width = stringWidth(line.replace(/\r$/, ''));
      rows += Math.max(0, Math.ceil(width / columns) - 1);
    }
  }

  return rows;
}

/**
 * Make every line break return the cursor to column zero. Raw mode turns
 * off the terminal's own newline translation.
 */
export function normalizeLineBreaks(frame: string): string {
  return frame.replace(/\r?\n/g, '\r\n');
}

export class Renderer<Model> {
  private lastFrame: string = '';

  constructor(
    private readonly view: View<Model>,
    private readonly target: RenderTarget,
    private readonly lock: Mutex
  ) {}

  /**
   * The frame currently on screen
   */
  get frame(): string {
    return this.lastFrame;
  }

  /**
   * Render a model. Resolves true when something was written.
   */
  async render(model: Model): Promise<boolean> {
    const frame = this.view(model);

    if (frame === this.lastFrame) {
      return false; // Skip if content hasn't changed
    }

    return this.lock.runExclusive(async () => {
      const rows = countRows(this.lastFrame, this.target.columns);
      if (rows > 0) {
        await this.target.clearLines(rows);
      }
      await this.target.write(normalizeLineBreaks(frame));
      this.lastFrame = frame;
      return true;
    });
  }
}
